import { UnauthorizedException } from '@nestjs/common';

/**
 * Thrown by handlers that need an identity but found none bound to the
 * request.
 */
export class NotAuthenticatedException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      message: 'Not authenticated',
    });
  }
}
