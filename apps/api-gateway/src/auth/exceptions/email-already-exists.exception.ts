import { ConflictException } from '@nestjs/common';

/**
 * Thrown when attempting to register a user with an email
 * that already exists in the database.
 *
 * HTTP 409 Conflict.
 */
export class EmailAlreadyExistsException extends ConflictException {
  constructor() {
    super({
      statusCode: 409,
      error: 'Conflict',
      message: 'Email already registered',
    });
  }
}
