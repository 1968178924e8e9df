import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { getUserId } from '../identity';
import type { AuthenticatedRequest, RequestUser } from '../interfaces';

/**
 * Parameter decorator that extracts the authenticated user from the request.
 *
 * Usage:
 * ```ts
 * @Get('me')
 * @UseGuards(AuthGate)
 * getProfile(@CurrentUser() user: RequestUser): Promise<UserProfileDto> {
 *   return this.authService.getProfile(user.userId);
 * }
 * ```
 *
 * Without AuthGate in front `request.user` is not set, so the id is read
 * through getUserId and comes back as 0.
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): RequestUser => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    return { userId: getUserId(request) };
  },
);
