import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import { DatabaseModule } from '@warden/database';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { AUTH_OPTIONS, createAuthOptions } from './auth.options';
import { AuthGate } from './guards';
import { SessionManager } from './session/session-manager';
import { TokenCodec } from './token/token-codec';

/**
 * AuthModule: session authentication.
 *
 * Provides:
 * - TokenCodec: HMAC-signed session tokens
 * - SessionManager: issue/invalidate/validate sessions, sole holder of the secret
 * - AuthGate: bearer-token guard for protected routes
 * - REST endpoints for register/login/logout/profile
 *
 * Other modules that put `@UseGuards(AuthGate)` on their routes import this
 * module so the guard's SessionManager resolves.
 */
@Module({
  imports: [
    DatabaseModule.forFeature(),

    // Secret and algorithm are passed per call by TokenCodec.
    JwtModule.register({}),
  ],
  controllers: [AuthController],
  providers: [
    {
      provide: AUTH_OPTIONS,
      inject: [ConfigService],
      useFactory: createAuthOptions,
    },
    TokenCodec,
    SessionManager,
    AuthService,
    AuthGate,
  ],
  exports: [SessionManager, AuthGate],
})
export class AuthModule {}
