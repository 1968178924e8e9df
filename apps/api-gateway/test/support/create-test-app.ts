import { Controller, Get, INestApplication, Module, UseGuards } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Session, User } from '@warden/database';
import { configureApp } from '../../src/app.setup';
import { AuthGate, AuthModule, CurrentUser } from '../../src/auth';
import type { RequestUser } from '../../src/auth';
import { InMemoryRepository } from './in-memory-repository';

/** Stand-in for a downstream protected route. */
@Controller('protected')
class ProtectedController {
  @Get()
  @UseGuards(AuthGate)
  whoAmI(@CurrentUser() user: RequestUser): RequestUser {
    return user;
  }
}

@Module({
  imports: [AuthModule],
  controllers: [ProtectedController],
})
class ProtectedModule {}

export interface TestApp {
  app: INestApplication;
  users: InMemoryRepository<User>;
  sessions: InMemoryRepository<Session>;
}

/**
 * Boot the auth module over in-memory repositories, configured from
 * `env` instead of the process environment.
 */
export async function createTestApp(
  env: Record<string, string> = {},
): Promise<TestApp> {
  const users = new InMemoryRepository(User);
  const sessions = new InMemoryRepository(Session);

  const moduleRef = await Test.createTestingModule({
    imports: [
      ConfigModule.forRoot({
        isGlobal: true,
        ignoreEnvFile: true,
        load: [() => ({ JWT_SECRET_KEY: 'test-secret', ...env })],
      }),
      AuthModule,
      ProtectedModule,
    ],
  })
    .overrideProvider(getRepositoryToken(User))
    .useValue(users)
    .overrideProvider(getRepositoryToken(Session))
    .useValue(sessions)
    .compile();

  const app = configureApp(moduleRef.createNestApplication({ logger: false }));
  await app.init();

  return { app, users, sessions };
}
