import { ConfigService } from '@nestjs/config';
import { createAuthOptions, DEFAULT_SESSION_TTL_SECONDS } from './auth.options';

const ENV_KEYS = [
  'JWT_SECRET_KEY',
  'SESSION_TTL_SECONDS',
  'AUTH_ENFORCE_SESSION_RECORD',
] as const;

describe('createAuthOptions', () => {
  const saved: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};

  beforeAll(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterAll(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value !== undefined) {
        process.env[key] = value;
      }
    }
  });

  it('applies defaults when only the secret is set', () => {
    const options = createAuthOptions(
      new ConfigService({ JWT_SECRET_KEY: 'test-secret' }),
    );

    expect(options).toEqual({
      secret: 'test-secret',
      sessionTtlSeconds: DEFAULT_SESSION_TTL_SECONDS,
      enforceSessionRecord: true,
    });
    expect(DEFAULT_SESSION_TTL_SECONDS).toBe(86400);
  });

  it('returns a frozen value', () => {
    const options = createAuthOptions(
      new ConfigService({ JWT_SECRET_KEY: 'test-secret' }),
    );

    expect(Object.isFrozen(options)).toBe(true);
  });

  it('reads the ttl and enforcement flag from string values', () => {
    const options = createAuthOptions(
      new ConfigService({
        JWT_SECRET_KEY: 'test-secret',
        SESSION_TTL_SECONDS: '3600',
        AUTH_ENFORCE_SESSION_RECORD: 'false',
      }),
    );

    expect(options.sessionTtlSeconds).toBe(3600);
    expect(options.enforceSessionRecord).toBe(false);
  });

  it('fails when the secret is missing', () => {
    expect(() => createAuthOptions(new ConfigService({}))).toThrow(
      'JWT_SECRET_KEY is not defined. Check your .env file.',
    );
  });

  it('fails when the secret is empty', () => {
    expect(() =>
      createAuthOptions(new ConfigService({ JWT_SECRET_KEY: '' })),
    ).toThrow('JWT_SECRET_KEY is not defined');
  });

  it.each(['0', '-10', 'soon', '1.5'])('rejects a ttl of %p', (ttl) => {
    expect(() =>
      createAuthOptions(
        new ConfigService({ JWT_SECRET_KEY: 'test-secret', SESSION_TTL_SECONDS: ttl }),
      ),
    ).toThrow(`SESSION_TTL_SECONDS must be a positive integer, got "${ttl}".`);
  });

  it('rejects an unreadable enforcement flag', () => {
    expect(() =>
      createAuthOptions(
        new ConfigService({
          JWT_SECRET_KEY: 'test-secret',
          AUTH_ENFORCE_SESSION_RECORD: 'maybe',
        }),
      ),
    ).toThrow('AUTH_ENFORCE_SESSION_RECORD must be "true" or "false", got "maybe".');
  });
});
