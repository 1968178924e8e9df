import { createHmac } from 'crypto';
import { JwtService } from '@nestjs/jwt';
import { TokenCodec } from './token-codec';

const SECRET = 'test-secret';
const HOUR = 60 * 60;

const base64url = (value: object): string =>
  Buffer.from(JSON.stringify(value)).toString('base64url');

describe('TokenCodec', () => {
  let jwtService: JwtService;
  let codec: TokenCodec;

  beforeEach(() => {
    jwtService = new JwtService();
    codec = new TokenCodec(jwtService);
  });

  describe('encode', () => {
    it('produces a three-part token and the matching expiry', () => {
      const now = new Date('2025-01-01T00:00:00.000Z');

      const result = codec.encode(123, SECRET, 24 * HOUR, now);

      if (!result.ok) throw new Error(result.error.message);
      expect(result.value.token.split('.')).toHaveLength(3);
      expect(result.value.expiresAt.toISOString()).toBe('2025-01-02T00:00:00.000Z');
      expect(result.value.claims).toEqual({
        user_id: 123,
        iat: 1735689600,
        nbf: 1735689600,
        exp: 1735776000,
      });
    });

    it('derives expiresAt from the signed exp claim', () => {
      const now = new Date('2025-01-01T00:00:00.750Z');

      const result = codec.encode(7, SECRET, 60, now);

      if (!result.ok) throw new Error(result.error.message);
      expect(result.value.expiresAt.getTime()).toBe(result.value.claims.exp * 1000);
      expect(result.value.expiresAt.toISOString()).toBe('2025-01-01T00:01:00.000Z');
    });

    it('signs with HS256', () => {
      const result = codec.encode(1, SECRET, HOUR);

      if (!result.ok) throw new Error(result.error.message);
      const [header] = result.value.token.split('.');
      expect(JSON.parse(Buffer.from(header, 'base64url').toString())).toEqual({
        alg: 'HS256',
        typ: 'JWT',
      });
    });

    it.each([0, -5, 1.5])('rejects a ttl of %p', (ttl) => {
      const result = codec.encode(1, SECRET, ttl);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('token.invalid_ttl');
    });

    it('reports a signing failure for an empty secret', () => {
      const result = codec.encode(1, '', HOUR);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('token.signing_failed');
    });
  });

  describe('decode', () => {
    it('returns the claims of a token it encoded', () => {
      const encoded = codec.encode(123, SECRET, HOUR);
      if (!encoded.ok) throw new Error(encoded.error.message);

      const decoded = codec.decode(encoded.value.token, SECRET);

      expect(decoded).toEqual({ ok: true, value: encoded.value.claims });
    });

    it('rejects a token signed with another secret as invalid', () => {
      const encoded = codec.encode(123, 'wrong-secret', HOUR);
      if (!encoded.ok) throw new Error(encoded.error.message);

      const decoded = codec.decode(encoded.value.token, SECRET);

      expect(decoded.ok).toBe(false);
      if (decoded.ok) return;
      expect(decoded.error.code).toBe('token.invalid');
    });

    it('reports a correctly signed token past its expiry as expired', () => {
      const issuedAt = new Date(Date.now() - 2 * HOUR * 1000);
      const encoded = codec.encode(123, SECRET, HOUR, issuedAt);
      if (!encoded.ok) throw new Error(encoded.error.message);

      const decoded = codec.decode(encoded.value.token, SECRET);

      expect(decoded).toEqual({
        ok: false,
        error: { code: 'token.expired', message: 'Token has expired' },
      });
    });

    it('treats the exact expiry instant as expired', () => {
      const issuedAt = new Date('2025-01-01T00:00:00.000Z');
      const encoded = codec.encode(5, SECRET, 60, issuedAt);
      if (!encoded.ok) throw new Error(encoded.error.message);

      const justBefore = codec.decode(
        encoded.value.token,
        SECRET,
        new Date('2025-01-01T00:00:59.000Z'),
      );
      const atExpiry = codec.decode(encoded.value.token, SECRET, encoded.value.expiresAt);

      expect(justBefore.ok).toBe(true);
      expect(atExpiry.ok).toBe(false);
      if (atExpiry.ok) return;
      expect(atExpiry.error.code).toBe('token.expired');
    });

    it('reports an expired token under the wrong secret as invalid, not expired', () => {
      const issuedAt = new Date(Date.now() - 2 * HOUR * 1000);
      const encoded = codec.encode(123, 'wrong-secret', HOUR, issuedAt);
      if (!encoded.ok) throw new Error(encoded.error.message);

      const decoded = codec.decode(encoded.value.token, SECRET);

      expect(decoded.ok).toBe(false);
      if (decoded.ok) return;
      expect(decoded.error.code).toBe('token.invalid');
    });

    it('rejects a token used before its not-before time', () => {
      const issuedAt = new Date('2025-01-01T00:00:00.000Z');
      const encoded = codec.encode(5, SECRET, HOUR, issuedAt);
      if (!encoded.ok) throw new Error(encoded.error.message);

      const decoded = codec.decode(
        encoded.value.token,
        SECRET,
        new Date('2024-12-31T23:00:00.000Z'),
      );

      expect(decoded.ok).toBe(false);
      if (decoded.ok) return;
      expect(decoded.error.code).toBe('token.invalid');
    });

    it.each(['malformed.token.string', 'not-a-jwt', ''])(
      'rejects the malformed token %p',
      (token) => {
        const decoded = codec.decode(token, SECRET);

        expect(decoded.ok).toBe(false);
        if (decoded.ok) return;
        expect(decoded.error.code).toBe('token.invalid');
      },
    );

    it('rejects an unsigned token declaring alg none', () => {
      const now = Math.floor(Date.now() / 1000);
      const token = `${base64url({ alg: 'none', typ: 'JWT' })}.${base64url({
        user_id: 1,
        iat: now,
        nbf: now,
        exp: now + HOUR,
      })}.`;

      const decoded = codec.decode(token, SECRET);

      expect(decoded.ok).toBe(false);
      if (decoded.ok) return;
      expect(decoded.error.code).toBe('token.invalid');
    });

    it.each(['RS256', 'ES256', 'PS256'])(
      'rejects a token whose header declares %s, even when HMAC-signed with the secret',
      (alg) => {
        const now = Math.floor(Date.now() / 1000);
        const signingInput = `${base64url({ alg, typ: 'JWT' })}.${base64url({
          user_id: 1,
          iat: now,
          nbf: now,
          exp: now + HOUR,
        })}`;
        const signature = createHmac('sha256', SECRET).update(signingInput).digest('base64url');

        const decoded = codec.decode(`${signingInput}.${signature}`, SECRET);

        expect(decoded.ok).toBe(false);
        if (decoded.ok) return;
        expect(decoded.error.code).toBe('token.invalid');
      },
    );

    it('accepts other HMAC algorithms', () => {
      const now = Math.floor(Date.now() / 1000);
      const token = jwtService.sign(
        { user_id: 9, iat: now, nbf: now, exp: now + HOUR },
        { secret: SECRET, algorithm: 'HS512' },
      );

      const decoded = codec.decode(token, SECRET);

      expect(decoded.ok).toBe(true);
      if (!decoded.ok) return;
      expect(decoded.value.user_id).toBe(9);
    });

    it('rejects a correctly signed token without a user id', () => {
      const now = Math.floor(Date.now() / 1000);
      const token = jwtService.sign(
        { sub: 'someone', iat: now, nbf: now, exp: now + HOUR },
        { secret: SECRET, algorithm: 'HS256' },
      );

      const decoded = codec.decode(token, SECRET);

      expect(decoded).toEqual({
        ok: false,
        error: { code: 'token.invalid', message: 'Token claims are malformed' },
      });
    });
  });
});
