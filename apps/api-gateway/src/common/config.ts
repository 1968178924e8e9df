import { ConfigService } from '@nestjs/config';

/** Read an optional positive integer setting; throws on anything else. */
export function readPositiveInteger(
  configService: ConfigService,
  key: string,
  fallback: number,
): number {
  const raw = configService.get<string | number>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = typeof raw === 'number' ? raw : Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${key} must be a positive integer, got "${raw}".`);
  }
  return value;
}

/** Read an optional boolean setting (`true`/`false`/`1`/`0`). */
export function readBoolean(
  configService: ConfigService,
  key: string,
  fallback: boolean,
): boolean {
  const raw = configService.get<string | boolean>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  if (typeof raw === 'boolean') {
    return raw;
  }

  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new Error(`${key} must be "true" or "false", got "${raw}".`);
  }
}
