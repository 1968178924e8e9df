import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  HealthCheck,
  HealthCheckService,
  TypeOrmHealthIndicator,
} from '@nestjs/terminus';
import type { HealthCheckResult } from '@nestjs/terminus';
import { readPositiveInteger } from '../common/config';

const DEFAULT_DB_TIMEOUT_MS = 3000;

/**
 * Routes:
 * - GET /health       → readiness: the session store answers a ping
 * - GET /health/live  → liveness: the process is serving requests
 */
@Controller('health')
export class HealthController {
  private readonly dbTimeoutMs: number;

  constructor(
    private readonly health: HealthCheckService,
    private readonly db: TypeOrmHealthIndicator,
    configService: ConfigService,
  ) {
    this.dbTimeoutMs = readPositiveInteger(
      configService,
      'HEALTH_DB_TIMEOUT_MS',
      DEFAULT_DB_TIMEOUT_MS,
    );
  }

  @Get()
  @HealthCheck()
  check(): Promise<HealthCheckResult> {
    return this.health.check([
      () => this.db.pingCheck('database', { timeout: this.dbTimeoutMs }),
    ]);
  }

  @Get('live')
  live(): { status: 'ok' } {
    return { status: 'ok' };
  }
}
