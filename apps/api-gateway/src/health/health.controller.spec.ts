import { ConfigService } from '@nestjs/config';
import { HealthCheckService, TypeOrmHealthIndicator } from '@nestjs/terminus';
import type { HealthIndicatorFunction } from '@nestjs/terminus';
import { Test } from '@nestjs/testing';
import { HealthController } from './health.controller';

describe('HealthController', () => {
  const pingCheck = jest.fn();
  let controller: HealthController;

  async function createController(config: Record<string, string>): Promise<void> {
    const moduleRef = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        {
          provide: HealthCheckService,
          useValue: {
            check: async (indicators: HealthIndicatorFunction[]) => ({
              status: 'ok',
              details: (await Promise.all(indicators.map((run) => run()))).reduce(
                (merged, result) => ({ ...merged, ...result }),
                {},
              ),
            }),
          },
        },
        { provide: TypeOrmHealthIndicator, useValue: { pingCheck } },
        { provide: ConfigService, useValue: new ConfigService(config) },
      ],
    }).compile();

    controller = moduleRef.get(HealthController);
  }

  beforeEach(() => {
    pingCheck.mockReset();
    pingCheck.mockResolvedValue({ database: { status: 'up' } });
  });

  it('pings the database with the default timeout', async () => {
    await createController({});

    const result = await controller.check();

    expect(pingCheck).toHaveBeenCalledWith('database', { timeout: 3000 });
    expect(result).toEqual({ status: 'ok', details: { database: { status: 'up' } } });
  });

  it('uses the configured ping timeout', async () => {
    await createController({ HEALTH_DB_TIMEOUT_MS: '500' });

    await controller.check();

    expect(pingCheck).toHaveBeenCalledWith('database', { timeout: 500 });
  });

  it.each(['soon', '0', '-100'])('refuses a ping timeout of "%s"', async (timeout) => {
    await expect(createController({ HEALTH_DB_TIMEOUT_MS: timeout })).rejects.toThrow(
      `HEALTH_DB_TIMEOUT_MS must be a positive integer, got "${timeout}".`,
    );
  });

  it('reports liveness without touching the database', async () => {
    await createController({});

    expect(controller.live()).toEqual({ status: 'ok' });
    expect(pingCheck).not.toHaveBeenCalled();
  });
});
