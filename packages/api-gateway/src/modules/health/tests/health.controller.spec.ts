import { Test } from '@nestjs/testing';
import { DrizzleService } from '../../../database/services/drizzle.service';
import { RedisService } from '../../../database/services/redis.service';
import { HealthController } from '../controllers/health.controller';

describe('HealthController', () => {
  const db = { query: jest.fn() };
  const redis = { ping: jest.fn() };
  let controller: HealthController;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        { provide: DrizzleService, useValue: db },
        { provide: RedisService, useValue: redis },
      ],
    }).compile();

    controller = moduleRef.get(HealthController);
  });

  it('is healthy when both stores answer', async () => {
    db.query.mockResolvedValue({ rows: [{ '?column?': 1 }] });
    redis.ping.mockResolvedValue(true);

    const report = await controller.buildReport();

    expect(db.query).toHaveBeenCalledWith('SELECT 1');
    expect(report.status).toBe('healthy');
    expect(report.checks.database).toEqual({ status: 'up', responseTime: expect.stringMatching(/^\d+ms$/) });
    expect(report.checks.redis.status).toBe('up');
  });

  it('reports the failing store', async () => {
    db.query.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:5432'));
    redis.ping.mockResolvedValue(true);

    const report = await controller.buildReport();

    expect(report.status).toBe('unhealthy');
    expect(report.checks.database).toEqual({
      status: 'down',
      error: 'connect ECONNREFUSED 127.0.0.1:5432',
    });
    expect(report.checks.redis.status).toBe('up');
  });

  it('treats an unexpected ping reply as down', async () => {
    db.query.mockResolvedValue({ rows: [] });
    redis.ping.mockResolvedValue(false);

    const report = await controller.buildReport();

    expect(report.status).toBe('unhealthy');
    expect(report.checks.redis.status).toBe('down');
  });
});
