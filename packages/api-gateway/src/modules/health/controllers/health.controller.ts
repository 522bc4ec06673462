import { Controller, Get, HttpStatus, Logger, Res } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { FastifyReply } from 'fastify';
import { Public } from '../../auth/decorators/public.decorator';
import { DrizzleService } from '../../../database/services/drizzle.service';
import { RedisService } from '../../../database/services/redis.service';

export interface ComponentStatus {
  status: 'up' | 'down';
  responseTime?: string;
  error?: string;
}

export interface HealthReport {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  checks: {
    database: ComponentStatus;
    redis: ComponentStatus;
  };
}

@ApiTags('health')
@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    private readonly db: DrizzleService,
    private readonly redis: RedisService,
  ) {}

  @Public()
  @Get()
  @ApiOperation({ summary: 'Postgres and Redis connectivity' })
  async check(@Res() reply: FastifyReply): Promise<void> {
    const report = await this.buildReport();
    const statusCode =
      report.status === 'healthy' ? HttpStatus.OK : HttpStatus.SERVICE_UNAVAILABLE;

    if (report.status !== 'healthy') {
      this.logger.warn(
        `Health check degraded: database=${report.checks.database.status} redis=${report.checks.redis.status}`,
      );
    }

    await reply.status(statusCode).send(report);
  }

  async buildReport(): Promise<HealthReport> {
    const [database, redis] = await Promise.all([
      this.probe('Database', async () => {
        await this.db.query('SELECT 1');
        return true;
      }),
      this.probe('Redis', () => this.redis.ping()),
    ]);

    return {
      status: database.status === 'up' && redis.status === 'up' ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      checks: { database, redis },
    };
  }

  private async probe(name: string, check: () => Promise<boolean>): Promise<ComponentStatus> {
    const startTime = performance.now();
    try {
      const up = await check();
      return {
        status: up ? 'up' : 'down',
        responseTime: `${Math.round(performance.now() - startTime)}ms`,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`${name} health check failed: ${message}`);
      return { status: 'down', error: message };
    }
  }
}
