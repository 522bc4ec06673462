import { Controller, Get, Res, HttpStatus } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { FastifyReply } from 'fastify';
import { Public } from '../decorators/public.decorator';
import { AuthMetricsService } from '../services/auth-metrics.service';

@ApiTags('metrics')
@Controller('v1/auth/metrics')
export class AuthMetricsController {
  constructor(private readonly metricsService: AuthMetricsService) {}

  @Public()
  @Get()
  @ApiOperation({ summary: 'Authentication flow metrics in Prometheus text format' })
  async getPrometheusMetrics(@Res() reply: FastifyReply): Promise<void> {
    const metrics = await this.metricsService.getMetrics();

    // Raw text, not wrapped in the response envelope
    await reply
      .status(HttpStatus.OK)
      .header('Content-Type', this.metricsService.getContentType())
      .send(metrics);
  }
}
