import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import * as Redis from 'ioredis';
import { ConfigService } from '../../config/services/config.service';

/**
 * Shared ioredis connection
 */
@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  readonly client: Redis.Redis;

  constructor(configService: ConfigService) {
    const { host, port } = configService.settings.redis;
    this.client = new Redis.Redis({
      host,
      port,
      connectTimeout: 2000,
      maxRetriesPerRequest: 1,
    });

    this.client.on('error', (error: Error) => {
      this.logger.error(`Redis connection error: ${error.message}`);
    });
  }

  async ping(): Promise<boolean> {
    return (await this.client.ping()) === 'PONG';
  }

  async onModuleDestroy(): Promise<void> {
    await this.client.quit();
    this.logger.log('Redis connection closed');
  }
}
