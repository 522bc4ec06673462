import { Injectable } from '@nestjs/common';
import { RedisService } from '../../../database/services/redis.service';
import { StateCache } from '../interfaces/state-cache.interface';

@Injectable()
export class RedisStateCache implements StateCache {
  constructor(private readonly redis: RedisService) {}

  async put(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.client.set(key, value, 'EX', ttlSeconds);
  }

  async take(key: string): Promise<string | null> {
    return this.redis.client.getdel(key);
  }
}
