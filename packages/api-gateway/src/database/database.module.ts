import { Module, Global } from '@nestjs/common';
import { DrizzleService } from './services/drizzle.service';
import { RedisService } from './services/redis.service';

@Global()
@Module({
  providers: [DrizzleService, RedisService],
  exports: [DrizzleService, RedisService],
})
export class DatabaseModule {}
