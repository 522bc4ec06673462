import { Global, Module } from '@nestjs/common';
import * as dotenv from 'dotenv';
import { ConfigService } from './services/config.service';

@Global()
@Module({
  providers: [
    {
      provide: ConfigService,
      useFactory: () => {
        // Load environment variables from .env file
        dotenv.config();
        return new ConfigService(process.env);
      },
    },
  ],
  exports: [ConfigService],
})
export class ConfigModule {}
