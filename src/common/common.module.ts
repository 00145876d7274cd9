// src/common/common.module.ts

import { Module, Global } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { LoggerService } from './logger/logger.service';
import { RedisService } from './redis/redis.service';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [LoggerService, RedisService],
  exports: [LoggerService, RedisService],
})
export class CommonModule {}
