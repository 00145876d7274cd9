// src/typeorm.config.ts
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { join } from 'path';
import { ConfigService } from '@nestjs/config';
import { Rate } from './rates/entities/rate.entity';

export const typeOrmConfig = (
  configService: ConfigService,
): TypeOrmModuleOptions => ({
  type: 'postgres',
  host: configService.get<string>('DB_HOST') || 'localhost',
  port: parseInt(configService.get<string>('DB_PORT') ?? '', 10) || 5432,
  username: configService.get<string>('DB_USERNAME') || 'postgres',
  password: configService.get<string>('DB_PASSWORD') || 'postgres',
  database: configService.get<string>('DB_DATABASE') || 'crypto_rates',
  entities: [Rate],
  migrations: [join(__dirname, 'migrations', '*.{ts,js}')],
  synchronize: false, // Schema is owned by migrations
  logging: false,
  ssl: configService.get<string>('DB_SSL') === 'true',
});
