// src/data-source.ts

import { config } from 'dotenv';
config(); // Load environment variables from .env

import { DataSource } from 'typeorm';
import path from 'path';
import { Rate } from './rates/entities/rate.entity';

// Compiled CLI runs pick up .js migrations, ts-node runs the .ts sources
const migrationsPath = path.resolve(__dirname, 'migrations', '*.{ts,js}');

const AppDataSource = new DataSource({
  type: 'postgres',
  host: process.env.DB_HOST || 'localhost',
  port: parseInt(process.env.DB_PORT ?? '', 10) || 5432,
  username: process.env.DB_USERNAME || 'postgres',
  password: process.env.DB_PASSWORD || 'postgres',
  database: process.env.DB_DATABASE || 'crypto_rates',

  entities: [Rate],
  migrations: [migrationsPath],

  synchronize: false, // Must be false when using migrations
  logging: false,
  ssl: process.env.DB_SSL === 'true',
});

export default AppDataSource;
