import 'reflect-metadata';

import { DataSource } from 'typeorm';

import { env } from '../config/env';
import { SessionRecordEntity } from './entities/SessionRecordEntity';
import { UserProfileEntity } from './entities/UserProfileEntity';

export const AppDataSource = new DataSource({
  type: 'postgres',
  host: env.DB_HOST,
  port: env.DB_PORT,
  username: env.DB_USERNAME,
  password: env.DB_PASSWORD,
  database: env.DB_NAME,
  synchronize: env.DB_SYNCHRONIZE,
  logging: env.DB_LOGGING,
  entities: [UserProfileEntity, SessionRecordEntity],
});
