import 'reflect-metadata';
import { join } from 'node:path';

import { DataSource } from 'typeorm';

import { env } from '../config/env';
import { KnowledgeNode } from './entities/KnowledgeNode';
import { LearningObjective } from './entities/LearningObjective';
import { PrerequisiteEdge } from './entities/PrerequisiteEdge';
import { Project } from './entities/Project';
import { TranscriptEntry } from './entities/TranscriptEntry';
import { TutoringSession } from './entities/TutoringSession';

export const AppDataSource = new DataSource({
  type: 'postgres',
  host: env.DB_HOST,
  port: env.DB_PORT,
  username: env.DB_USERNAME,
  password: env.DB_PASSWORD,
  database: env.DB_NAME,
  synchronize: false,
  logging: env.DB_LOGGING,
  entities: [Project, KnowledgeNode, PrerequisiteEdge, LearningObjective, TutoringSession, TranscriptEntry],
  migrations: [join(__dirname, 'migrations/*.{ts,js}')],
  migrationsTableName: 'typeorm_migrations',
});
