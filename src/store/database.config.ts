import type { TypeOrmModuleOptions } from '@nestjs/typeorm';
import type { AppConfig } from '../config/configuration';
import { ChatMessage } from './entities/chat-message.entity';
import { UploadJob } from './entities/upload-job.entity';

export const STORE_ENTITIES = [UploadJob, ChatMessage];

export function databaseOptions(
  database: AppConfig['database'],
): TypeOrmModuleOptions {
  const inMemory = database.path === ':memory:';
  return {
    type: 'better-sqlite3',
    database: database.path,
    entities: STORE_ENTITIES,
    synchronize: database.synchronize,
    // WAL lets status polls read while a dispatch callback is writing
    enableWAL: !inMemory,
    timeout: database.busyTimeoutMs,
    logging: false,
  };
}
