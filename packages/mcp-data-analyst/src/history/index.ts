import type { AppConfig } from '../config.ts';
import { logger } from '../utils/logger.ts';
import { InMemoryHistoryStore } from './memory-store.ts';
import { MongoHistoryStore } from './mongo-store.ts';
import { connectToMongoDB } from './mongodb.ts';
import type { HistoryStore } from './types.ts';

export type * from './types.ts';
export { InMemoryHistoryStore } from './memory-store.ts';
export { MongoHistoryStore } from './mongo-store.ts';

export async function createHistoryStore(config: AppConfig['history']): Promise<HistoryStore> {
  if (config.backend === 'memory') {
    logger.warn('Using in-memory history store; history is lost on restart');
    return new InMemoryHistoryStore();
  }
  await connectToMongoDB(config.mongoUri);
  return new MongoHistoryStore();
}
