import mongoose from 'mongoose';
import { logger } from '../utils/logger.ts';
import { errorMessage } from '../utils/errors.ts';

export const MONGO_RETRY_ATTEMPTS = 10;
export const MONGO_RETRY_DELAY_MS = 2000;

/**
 * Wait for MongoDB to be ready and connect
 */
export async function connectToMongoDB(
  uri: string,
  maxRetries = MONGO_RETRY_ATTEMPTS,
  delayMs = MONGO_RETRY_DELAY_MS,
): Promise<void> {
  if (isMongoDBConnected()) {
    logger.debug('Already connected to MongoDB');
    return;
  }

  let lastError: unknown;
  for (let i = 0; i < maxRetries; i++) {
    try {
      await mongoose.connect(uri, { serverSelectionTimeoutMS: 5000 });
      logger.info('Connected to MongoDB');
      return;
    } catch (error) {
      lastError = error;
      logger.warn({ attempt: i + 1, maxRetries, error: errorMessage(error) }, 'MongoDB not ready');
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }

  throw new Error(`MongoDB not available after ${maxRetries} attempts: ${errorMessage(lastError)}`);
}

export async function disconnectFromMongoDB(): Promise<void> {
  if (isMongoDBConnected()) {
    await mongoose.disconnect();
    logger.info('Disconnected from MongoDB');
  }
}

export function isMongoDBConnected(): boolean {
  return mongoose.connection.readyState === 1;
}
