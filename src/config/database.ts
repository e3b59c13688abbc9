import mongoose from 'mongoose';
import logger, { errorMeta } from './logger';

/**
 * Opens the shared mongoose connection and builds the indexes the domain relies on
 * (the partial unique indexes on active HOD appointments among them).
 * Transactions need a replica set, so the URI should point at one.
 */
const connectDatabase = async (mongoUri: string): Promise<void> => {
  await mongoose.connect(mongoUri, {
    maxPoolSize: 10,
    minPoolSize: 2,
    socketTimeoutMS: 45000,
  });

  logger.info('MongoDB connected successfully');

  mongoose.connection.on('error', (err) => {
    logger.error('MongoDB connection error', errorMeta(err));
  });

  mongoose.connection.on('disconnected', () => {
    logger.warn('MongoDB disconnected');
  });

  await mongoose.connection.syncIndexes();
  logger.info('MongoDB indexes in sync');
};

export const disconnectDatabase = async (): Promise<void> => {
  await mongoose.connection.close();
  logger.info('MongoDB connection closed');
};

export default connectDatabase;
