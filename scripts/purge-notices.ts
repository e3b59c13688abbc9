import dotenv from 'dotenv';
dotenv.config();

import connectDatabase, { disconnectDatabase } from '../src/config/database';
import logger, { errorMeta } from '../src/config/logger';
import { loadSettings } from '../src/config/settings';
import { MongoDataStore } from '../src/repositories/mongo';
import { createServices } from '../src/services';
import { minutesBefore } from '../src/utils/helpers';

/** Deletes notices older than NOTICE_RETENTION_MINUTES and exits. */
const purgeNotices = async () => {
  try {
    const settings = loadSettings();
    await connectDatabase(settings.mongoUri);

    const { notices } = createServices(new MongoDataStore(), settings);
    const removed = await notices.purgeOlderThan(minutesBefore(new Date(), settings.noticeRetentionMinutes));
    logger.info(`Purged ${removed} notice(s) older than ${settings.noticeRetentionMinutes} minute(s)`);

    await disconnectDatabase();
    process.exit(0);
  } catch (error) {
    logger.error('Notice purge failed', errorMeta(error));
    process.exit(1);
  }
};

void purgeNotices();
