import 'dotenv/config';
import logger, { createLogger } from './utils/logger';

const configLogger = createLogger('Config');

export type PostStoreDriver = 'postgres' | 'memory';

const parseStoreDriver = (value: string | undefined): PostStoreDriver => {
  const driver = value || 'postgres';
  if (driver !== 'postgres' && driver !== 'memory') {
    configLogger.error(`POST_STORE must be "postgres" or "memory", got "${driver}"`);
    process.exit(1);
  }
  return driver;
};

const config = {
  port: parseInt(process.env.PORT || '3000', 10),
  nodeEnv: process.env.NODE_ENV || 'development',
  logLevel: logger.level,
  postStore: parseStoreDriver(process.env.POST_STORE),
  seedSampleData: process.env.SEED_SAMPLE_DATA === 'true',
};

export default config;
