import 'dotenv/config';
import { FRAMEWORKS } from '../src/constants/enums.js';
import { loadConfig } from '../src/config/index.js';
import { PgEntityStore } from '../src/store/pg.store.js';
import { createLogger } from '../src/utils/logger.js';
import { seedPrinciples } from './principles.js';

const config = loadConfig();
const logger = createLogger(config.server);
const store = new PgEntityStore({ connectionString: config.database.url, poolMax: 1, logger });

const seed = async () => {
  for (const framework of FRAMEWORKS) {
    await seedPrinciples(store, framework, logger);
  }
};

seed()
  .then(() => store.close())
  .catch(async (error: unknown) => {
    logger.error('Seeding failed', { error });
    await store.close();
    process.exitCode = 1;
  });
