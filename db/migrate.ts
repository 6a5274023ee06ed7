import 'dotenv/config';
import { readdir, readFile } from 'node:fs/promises';
import { loadConfig } from '../src/config/index.js';
import { PgEntityStore } from '../src/store/pg.store.js';
import { createLogger } from '../src/utils/logger.js';

const MIGRATIONS_DIR = new URL('./migrations/', import.meta.url);

const config = loadConfig();
const logger = createLogger(config.server);
const store = new PgEntityStore({ connectionString: config.database.url, poolMax: 1, logger });

// Every script is idempotent (IF NOT EXISTS / OR REPLACE), so all of them run on each invocation
const migrate = async () => {
  const files = (await readdir(MIGRATIONS_DIR)).filter((name) => name.endsWith('.sql')).sort();
  for (const file of files) {
    const sql = await readFile(new URL(file, MIGRATIONS_DIR), 'utf8');
    await store.execute(sql);
    logger.info(`Applied migration ${file}`);
  }
};

migrate()
  .then(() => store.close())
  .catch(async (error: unknown) => {
    logger.error('Migration failed', { error });
    await store.close();
    process.exitCode = 1;
  });
