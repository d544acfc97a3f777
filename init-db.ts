// PostgreSQL DB initialization script for the cap_alerts and sensor_status tables
import 'dotenv/config';
import { loadConfig } from './config.js';
import { createPool, initializeSchema } from './db.js';
import { logger } from './logger.js';
import { errorMessage } from './middleware/error.js';

async function initDb() {
  const { database } = loadConfig();
  if (!database) {
    logger.error('DATABASE_URL must be set to initialize the schema');
    process.exitCode = 1;
    return;
  }
  const pool = createPool(database.connectionString);
  try {
    await initializeSchema(pool);
    logger.info('Database initialized: PostGIS extension, cap_alerts and sensor_status ensured.');
  } catch (err) {
    logger.error('Error initializing database', { error: errorMessage(err) });
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

initDb().catch((err: unknown) => {
  logger.error('Error initializing database', { error: errorMessage(err) });
  process.exitCode = 1;
});
