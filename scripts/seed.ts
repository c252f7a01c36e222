import path from 'path';
import { createDocumentStore, closeConnection } from '../src/config/database';
import { seedStoreFromFile } from '../src/repositories/seed';
import { errorMessage, logger } from '../src/config/logger';

/**
 * Load a fixture file into the configured store
 *
 * Usage: npm run seed -- [file] [--force]   (defaults to data/seed.json)
 *
 * Documents already in the store are skipped unless --force is given.
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const overwrite = args.includes('--force');
  const [fileArg] = args.filter((arg) => arg !== '--force');
  const file = path.resolve(fileArg ?? path.join(__dirname, '../data/seed.json'));
  const store = createDocumentStore();

  await store.ping();
  const result = await seedStoreFromFile(store, file, { overwrite });
  await closeConnection();

  logger.info('Seed complete', { file, store: store.name, ...result });
}

main().catch((error: unknown) => {
  logger.error('Seed failed', { error: errorMessage(error) });
  process.exit(1);
});
