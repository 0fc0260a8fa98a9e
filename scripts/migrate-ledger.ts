/**
 * Upgrade a legacy ledger file and take a fresh backup of the result.
 * Safe to run on a ledger that is already current.
 *
 * Usage: tsx scripts/migrate-ledger.ts
 */

import { loadConfig } from '../src/config';
import { InterchangeService } from '../src/services/interchangeService';
import { LedgerStore } from '../src/services/storeService';
import { createLogger } from '../src/utils/logger';

async function migrateLedger() {
  const config = loadConfig();
  const logger = createLogger(config.logging);

  const store = new LedgerStore({ dataFile: config.ledger.dataFile, logger });

  try {
    logger.info({ dataFile: config.ledger.dataFile }, 'Checking ledger format...');
    await store.initialize();

    const count = await store.count();
    logger.info({ count }, 'Ledger is on the current format');

    const backupPath = await new InterchangeService(store, logger).backup();
    logger.info({ backupPath }, 'Backup complete');
  } catch (error) {
    logger.error({ err: error }, 'Ledger migration failed');
    process.exit(1);
  }
}

void migrateLedger();
