import 'dotenv/config';
import { loadGuardConfig } from './config';
import { createLogger } from './logger';
import { AttemptLedger } from './services/attemptLedger';
import { MaintenanceService } from './services/maintenanceService';
import { createStore } from './store';

async function main() {
  const config = loadGuardConfig(process.env);
  const logger = createLogger({ name: 'auth-guard-maintenance' });
  const store = createStore({
    kind: process.env.STORAGE_DRIVER === 'memory' ? 'memory' : 'postgres',
    databaseUrl: process.env.DATABASE_URL,
    lockTimeoutMs: config.lockTimeoutMs
  });
  await store.init();

  try {
    const maintenance = new MaintenanceService(store, new AttemptLedger(store), logger);
    const argDays = process.argv[2] ? Number(process.argv[2]) : undefined;
    await maintenance.sweepExpiredBlocks();
    await maintenance.purgeOldRecords(argDays ?? config.attemptRetentionDays);
  } finally {
    await store.close();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
