import type { Logger } from '../logger';
import type { DataStore } from '../store';
import { DAY_MS, now, toIso } from '../utils';
import type { AttemptLedger } from './attemptLedger';

export interface PurgeResult {
  cutoff: string;
  attemptsDeleted: number;
  blocksDeleted: number;
}

export class MaintenanceService {
  constructor(
    private readonly store: DataStore,
    private readonly ledger: AttemptLedger,
    private readonly logger: Logger
  ) {}

  /** Deletes attempts and inactive blocks older than `days`. Active blocks are kept. */
  async purgeOldRecords(days: number): Promise<PurgeResult> {
    if (!Number.isInteger(days) || days < 1) {
      throw new Error(`retention must be a positive number of days, got ${days}`);
    }
    const cutoff = now() - days * DAY_MS;
    const attemptsDeleted = await this.ledger.purgeBefore(cutoff);
    const blocksDeleted = await this.store.deleteInactiveBlocksBefore(cutoff);
    this.logger.info({ days, attemptsDeleted, blocksDeleted }, 'old security records purged');
    return { cutoff: toIso(cutoff), attemptsDeleted, blocksDeleted };
  }

  async sweepExpiredBlocks(): Promise<number> {
    const count = await this.store.deactivateExpiredBlocks(now());
    if (count > 0) {
      this.logger.info({ count }, 'expired blocks deactivated');
    }
    return count;
  }
}
