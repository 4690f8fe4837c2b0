import type { AttemptFilter, DataStore } from '../store';
import type {
  AttemptRecord,
  AttemptResult,
  AttemptType,
  BlockType,
  ClientContext,
  Page
} from '../types';
import { DAY_MS, now, randomToken, startOfUtcDay } from '../utils';

export interface AttemptEntry {
  phoneNumber: string;
  attemptType: AttemptType;
  result: AttemptResult;
  context: ClientContext;
  failureReason?: string;
  relatedBlockId?: string;
}

export interface SecurityStatistics {
  totalBlocks: number;
  activeBlocks: number;
  blocksToday: number;
  blocksThisWeek: number;
  totalAttempts: number;
  failedAttemptsToday: number;
  blockedAttemptsToday: number;
  topBlockedNumbers: Array<{ phoneNumber: string; blockCount: number }>;
  blockTypesDistribution: Partial<Record<BlockType, number>>;
}

/**
 * Append-only audit trail of authentication attempts. Records are never
 * updated; the only removal path is the retention purge.
 */
export class AttemptLedger {
  constructor(private readonly store: DataStore) {}

  async record(entry: AttemptEntry, at: number = now()): Promise<AttemptRecord> {
    const attempt: AttemptRecord = {
      id: randomToken('att'),
      phoneNumber: entry.phoneNumber,
      attemptType: entry.attemptType,
      result: entry.result,
      attemptedAt: at,
      ipAddress: entry.context.ipAddress,
      userAgent: entry.context.userAgent,
      deviceId: entry.context.deviceId,
      failureReason: entry.failureReason,
      relatedBlockId: entry.relatedBlockId
    };
    await this.store.addAttempt(attempt);
    return attempt;
  }

  /** Failed attempts at or after `since`, newest first. */
  async failuresSince(
    phoneNumber: string,
    attemptType: AttemptType,
    since: number,
    via: DataStore = this.store
  ): Promise<AttemptRecord[]> {
    return via.listAttempts({ phoneNumber, attemptType, result: 'failed', since });
  }

  async recent(
    phoneNumber: string,
    attemptType?: AttemptType,
    limit = 10
  ): Promise<AttemptRecord[]> {
    return this.store.listAttempts({ phoneNumber, attemptType, limit });
  }

  async list(
    filter: Omit<AttemptFilter, 'limit' | 'offset'>,
    page: number,
    pageSize: number
  ): Promise<Page<AttemptRecord>> {
    const [items, total] = await Promise.all([
      this.store.listAttempts({ ...filter, limit: pageSize, offset: (page - 1) * pageSize }),
      this.store.countAttempts(filter)
    ]);
    return { items, total, page, pageSize };
  }

  async countByResult(phoneNumber: string, result: AttemptResult): Promise<number> {
    return this.store.countAttempts({ phoneNumber, result });
  }

  async statistics(current: number = now()): Promise<SecurityStatistics> {
    const todayStart = startOfUtcDay(current);
    const weekStart = current - 7 * DAY_MS;

    const [
      totalBlocks,
      activeBlocks,
      blocksToday,
      weekBlocks,
      totalAttempts,
      failedAttemptsToday,
      blockedAttemptsToday
    ] = await Promise.all([
      this.store.countBlocks({}),
      this.store.countBlocks({ isActive: true }),
      this.store.countBlocks({ blockedSince: todayStart }),
      this.store.listBlocks({ blockedSince: weekStart }),
      this.store.countAttempts({}),
      this.store.countAttempts({ since: todayStart, result: 'failed' }),
      this.store.countAttempts({ since: todayStart, result: 'blocked' })
    ]);

    const perPhone = new Map<string, number>();
    const distribution: Partial<Record<BlockType, number>> = {};
    weekBlocks.forEach((block) => {
      perPhone.set(block.phoneNumber, (perPhone.get(block.phoneNumber) ?? 0) + 1);
      distribution[block.blockType] = (distribution[block.blockType] ?? 0) + 1;
    });

    const topBlockedNumbers = [...perPhone.entries()]
      .map(([phoneNumber, blockCount]) => ({ phoneNumber, blockCount }))
      .sort((a, b) => b.blockCount - a.blockCount || a.phoneNumber.localeCompare(b.phoneNumber))
      .slice(0, 10);

    return {
      totalBlocks,
      activeBlocks,
      blocksToday,
      blocksThisWeek: weekBlocks.length,
      totalAttempts,
      failedAttemptsToday,
      blockedAttemptsToday,
      topBlockedNumbers,
      blockTypesDistribution: distribution
    };
  }

  async purgeBefore(cutoff: number): Promise<number> {
    return this.store.deleteAttemptsBefore(cutoff);
  }
}
