import type { GuardConfig } from '../config';
import { AppError, notFound, retryOnCapacityRace } from '../errors';
import type { Logger } from '../logger';
import { blockMessage, formatRemaining, remainingSeconds } from '../messages';
import type { BlockFilter, DataStore } from '../store';
import type {
  AttemptRecord,
  AttemptType,
  Block,
  BlockInfo,
  BlockType,
  ClientContext,
  Decision,
  Page
} from '../types';
import { HOUR_MS, MINUTE_MS, now, randomToken, toIso, uniqueValues } from '../utils';
import type { AttemptLedger } from './attemptLedger';

export interface AttemptInput {
  phoneNumber: string;
  attemptType: AttemptType;
  success: boolean;
  context: ClientContext;
  failureReason?: string;
}

export interface Operator {
  id: string;
}

export interface PhoneHistory {
  phoneNumber: string;
  currentStatus: BlockInfo | undefined;
  statistics: {
    totalBlocks: number;
    activeBlocks: number;
    failedAttempts: number;
    successfulAttempts: number;
  };
  blocks: Block[];
  recentAttempts: AttemptRecord[];
}

const USER_AGENT_SNAPSHOT_LENGTH = 100;
const HISTORY_ATTEMPT_LIMIT = 50;

function coveringTypes(attemptType: AttemptType): BlockType[] {
  return [attemptType, 'combined'];
}

export class ProgressiveBlockEngine {
  constructor(
    private readonly store: DataStore,
    private readonly ledger: AttemptLedger,
    private readonly config: GuardConfig,
    private readonly logger: Logger
  ) {}

  async recordAttempt(input: AttemptInput): Promise<Decision> {
    const blocked = await this.checkGate(input.phoneNumber, input.attemptType, input.context);
    if (blocked) {
      return { kind: 'blocked', reason: 'blocked', block: blocked };
    }

    const current = now();
    await this.ledger.record(
      {
        phoneNumber: input.phoneNumber,
        attemptType: input.attemptType,
        result: input.success ? 'success' : 'failed',
        context: input.context,
        failureReason: input.success ? undefined : input.failureReason
      },
      current
    );

    if (input.success) {
      return { kind: 'allowed' };
    }
    return retryOnCapacityRace(() => this.evaluateFailure(input, current));
  }

  /**
   * Rejects fast when an unexpired block covers `attemptType`, writing a
   * `blocked` attempt linked to it. Returns undefined when the caller may proceed.
   */
  async checkGate(
    phoneNumber: string,
    attemptType: AttemptType,
    context: ClientContext
  ): Promise<BlockInfo | undefined> {
    const current = now();
    const block = await this.findActiveBlock(
      this.store,
      phoneNumber,
      coveringTypes(attemptType),
      current
    );
    if (!block) {
      return undefined;
    }
    await this.ledger.record(
      {
        phoneNumber,
        attemptType,
        result: 'blocked',
        context,
        failureReason: `blocked until ${toIso(block.blockedUntil)}`,
        relatedBlockId: block.id
      },
      current
    );
    return this.toBlockInfo(block, current);
  }

  async getBlockStatus(
    phoneNumber: string,
    attemptType?: AttemptType
  ): Promise<BlockInfo | undefined> {
    const current = now();
    const block = await this.findActiveBlock(
      this.store,
      phoneNumber,
      attemptType ? coveringTypes(attemptType) : undefined,
      current
    );
    return block ? this.toBlockInfo(block, current) : undefined;
  }

  async manuallyUnblock(phoneNumber: string, operator: Operator, reason?: string): Promise<number> {
    return this.store.withLock(`phone:${phoneNumber}`, async (tx) => {
      const current = now();
      const active = await tx.listBlocks({ phoneNumber, isActive: true });
      let count = 0;
      for (const block of active) {
        if (current >= block.blockedUntil) {
          await this.expire(tx, block);
          continue;
        }
        await tx.updateBlock(this.liftedBy(block, operator, current, reason));
        count += 1;
        this.logger.info(
          { phoneNumber, blockId: block.id, operator: operator.id },
          'block manually lifted'
        );
      }
      return count;
    });
  }

  async deactivateBlock(blockId: string, operator: Operator, reason?: string): Promise<Block> {
    const found = await this.store.getBlock(blockId);
    if (!found) {
      throw notFound('Security block not found');
    }
    return this.store.withLock(`phone:${found.phoneNumber}`, async (tx) => {
      const current = now();
      const block = await tx.getBlock(blockId);
      if (!block) {
        throw notFound('Security block not found');
      }
      if (block.isActive && current >= block.blockedUntil) {
        await this.expire(tx, block);
      }
      if (!block.isActive || current >= block.blockedUntil) {
        throw new AppError(400, 40010, 'This block is already inactive');
      }
      const lifted = this.liftedBy(block, operator, current, reason);
      await tx.updateBlock(lifted);
      this.logger.info(
        { phoneNumber: block.phoneNumber, blockId, operator: operator.id },
        'block deactivated by operator'
      );
      return lifted;
    });
  }

  async getBlock(blockId: string): Promise<Block> {
    const block = await this.store.getBlock(blockId);
    if (!block) {
      throw notFound('Security block not found');
    }
    return block;
  }

  async listBlocks(
    filter: Omit<BlockFilter, 'limit' | 'offset'>,
    page: number,
    pageSize: number
  ): Promise<Page<Block>> {
    const [items, total] = await Promise.all([
      this.store.listBlocks({ ...filter, limit: pageSize, offset: (page - 1) * pageSize }),
      this.store.countBlocks(filter)
    ]);
    return { items, total, page, pageSize };
  }

  async phoneHistory(phoneNumber: string): Promise<PhoneHistory> {
    const currentStatus = await this.getBlockStatus(phoneNumber);
    const [blocks, recentAttempts, failedAttempts, successfulAttempts] = await Promise.all([
      this.store.listBlocks({ phoneNumber }),
      this.ledger.recent(phoneNumber, undefined, HISTORY_ATTEMPT_LIMIT),
      this.ledger.countByResult(phoneNumber, 'failed'),
      this.ledger.countByResult(phoneNumber, 'success')
    ]);
    return {
      phoneNumber,
      currentStatus,
      statistics: {
        totalBlocks: blocks.length,
        activeBlocks: blocks.filter((block) => block.isActive).length,
        failedAttempts,
        successfulAttempts
      },
      blocks,
      recentAttempts
    };
  }

  toBlockInfo(block: Block, current: number = now()): BlockInfo {
    const seconds = remainingSeconds(block, current);
    return {
      blockId: block.id,
      blockType: block.blockType,
      blockedUntil: block.blockedUntil,
      remainingSeconds: seconds,
      remainingFormatted: formatRemaining(seconds, 'ar'),
      blockLevel: block.blockLevel,
      consecutiveBlocks: block.consecutiveBlocks,
      messageAr: blockMessage(block, seconds, 'ar'),
      messageEn: blockMessage(block, seconds, 'en')
    };
  }

  private evaluateFailure(input: AttemptInput, current: number): Promise<Decision> {
    const { phoneNumber, attemptType } = input;
    return this.store.withLock<Decision>(`phone:${phoneNumber}`, async (tx) => {
      // A concurrent failure may have crossed the threshold while we waited.
      const existing = await this.findActiveBlock(
        tx,
        phoneNumber,
        coveringTypes(attemptType),
        current
      );
      if (existing) {
        return { kind: 'blocked', reason: 'blocked', block: this.toBlockInfo(existing, current) };
      }

      const since = await this.windowStart(tx, phoneNumber, current);
      const failures = await this.ledger.failuresSince(phoneNumber, attemptType, since, tx);
      const threshold = this.config.maxFailedAttempts;
      this.logger.debug(
        {
          phoneNumber,
          attemptType,
          failures: failures.length,
          windowMinutes: this.config.attemptWindowMinutes
        },
        'failed attempts in window'
      );

      if (failures.length < threshold) {
        return { kind: 'allowed_with_warning', remainingAttempts: threshold - failures.length };
      }

      const evidence = failures.slice(0, threshold);
      const block = await this.createBlock(tx, phoneNumber, attemptType, evidence, current);
      return {
        kind: 'blocked',
        reason: 'threshold_exceeded',
        block: this.toBlockInfo(block, current)
      };
    });
  }

  // A manual unblock moves the counting horizon forward past pre-unblock history.
  private async windowStart(tx: DataStore, phoneNumber: string, current: number): Promise<number> {
    const windowStart = current - this.config.attemptWindowMinutes * MINUTE_MS;
    const lastUnblock = await tx.latestManualUnblock(phoneNumber);
    if (lastUnblock?.unblockedAt === undefined) {
      return windowStart;
    }
    return Math.max(windowStart, lastUnblock.unblockedAt);
  }

  private async createBlock(
    tx: DataStore,
    phoneNumber: string,
    attemptType: AttemptType,
    evidence: AttemptRecord[],
    current: number
  ): Promise<Block> {
    const [previous] = await tx.listBlocks({
      phoneNumber,
      blockTypes: [attemptType],
      blockedSince: current - this.config.resetAfterHours * HOUR_MS,
      limit: 1
    });

    let blockLevel = 1;
    let consecutiveBlocks = 1;
    if (previous && !previous.manuallyUnblocked) {
      blockLevel = previous.blockLevel + 1;
      consecutiveBlocks = previous.consecutiveBlocks + 1;
    } else if (previous) {
      this.logger.info({ phoneNumber }, 'escalation reset after manual unblock');
    }

    const durations = this.config.blockDurationsMinutes;
    const durationMinutes = durations[Math.min(blockLevel - 1, durations.length - 1)] ?? 15;

    const block: Block = {
      id: randomToken('blk'),
      phoneNumber,
      blockType: attemptType,
      blockedAt: current,
      blockedUntil: current + durationMinutes * MINUTE_MS,
      blockLevel,
      consecutiveBlocks,
      isActive: true,
      manuallyUnblocked: false,
      failedAttempts: evidence.map((attempt) => ({
        timestamp: attempt.attemptedAt,
        ipAddress: attempt.ipAddress,
        deviceId: attempt.deviceId,
        failureReason: attempt.failureReason
      })),
      ipAddresses: uniqueValues(evidence.map((attempt) => attempt.ipAddress)),
      userAgents: uniqueValues(
        evidence.map((attempt) => attempt.userAgent?.slice(0, USER_AGENT_SNAPSHOT_LENGTH))
      ),
      deviceIds: uniqueValues(evidence.map((attempt) => attempt.deviceId))
    };
    await tx.insertBlock(block);

    this.logger.warn(
      {
        phoneNumber,
        attemptType,
        blockLevel,
        durationMinutes,
        blockedUntil: toIso(block.blockedUntil)
      },
      'phone number blocked'
    );
    return block;
  }

  /** Newest covering block that is still in force; expired ones are deactivated on the way. */
  private async findActiveBlock(
    via: DataStore,
    phoneNumber: string,
    blockTypes: BlockType[] | undefined,
    current: number
  ): Promise<Block | undefined> {
    const candidates = await via.listBlocks({ phoneNumber, blockTypes, isActive: true });
    let found: Block | undefined;
    for (const block of candidates) {
      if (current >= block.blockedUntil) {
        await this.expire(via, block);
        continue;
      }
      found ??= block;
    }
    return found;
  }

  private async expire(via: DataStore, block: Block): Promise<void> {
    block.isActive = false;
    await via.updateBlock(block);
    this.logger.info(
      { phoneNumber: block.phoneNumber, blockId: block.id },
      'expired block deactivated'
    );
  }

  private liftedBy(block: Block, operator: Operator, current: number, reason?: string): Block {
    return {
      ...block,
      isActive: false,
      manuallyUnblocked: true,
      unblockedBy: operator.id,
      unblockedAt: current,
      unblockReason: reason?.trim() || 'Manually unblocked by an administrator'
    };
  }
}
