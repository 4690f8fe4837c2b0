import { Pool, type PoolClient, type QueryResult } from 'pg';
import { CapacityRaceError } from './errors';
import type {
  AttemptRecord,
  AttemptResult,
  AttemptType,
  Block,
  BlockType,
  DeviceSession,
  FailedAttemptSnapshot,
  PasswordResetCode,
  User
} from './types';

export type StoreKind = 'memory' | 'postgres';

export interface AttemptFilter {
  phoneNumber?: string;
  phoneContains?: string;
  attemptType?: AttemptType;
  result?: AttemptResult;
  /** Inclusive lower bound on `attemptedAt`. */
  since?: number;
  /** Inclusive upper bound on `attemptedAt`. */
  until?: number;
  limit?: number;
  offset?: number;
}

export interface BlockFilter {
  phoneNumber?: string;
  phoneContains?: string;
  blockTypes?: BlockType[];
  isActive?: boolean;
  manuallyUnblocked?: boolean;
  blockedSince?: number;
  limit?: number;
  offset?: number;
}

export interface DataStore {
  init(): Promise<void>;
  close(): Promise<void>;

  /**
   * Runs `task` while holding an exclusive lock on `key`. Writes made through
   * the store handed to `task` commit or roll back together.
   */
  withLock<T>(key: string, task: (tx: DataStore) => Promise<T>): Promise<T>;

  getUserByPhone(phoneNumber: string): Promise<User | undefined>;
  getUserById(userId: string): Promise<User | undefined>;
  createUser(user: User): Promise<void>;
  updateUser(user: User): Promise<void>;

  getResetCode(phoneNumber: string): Promise<PasswordResetCode | undefined>;
  upsertResetCode(record: PasswordResetCode): Promise<void>;
  deleteResetCode(phoneNumber: string): Promise<void>;

  addAttempt(attempt: AttemptRecord): Promise<void>;
  /** Newest first. */
  listAttempts(filter: AttemptFilter): Promise<AttemptRecord[]>;
  countAttempts(filter: AttemptFilter): Promise<number>;
  deleteAttemptsBefore(cutoff: number): Promise<number>;

  insertBlock(block: Block): Promise<void>;
  updateBlock(block: Block): Promise<void>;
  getBlock(blockId: string): Promise<Block | undefined>;
  /** Newest `blockedAt` first. */
  listBlocks(filter: BlockFilter): Promise<Block[]>;
  countBlocks(filter: BlockFilter): Promise<number>;
  latestManualUnblock(phoneNumber: string): Promise<Block | undefined>;
  deactivateExpiredBlocks(current: number): Promise<number>;
  deleteInactiveBlocksBefore(cutoff: number): Promise<number>;

  insertDeviceSession(session: DeviceSession): Promise<void>;
  updateDeviceSession(session: DeviceSession): Promise<void>;
  getDeviceSession(sessionId: string): Promise<DeviceSession | undefined>;
  getDeviceSessionByToken(sessionToken: string): Promise<DeviceSession | undefined>;
  /** Bumps `lastUsedAt` on an active session only; never reactivates one. */
  touchDeviceSession(sessionToken: string, usedAt: number): Promise<boolean>;
  /** Most recently used first. */
  listDeviceSessions(userId: string, options?: { activeOnly?: boolean }): Promise<DeviceSession[]>;
}

class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return result;
  }
}

function matchesAttempt(item: AttemptRecord, filter: AttemptFilter): boolean {
  if (filter.phoneNumber && item.phoneNumber !== filter.phoneNumber) {
    return false;
  }
  if (filter.phoneContains && !item.phoneNumber.includes(filter.phoneContains)) {
    return false;
  }
  if (filter.attemptType && item.attemptType !== filter.attemptType) {
    return false;
  }
  if (filter.result && item.result !== filter.result) {
    return false;
  }
  if (filter.since !== undefined && item.attemptedAt < filter.since) {
    return false;
  }
  if (filter.until !== undefined && item.attemptedAt > filter.until) {
    return false;
  }
  return true;
}

function matchesBlock(item: Block, filter: BlockFilter): boolean {
  if (filter.phoneNumber && item.phoneNumber !== filter.phoneNumber) {
    return false;
  }
  if (filter.phoneContains && !item.phoneNumber.includes(filter.phoneContains)) {
    return false;
  }
  if (filter.blockTypes && !filter.blockTypes.includes(item.blockType)) {
    return false;
  }
  if (typeof filter.isActive === 'boolean' && item.isActive !== filter.isActive) {
    return false;
  }
  if (
    typeof filter.manuallyUnblocked === 'boolean' &&
    item.manuallyUnblocked !== filter.manuallyUnblocked
  ) {
    return false;
  }
  if (filter.blockedSince !== undefined && item.blockedAt < filter.blockedSince) {
    return false;
  }
  return true;
}

function paginate<T>(items: T[], limit?: number, offset?: number): T[] {
  const start = offset ?? 0;
  return limit === undefined ? items.slice(start) : items.slice(start, start + limit);
}

export class InMemoryStore implements DataStore {
  usersById = new Map<string, User>();
  userIdByPhone = new Map<string, string>();
  resetCodes = new Map<string, PasswordResetCode>();
  attempts: AttemptRecord[] = [];
  blocks: Block[] = [];
  deviceSessions = new Map<string, DeviceSession>();

  private readonly mutex = new KeyedMutex();

  async init(): Promise<void> {}

  async close(): Promise<void> {}

  withLock<T>(key: string, task: (tx: DataStore) => Promise<T>): Promise<T> {
    return this.mutex.run(key, () => task(this));
  }

  async getUserByPhone(phoneNumber: string): Promise<User | undefined> {
    const userId = this.userIdByPhone.get(phoneNumber);
    return userId ? this.getUserById(userId) : undefined;
  }

  async getUserById(userId: string): Promise<User | undefined> {
    const user = this.usersById.get(userId);
    return user ? structuredClone(user) : undefined;
  }

  async createUser(user: User): Promise<void> {
    if (this.userIdByPhone.has(user.phoneNumber)) {
      throw new CapacityRaceError(`user:${user.phoneNumber}`);
    }
    this.usersById.set(user.id, structuredClone(user));
    this.userIdByPhone.set(user.phoneNumber, user.id);
  }

  async updateUser(user: User): Promise<void> {
    if (!this.usersById.has(user.id)) {
      return;
    }
    this.usersById.set(user.id, structuredClone(user));
  }

  async getResetCode(phoneNumber: string): Promise<PasswordResetCode | undefined> {
    const record = this.resetCodes.get(phoneNumber);
    return record ? structuredClone(record) : undefined;
  }

  async upsertResetCode(record: PasswordResetCode): Promise<void> {
    this.resetCodes.set(record.phoneNumber, structuredClone(record));
  }

  async deleteResetCode(phoneNumber: string): Promise<void> {
    this.resetCodes.delete(phoneNumber);
  }

  async addAttempt(attempt: AttemptRecord): Promise<void> {
    this.attempts.push(structuredClone(attempt));
  }

  async listAttempts(filter: AttemptFilter): Promise<AttemptRecord[]> {
    const matched = this.newestAttemptsFirst().filter((item) => matchesAttempt(item, filter));
    return paginate(matched, filter.limit, filter.offset).map((item) => structuredClone(item));
  }

  async countAttempts(filter: AttemptFilter): Promise<number> {
    return this.attempts.filter((item) => matchesAttempt(item, filter)).length;
  }

  async deleteAttemptsBefore(cutoff: number): Promise<number> {
    const before = this.attempts.length;
    this.attempts = this.attempts.filter((item) => item.attemptedAt >= cutoff);
    return before - this.attempts.length;
  }

  async insertBlock(block: Block): Promise<void> {
    if (block.isActive) {
      const clash = this.blocks.some(
        (item) =>
          item.isActive &&
          item.phoneNumber === block.phoneNumber &&
          item.blockType === block.blockType
      );
      if (clash) {
        throw new CapacityRaceError(`block:${block.phoneNumber}:${block.blockType}`);
      }
    }
    this.blocks.push(structuredClone(block));
  }

  async updateBlock(block: Block): Promise<void> {
    const index = this.blocks.findIndex((item) => item.id === block.id);
    if (index === -1) {
      return;
    }
    this.blocks[index] = structuredClone(block);
  }

  async getBlock(blockId: string): Promise<Block | undefined> {
    const found = this.blocks.find((item) => item.id === blockId);
    return found ? structuredClone(found) : undefined;
  }

  async listBlocks(filter: BlockFilter): Promise<Block[]> {
    const matched = this.newestBlocksFirst().filter((item) => matchesBlock(item, filter));
    return paginate(matched, filter.limit, filter.offset).map((item) => structuredClone(item));
  }

  async countBlocks(filter: BlockFilter): Promise<number> {
    return this.blocks.filter((item) => matchesBlock(item, filter)).length;
  }

  async latestManualUnblock(phoneNumber: string): Promise<Block | undefined> {
    let latest: Block | undefined;
    for (const block of this.blocks) {
      if (
        block.phoneNumber !== phoneNumber ||
        !block.manuallyUnblocked ||
        block.unblockedAt === undefined
      ) {
        continue;
      }
      if (!latest || (latest.unblockedAt ?? 0) <= block.unblockedAt) {
        latest = block;
      }
    }
    return latest ? structuredClone(latest) : undefined;
  }

  async deactivateExpiredBlocks(current: number): Promise<number> {
    let count = 0;
    this.blocks.forEach((block) => {
      if (block.isActive && block.blockedUntil <= current) {
        block.isActive = false;
        count += 1;
      }
    });
    return count;
  }

  async deleteInactiveBlocksBefore(cutoff: number): Promise<number> {
    const removed = new Set(
      this.blocks
        .filter((item) => !item.isActive && item.blockedAt < cutoff)
        .map((item) => item.id)
    );
    this.blocks = this.blocks.filter((item) => !removed.has(item.id));
    this.attempts.forEach((attempt) => {
      if (attempt.relatedBlockId && removed.has(attempt.relatedBlockId)) {
        attempt.relatedBlockId = undefined;
      }
    });
    return removed.size;
  }

  async insertDeviceSession(session: DeviceSession): Promise<void> {
    for (const existing of this.deviceSessions.values()) {
      if (existing.sessionToken === session.sessionToken) {
        throw new CapacityRaceError(`session:${session.userId}`);
      }
    }
    this.deviceSessions.set(session.id, structuredClone(session));
  }

  async updateDeviceSession(session: DeviceSession): Promise<void> {
    if (!this.deviceSessions.has(session.id)) {
      return;
    }
    this.deviceSessions.set(session.id, structuredClone(session));
  }

  async getDeviceSession(sessionId: string): Promise<DeviceSession | undefined> {
    const session = this.deviceSessions.get(sessionId);
    return session ? structuredClone(session) : undefined;
  }

  async getDeviceSessionByToken(sessionToken: string): Promise<DeviceSession | undefined> {
    for (const session of this.deviceSessions.values()) {
      if (session.sessionToken === sessionToken) {
        return structuredClone(session);
      }
    }
    return undefined;
  }

  async touchDeviceSession(sessionToken: string, usedAt: number): Promise<boolean> {
    for (const session of this.deviceSessions.values()) {
      if (session.sessionToken === sessionToken && session.isActive) {
        session.lastUsedAt = Math.max(session.lastUsedAt, usedAt);
        return true;
      }
    }
    return false;
  }

  async listDeviceSessions(
    userId: string,
    options: { activeOnly?: boolean } = {}
  ): Promise<DeviceSession[]> {
    return [...this.deviceSessions.values()]
      .filter((item) => item.userId === userId && (!options.activeOnly || item.isActive))
      .sort((a, b) => b.lastUsedAt - a.lastUsedAt)
      .map((item) => structuredClone(item));
  }

  // Ties on the timestamp fall back to insertion order, newest first.
  private newestAttemptsFirst(): AttemptRecord[] {
    return this.attempts
      .map((item, index) => ({ item, index }))
      .sort((a, b) => b.item.attemptedAt - a.item.attemptedAt || b.index - a.index)
      .map(({ item }) => item);
  }

  private newestBlocksFirst(): Block[] {
    return this.blocks
      .map((item, index) => ({ item, index }))
      .sort((a, b) => b.item.blockedAt - a.item.blockedAt || b.index - a.index)
      .map(({ item }) => item);
  }
}

function parseJsonArray<T>(value: unknown): T[] {
  if (Array.isArray(value)) {
    return value as T[];
  }
  if (typeof value === 'string') {
    try {
      const parsed = JSON.parse(value);
      return Array.isArray(parsed) ? (parsed as T[]) : [];
    } catch {
      return [];
    }
  }
  return [];
}

function optionalNumber(value: unknown): number | undefined {
  return value === null || value === undefined ? undefined : Number(value);
}

function optionalText(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

// Lock timeouts and unique violations both mean another writer got there first.
function translatePgError(err: unknown, key: string): unknown {
  if (err instanceof Error && 'code' in err && (err.code === '55P03' || err.code === '23505')) {
    return new CapacityRaceError(key, err);
  }
  return err;
}

interface SqlWhere {
  clause: string;
  values: Array<string | number | boolean | string[]>;
}

function attemptWhere(filter: AttemptFilter): SqlWhere {
  const where: string[] = [];
  const values: SqlWhere['values'] = [];
  if (filter.phoneNumber) {
    values.push(filter.phoneNumber);
    where.push(`phone_number = $${values.length}`);
  }
  if (filter.phoneContains) {
    values.push(`%${filter.phoneContains}%`);
    where.push(`phone_number LIKE $${values.length}`);
  }
  if (filter.attemptType) {
    values.push(filter.attemptType);
    where.push(`attempt_type = $${values.length}`);
  }
  if (filter.result) {
    values.push(filter.result);
    where.push(`result = $${values.length}`);
  }
  if (filter.since !== undefined) {
    values.push(filter.since);
    where.push(`attempted_at >= $${values.length}`);
  }
  if (filter.until !== undefined) {
    values.push(filter.until);
    where.push(`attempted_at <= $${values.length}`);
  }
  return { clause: where.length > 0 ? `WHERE ${where.join(' AND ')}` : '', values };
}

function blockWhere(filter: BlockFilter): SqlWhere {
  const where: string[] = [];
  const values: SqlWhere['values'] = [];
  if (filter.phoneNumber) {
    values.push(filter.phoneNumber);
    where.push(`phone_number = $${values.length}`);
  }
  if (filter.phoneContains) {
    values.push(`%${filter.phoneContains}%`);
    where.push(`phone_number LIKE $${values.length}`);
  }
  if (filter.blockTypes) {
    values.push(filter.blockTypes);
    where.push(`block_type = ANY($${values.length})`);
  }
  if (typeof filter.isActive === 'boolean') {
    values.push(filter.isActive);
    where.push(`is_active = $${values.length}`);
  }
  if (typeof filter.manuallyUnblocked === 'boolean') {
    values.push(filter.manuallyUnblocked);
    where.push(`manually_unblocked = $${values.length}`);
  }
  if (filter.blockedSince !== undefined) {
    values.push(filter.blockedSince);
    where.push(`blocked_at >= $${values.length}`);
  }
  return { clause: where.length > 0 ? `WHERE ${where.join(' AND ')}` : '', values };
}

function pageSql(values: SqlWhere['values'], limit?: number, offset?: number): string {
  let sql = '';
  if (limit !== undefined) {
    values.push(limit);
    sql += ` LIMIT $${values.length}`;
  }
  if (offset !== undefined) {
    values.push(offset);
    sql += ` OFFSET $${values.length}`;
  }
  return sql;
}

export interface TransactionClient {
  query(text: string): Promise<unknown>;
  release(err?: Error): void;
}

/**
 * Rolls back and hands the client back to the pool. A client whose rollback
 * fails is released with the error so the pool destroys it.
 */
export async function abortTransaction(client: TransactionClient): Promise<void> {
  try {
    await client.query('ROLLBACK');
  } catch (err) {
    client.release(err instanceof Error ? err : new Error(String(err)));
    return;
  }
  client.release();
}

export class PostgresStore implements DataStore {
  private readonly client?: PoolClient;
  private readonly lockTimeoutMs: number;

  constructor(
    private readonly pool: Pool,
    options: { client?: PoolClient; lockTimeoutMs?: number } = {}
  ) {
    this.client = options.client;
    this.lockTimeoutMs = options.lockTimeoutMs ?? 2000;
  }

  async init(): Promise<void> {
    await this.query(`
      CREATE TABLE IF NOT EXISTS users (
        id TEXT PRIMARY KEY,
        phone_number TEXT UNIQUE NOT NULL,
        name TEXT NOT NULL,
        password_hash TEXT NOT NULL,
        role TEXT NOT NULL,
        max_allowed_devices INT NOT NULL,
        created_at BIGINT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS password_reset_codes (
        phone_number TEXT PRIMARY KEY,
        code_hash TEXT NOT NULL,
        expires_at BIGINT NOT NULL,
        created_at BIGINT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS blocks (
        seq BIGSERIAL,
        id TEXT PRIMARY KEY,
        phone_number TEXT NOT NULL,
        block_type TEXT NOT NULL,
        blocked_at BIGINT NOT NULL,
        blocked_until BIGINT NOT NULL,
        block_level INT NOT NULL CHECK (block_level >= 1),
        consecutive_blocks INT NOT NULL,
        is_active BOOLEAN NOT NULL,
        manually_unblocked BOOLEAN NOT NULL DEFAULT FALSE,
        unblocked_by TEXT,
        unblocked_at BIGINT,
        unblock_reason TEXT,
        failed_attempts JSONB NOT NULL,
        ip_addresses JSONB NOT NULL,
        user_agents JSONB NOT NULL,
        device_ids JSONB NOT NULL,
        CHECK (blocked_until > blocked_at)
      );
      CREATE UNIQUE INDEX IF NOT EXISTS uq_blocks_one_active
        ON blocks(phone_number, block_type) WHERE is_active;
      CREATE INDEX IF NOT EXISTS idx_blocks_phone_active ON blocks(phone_number, is_active);
      CREATE INDEX IF NOT EXISTS idx_blocks_blocked_at ON blocks(blocked_at);

      CREATE TABLE IF NOT EXISTS attempt_records (
        seq BIGSERIAL,
        id TEXT PRIMARY KEY,
        phone_number TEXT NOT NULL,
        attempt_type TEXT NOT NULL,
        result TEXT NOT NULL,
        attempted_at BIGINT NOT NULL,
        ip_address TEXT NOT NULL,
        user_agent TEXT,
        device_id TEXT,
        failure_reason TEXT,
        related_block_id TEXT REFERENCES blocks(id) ON DELETE SET NULL
      );
      CREATE INDEX IF NOT EXISTS idx_attempts_window
        ON attempt_records(phone_number, attempt_type, result, attempted_at);
      CREATE INDEX IF NOT EXISTS idx_attempts_attempted_at ON attempt_records(attempted_at);

      CREATE TABLE IF NOT EXISTS device_sessions (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        session_token TEXT UNIQUE NOT NULL,
        device_id TEXT,
        device_name TEXT NOT NULL,
        ip_address TEXT NOT NULL,
        user_agent TEXT,
        logged_in_at BIGINT NOT NULL,
        last_used_at BIGINT NOT NULL,
        is_active BOOLEAN NOT NULL,
        deactivated_at BIGINT,
        deactivation_reason TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_device_sessions_user ON device_sessions(user_id, is_active);
    `);
  }

  async close(): Promise<void> {
    if (this.client) {
      return;
    }
    await this.pool.end();
  }

  async withLock<T>(key: string, task: (tx: DataStore) => Promise<T>): Promise<T> {
    if (this.client) {
      await this.query('SELECT pg_advisory_xact_lock(hashtext($1))', [key]);
      return task(this);
    }
    const client = await this.pool.connect();
    let result: T;
    try {
      await client.query('BEGIN');
      await client.query("SELECT set_config('lock_timeout', $1, true)", [
        `${this.lockTimeoutMs}ms`
      ]);
      await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [key]);
      result = await task(
        new PostgresStore(this.pool, { client, lockTimeoutMs: this.lockTimeoutMs })
      );
      await client.query('COMMIT');
    } catch (err) {
      await abortTransaction(client);
      throw translatePgError(err, key);
    }
    client.release();
    return result;
  }

  async getUserByPhone(phoneNumber: string): Promise<User | undefined> {
    const { rows } = await this.query('SELECT * FROM users WHERE phone_number = $1', [phoneNumber]);
    return rows[0] ? this.toUser(rows[0]) : undefined;
  }

  async getUserById(userId: string): Promise<User | undefined> {
    const { rows } = await this.query('SELECT * FROM users WHERE id = $1', [userId]);
    return rows[0] ? this.toUser(rows[0]) : undefined;
  }

  async createUser(user: User): Promise<void> {
    await this.query(
      `INSERT INTO users(id, phone_number, name, password_hash, role, max_allowed_devices, created_at)
       VALUES ($1,$2,$3,$4,$5,$6,$7)`,
      [
        user.id,
        user.phoneNumber,
        user.name,
        user.passwordHash,
        user.role,
        user.maxAllowedDevices,
        user.createdAt
      ]
    );
  }

  async updateUser(user: User): Promise<void> {
    await this.query(
      `UPDATE users
       SET name = $2, password_hash = $3, role = $4, max_allowed_devices = $5
       WHERE id = $1`,
      [user.id, user.name, user.passwordHash, user.role, user.maxAllowedDevices]
    );
  }

  async getResetCode(phoneNumber: string): Promise<PasswordResetCode | undefined> {
    const { rows } = await this.query(
      'SELECT * FROM password_reset_codes WHERE phone_number = $1',
      [phoneNumber]
    );
    const row = rows[0];
    if (!row) {
      return undefined;
    }
    return {
      phoneNumber: row.phone_number,
      codeHash: row.code_hash,
      expiresAt: Number(row.expires_at),
      createdAt: Number(row.created_at)
    };
  }

  async upsertResetCode(record: PasswordResetCode): Promise<void> {
    await this.query(
      `INSERT INTO password_reset_codes(phone_number, code_hash, expires_at, created_at)
       VALUES ($1,$2,$3,$4)
       ON CONFLICT (phone_number)
       DO UPDATE SET code_hash = EXCLUDED.code_hash,
                     expires_at = EXCLUDED.expires_at,
                     created_at = EXCLUDED.created_at`,
      [record.phoneNumber, record.codeHash, record.expiresAt, record.createdAt]
    );
  }

  async deleteResetCode(phoneNumber: string): Promise<void> {
    await this.query('DELETE FROM password_reset_codes WHERE phone_number = $1', [phoneNumber]);
  }

  async addAttempt(attempt: AttemptRecord): Promise<void> {
    await this.query(
      `INSERT INTO attempt_records(id, phone_number, attempt_type, result, attempted_at, ip_address,
                                   user_agent, device_id, failure_reason, related_block_id)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10)`,
      [
        attempt.id,
        attempt.phoneNumber,
        attempt.attemptType,
        attempt.result,
        attempt.attemptedAt,
        attempt.ipAddress,
        attempt.userAgent ?? null,
        attempt.deviceId ?? null,
        attempt.failureReason ?? null,
        attempt.relatedBlockId ?? null
      ]
    );
  }

  async listAttempts(filter: AttemptFilter): Promise<AttemptRecord[]> {
    const { clause, values } = attemptWhere(filter);
    const page = pageSql(values, filter.limit, filter.offset);
    const { rows } = await this.query(
      `SELECT * FROM attempt_records ${clause} ORDER BY attempted_at DESC, seq DESC${page}`,
      values
    );
    return rows.map((row) => this.toAttempt(row));
  }

  async countAttempts(filter: AttemptFilter): Promise<number> {
    const { clause, values } = attemptWhere(filter);
    const { rows } = await this.query(
      `SELECT COUNT(*)::int AS total FROM attempt_records ${clause}`,
      values
    );
    return Number(rows[0]?.total ?? 0);
  }

  async deleteAttemptsBefore(cutoff: number): Promise<number> {
    const result = await this.query('DELETE FROM attempt_records WHERE attempted_at < $1', [
      cutoff
    ]);
    return result.rowCount ?? 0;
  }

  async insertBlock(block: Block): Promise<void> {
    await this.query(
      `INSERT INTO blocks(id, phone_number, block_type, blocked_at, blocked_until, block_level,
                          consecutive_blocks, is_active, manually_unblocked, unblocked_by,
                          unblocked_at, unblock_reason, failed_attempts, ip_addresses,
                          user_agents, device_ids)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13::jsonb,$14::jsonb,$15::jsonb,$16::jsonb)`,
      [
        block.id,
        block.phoneNumber,
        block.blockType,
        block.blockedAt,
        block.blockedUntil,
        block.blockLevel,
        block.consecutiveBlocks,
        block.isActive,
        block.manuallyUnblocked,
        block.unblockedBy ?? null,
        block.unblockedAt ?? null,
        block.unblockReason ?? null,
        JSON.stringify(block.failedAttempts),
        JSON.stringify(block.ipAddresses),
        JSON.stringify(block.userAgents),
        JSON.stringify(block.deviceIds)
      ]
    );
  }

  async updateBlock(block: Block): Promise<void> {
    await this.query(
      `UPDATE blocks
       SET is_active = $2, manually_unblocked = $3, unblocked_by = $4,
           unblocked_at = $5, unblock_reason = $6
       WHERE id = $1`,
      [
        block.id,
        block.isActive,
        block.manuallyUnblocked,
        block.unblockedBy ?? null,
        block.unblockedAt ?? null,
        block.unblockReason ?? null
      ]
    );
  }

  async getBlock(blockId: string): Promise<Block | undefined> {
    const { rows } = await this.query('SELECT * FROM blocks WHERE id = $1', [blockId]);
    return rows[0] ? this.toBlock(rows[0]) : undefined;
  }

  async listBlocks(filter: BlockFilter): Promise<Block[]> {
    const { clause, values } = blockWhere(filter);
    const page = pageSql(values, filter.limit, filter.offset);
    const { rows } = await this.query(
      `SELECT * FROM blocks ${clause} ORDER BY blocked_at DESC, seq DESC${page}`,
      values
    );
    return rows.map((row) => this.toBlock(row));
  }

  async countBlocks(filter: BlockFilter): Promise<number> {
    const { clause, values } = blockWhere(filter);
    const { rows } = await this.query(
      `SELECT COUNT(*)::int AS total FROM blocks ${clause}`,
      values
    );
    return Number(rows[0]?.total ?? 0);
  }

  async latestManualUnblock(phoneNumber: string): Promise<Block | undefined> {
    const { rows } = await this.query(
      `SELECT * FROM blocks
       WHERE phone_number = $1 AND manually_unblocked AND unblocked_at IS NOT NULL
       ORDER BY unblocked_at DESC, seq DESC
       LIMIT 1`,
      [phoneNumber]
    );
    return rows[0] ? this.toBlock(rows[0]) : undefined;
  }

  async deactivateExpiredBlocks(current: number): Promise<number> {
    const result = await this.query(
      'UPDATE blocks SET is_active = FALSE WHERE is_active AND blocked_until <= $1',
      [current]
    );
    return result.rowCount ?? 0;
  }

  async deleteInactiveBlocksBefore(cutoff: number): Promise<number> {
    const result = await this.query(
      'DELETE FROM blocks WHERE NOT is_active AND blocked_at < $1',
      [cutoff]
    );
    return result.rowCount ?? 0;
  }

  async insertDeviceSession(session: DeviceSession): Promise<void> {
    await this.query(
      `INSERT INTO device_sessions(id, user_id, session_token, device_id, device_name, ip_address,
                                   user_agent, logged_in_at, last_used_at, is_active,
                                   deactivated_at, deactivation_reason)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12)`,
      [
        session.id,
        session.userId,
        session.sessionToken,
        session.deviceId ?? null,
        session.deviceName,
        session.ipAddress,
        session.userAgent ?? null,
        session.loggedInAt,
        session.lastUsedAt,
        session.isActive,
        session.deactivatedAt ?? null,
        session.deactivationReason ?? null
      ]
    );
  }

  async updateDeviceSession(session: DeviceSession): Promise<void> {
    await this.query(
      `UPDATE device_sessions
       SET device_id = $2, device_name = $3, ip_address = $4, user_agent = $5,
           last_used_at = $6, is_active = $7, deactivated_at = $8, deactivation_reason = $9
       WHERE id = $1`,
      [
        session.id,
        session.deviceId ?? null,
        session.deviceName,
        session.ipAddress,
        session.userAgent ?? null,
        session.lastUsedAt,
        session.isActive,
        session.deactivatedAt ?? null,
        session.deactivationReason ?? null
      ]
    );
  }

  async getDeviceSession(sessionId: string): Promise<DeviceSession | undefined> {
    const { rows } = await this.query('SELECT * FROM device_sessions WHERE id = $1', [sessionId]);
    return rows[0] ? this.toDeviceSession(rows[0]) : undefined;
  }

  async getDeviceSessionByToken(sessionToken: string): Promise<DeviceSession | undefined> {
    const { rows } = await this.query('SELECT * FROM device_sessions WHERE session_token = $1', [
      sessionToken
    ]);
    return rows[0] ? this.toDeviceSession(rows[0]) : undefined;
  }

  async touchDeviceSession(sessionToken: string, usedAt: number): Promise<boolean> {
    const result = await this.query(
      `UPDATE device_sessions
       SET last_used_at = GREATEST(last_used_at, $2)
       WHERE session_token = $1 AND is_active`,
      [sessionToken, usedAt]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async listDeviceSessions(
    userId: string,
    options: { activeOnly?: boolean } = {}
  ): Promise<DeviceSession[]> {
    const { rows } = await this.query(
      `SELECT * FROM device_sessions
       WHERE user_id = $1 AND ($2::boolean IS FALSE OR is_active)
       ORDER BY last_used_at DESC`,
      [userId, options.activeOnly ?? false]
    );
    return rows.map((row) => this.toDeviceSession(row));
  }

  private async query(text: string, values: unknown[] = []): Promise<QueryResult> {
    try {
      if (this.client) {
        return await this.client.query(text, values);
      }
      return await this.pool.query(text, values);
    } catch (err) {
      throw translatePgError(err, 'postgres');
    }
  }

  private toUser(row: Record<string, unknown>): User {
    return {
      id: String(row.id),
      phoneNumber: String(row.phone_number),
      name: String(row.name),
      passwordHash: String(row.password_hash),
      role: parseRole(row.role),
      maxAllowedDevices: Number(row.max_allowed_devices),
      createdAt: Number(row.created_at)
    };
  }

  private toAttempt(row: Record<string, unknown>): AttemptRecord {
    return {
      id: String(row.id),
      phoneNumber: String(row.phone_number),
      attemptType: row.attempt_type === 'password_reset' ? 'password_reset' : 'login',
      result: parseResult(row.result),
      attemptedAt: Number(row.attempted_at),
      ipAddress: String(row.ip_address),
      userAgent: optionalText(row.user_agent),
      deviceId: optionalText(row.device_id),
      failureReason: optionalText(row.failure_reason),
      relatedBlockId: optionalText(row.related_block_id)
    };
  }

  private toBlock(row: Record<string, unknown>): Block {
    return {
      id: String(row.id),
      phoneNumber: String(row.phone_number),
      blockType: parseBlockType(row.block_type),
      blockedAt: Number(row.blocked_at),
      blockedUntil: Number(row.blocked_until),
      blockLevel: Number(row.block_level),
      consecutiveBlocks: Number(row.consecutive_blocks),
      isActive: row.is_active === true,
      manuallyUnblocked: row.manually_unblocked === true,
      unblockedBy: optionalText(row.unblocked_by),
      unblockedAt: optionalNumber(row.unblocked_at),
      unblockReason: optionalText(row.unblock_reason),
      failedAttempts: parseJsonArray<FailedAttemptSnapshot>(row.failed_attempts),
      ipAddresses: parseJsonArray<string>(row.ip_addresses),
      userAgents: parseJsonArray<string>(row.user_agents),
      deviceIds: parseJsonArray<string>(row.device_ids)
    };
  }

  private toDeviceSession(row: Record<string, unknown>): DeviceSession {
    return {
      id: String(row.id),
      userId: String(row.user_id),
      sessionToken: String(row.session_token),
      deviceId: optionalText(row.device_id),
      deviceName: String(row.device_name),
      ipAddress: String(row.ip_address),
      userAgent: optionalText(row.user_agent),
      loggedInAt: Number(row.logged_in_at),
      lastUsedAt: Number(row.last_used_at),
      isActive: row.is_active === true,
      deactivatedAt: optionalNumber(row.deactivated_at),
      deactivationReason: parseDeactivationReason(row.deactivation_reason)
    };
  }
}

function parseRole(value: unknown): User['role'] {
  if (value === 'student' || value === 'teacher' || value === 'parent' || value === 'admin') {
    return value;
  }
  return 'student';
}

function parseResult(value: unknown): AttemptResult {
  if (value === 'success' || value === 'blocked') {
    return value;
  }
  return 'failed';
}

function parseBlockType(value: unknown): BlockType {
  if (value === 'password_reset' || value === 'combined') {
    return value;
  }
  return 'login';
}

function parseDeactivationReason(value: unknown): DeviceSession['deactivationReason'] {
  if (value === 'evicted' || value === 'revoked' || value === 'cap_lowered') {
    return value;
  }
  return undefined;
}

export function createStore(params: {
  kind: StoreKind;
  databaseUrl?: string;
  lockTimeoutMs?: number;
}): DataStore {
  if (params.kind === 'memory') {
    return new InMemoryStore();
  }
  if (!params.databaseUrl) {
    throw new Error('DATABASE_URL is required when using postgres store');
  }
  return new PostgresStore(new Pool({ connectionString: params.databaseUrl }), {
    lockTimeoutMs: params.lockTimeoutMs
  });
}
