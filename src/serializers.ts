import type { PhoneHistory } from './services/blockEngine';
import type { SecurityStatistics } from './services/attemptLedger';
import type { AttemptRecord, Block, BlockInfo, DeviceSession, Page, User } from './types';
import { optionalIso, toIso } from './utils';

export function serializeUser(user: User) {
  return {
    id: user.id,
    phone_number: user.phoneNumber,
    name: user.name,
    role: user.role,
    max_allowed_devices: user.maxAllowedDevices,
    created_at: toIso(user.createdAt)
  };
}

export function serializeSession(session: DeviceSession, currentToken?: string) {
  return {
    id: session.id,
    device_id: session.deviceId ?? null,
    device_name: session.deviceName,
    ip_address: session.ipAddress,
    user_agent: session.userAgent ?? null,
    logged_in_at: toIso(session.loggedInAt),
    last_used_at: toIso(session.lastUsedAt),
    is_active: session.isActive,
    is_current: currentToken !== undefined && session.sessionToken === currentToken,
    deactivated_at: optionalIso(session.deactivatedAt),
    deactivation_reason: session.deactivationReason ?? null
  };
}

export function serializeBlockInfo(info: BlockInfo) {
  return {
    block_id: info.blockId,
    block_type: info.blockType,
    blocked_until: toIso(info.blockedUntil),
    remaining_seconds: info.remainingSeconds,
    remaining_formatted: info.remainingFormatted,
    block_level: info.blockLevel,
    consecutive_blocks: info.consecutiveBlocks,
    message_ar: info.messageAr,
    message_en: info.messageEn
  };
}

export function serializeBlock(block: Block) {
  return {
    id: block.id,
    phone_number: block.phoneNumber,
    block_type: block.blockType,
    blocked_at: toIso(block.blockedAt),
    blocked_until: toIso(block.blockedUntil),
    block_level: block.blockLevel,
    consecutive_blocks: block.consecutiveBlocks,
    is_active: block.isActive,
    manually_unblocked: block.manuallyUnblocked,
    unblocked_by: block.unblockedBy ?? null,
    unblocked_at: optionalIso(block.unblockedAt),
    unblock_reason: block.unblockReason ?? null,
    failed_attempts: block.failedAttempts.map((attempt) => ({
      timestamp: toIso(attempt.timestamp),
      ip_address: attempt.ipAddress,
      device_id: attempt.deviceId ?? null,
      failure_reason: attempt.failureReason ?? null
    })),
    ip_addresses: block.ipAddresses,
    user_agents: block.userAgents,
    device_ids: block.deviceIds
  };
}

export function serializeAttempt(attempt: AttemptRecord) {
  return {
    id: attempt.id,
    phone_number: attempt.phoneNumber,
    attempt_type: attempt.attemptType,
    result: attempt.result,
    attempted_at: toIso(attempt.attemptedAt),
    ip_address: attempt.ipAddress,
    user_agent: attempt.userAgent ?? null,
    device_id: attempt.deviceId ?? null,
    failure_reason: attempt.failureReason ?? null,
    related_block_id: attempt.relatedBlockId ?? null
  };
}

export function serializePage<T, R>(page: Page<T>, map: (item: T) => R) {
  return {
    items: page.items.map(map),
    total: page.total,
    page: page.page,
    page_size: page.pageSize
  };
}

export function serializeStatistics(stats: SecurityStatistics) {
  return {
    total_blocks: stats.totalBlocks,
    active_blocks: stats.activeBlocks,
    blocks_today: stats.blocksToday,
    blocks_this_week: stats.blocksThisWeek,
    total_attempts: stats.totalAttempts,
    failed_attempts_today: stats.failedAttemptsToday,
    blocked_attempts_today: stats.blockedAttemptsToday,
    top_blocked_numbers: stats.topBlockedNumbers.map((entry) => ({
      phone_number: entry.phoneNumber,
      block_count: entry.blockCount
    })),
    block_types_distribution: stats.blockTypesDistribution
  };
}

export function serializeHistory(history: PhoneHistory) {
  return {
    phone_number: history.phoneNumber,
    current_status: history.currentStatus ? serializeBlockInfo(history.currentStatus) : null,
    statistics: {
      total_blocks: history.statistics.totalBlocks,
      active_blocks: history.statistics.activeBlocks,
      failed_attempts: history.statistics.failedAttempts,
      successful_attempts: history.statistics.successfulAttempts
    },
    blocks: history.blocks.map(serializeBlock),
    recent_attempts: history.recentAttempts.map(serializeAttempt)
  };
}
