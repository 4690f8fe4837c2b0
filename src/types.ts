export type AttemptType = 'login' | 'password_reset';
export type AttemptResult = 'success' | 'failed' | 'blocked';
export type BlockType = AttemptType | 'combined';
export type UserRole = 'student' | 'teacher' | 'parent' | 'admin';
export type DeactivationReason = 'evicted' | 'revoked' | 'cap_lowered';

export interface User {
  id: string;
  phoneNumber: string;
  name: string;
  passwordHash: string;
  role: UserRole;
  maxAllowedDevices: number;
  createdAt: number;
}

export interface PasswordResetCode {
  phoneNumber: string;
  codeHash: string;
  expiresAt: number;
  createdAt: number;
}

export interface AttemptRecord {
  id: string;
  phoneNumber: string;
  attemptType: AttemptType;
  result: AttemptResult;
  attemptedAt: number;
  ipAddress: string;
  userAgent?: string;
  deviceId?: string;
  failureReason?: string;
  relatedBlockId?: string;
}

export interface FailedAttemptSnapshot {
  timestamp: number;
  ipAddress: string;
  deviceId?: string;
  failureReason?: string;
}

export interface Block {
  id: string;
  phoneNumber: string;
  blockType: BlockType;
  blockedAt: number;
  blockedUntil: number;
  blockLevel: number;
  consecutiveBlocks: number;
  isActive: boolean;
  manuallyUnblocked: boolean;
  unblockedBy?: string;
  unblockedAt?: number;
  unblockReason?: string;
  failedAttempts: FailedAttemptSnapshot[];
  ipAddresses: string[];
  userAgents: string[];
  deviceIds: string[];
}

export interface DeviceSession {
  id: string;
  userId: string;
  sessionToken: string;
  deviceId?: string;
  deviceName: string;
  ipAddress: string;
  userAgent?: string;
  loggedInAt: number;
  lastUsedAt: number;
  isActive: boolean;
  deactivatedAt?: number;
  deactivationReason?: DeactivationReason;
}

/** Request metadata attached to every authentication attempt. */
export interface ClientContext {
  ipAddress: string;
  userAgent?: string;
  deviceId?: string;
  deviceName?: string;
}

export interface BlockInfo {
  blockId: string;
  blockType: BlockType;
  blockedUntil: number;
  remainingSeconds: number;
  remainingFormatted: string;
  blockLevel: number;
  consecutiveBlocks: number;
  messageAr: string;
  messageEn: string;
}

export type Decision =
  | { kind: 'allowed' }
  | { kind: 'allowed_with_warning'; remainingAttempts: number }
  | { kind: 'blocked'; reason: 'blocked' | 'threshold_exceeded'; block: BlockInfo };

export interface Page<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
}
