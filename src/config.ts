import { z } from 'zod';
import type { UserRole } from './types';

export interface GuardConfig {
  /** Failed attempts inside the window that trigger a block. */
  maxFailedAttempts: number;
  attemptWindowMinutes: number;
  /** Ascending block durations; levels past the end reuse the last entry. */
  blockDurationsMinutes: number[];
  /** How far back a previous block still counts toward escalation. */
  resetAfterHours: number;
  defaultMaxDevices: number;
  cappedRoles: UserRole[];
  /**
   * Credentials without a session claim are accepted for capped users until
   * this instant. Unset means one credential lifetime after startup.
   */
  legacyCredentialCutoff?: number;
  jwtSecret: string;
  credentialTtlSec: number;
  resetCodeTtlMinutes: number;
  attemptRetentionDays: number;
  lockTimeoutMs: number;
}

export const DEFAULT_GUARD_CONFIG: GuardConfig = {
  maxFailedAttempts: 3,
  attemptWindowMinutes: 60,
  blockDurationsMinutes: [15, 60, 360, 1440, 10080],
  resetAfterHours: 168,
  defaultMaxDevices: 2,
  cappedRoles: ['student'],
  jwtSecret: 'dev-only-secret',
  credentialTtlSec: 24 * 60 * 60,
  resetCodeTtlMinutes: 10,
  attemptRetentionDays: 30,
  lockTimeoutMs: 2000
};

const roleSchema = z.enum(['student', 'teacher', 'parent', 'admin']);

const csv = <T extends z.ZodTypeAny>(item: T) =>
  z
    .string()
    .transform((value) =>
      value
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
    )
    .pipe(z.array(item).min(1));

const envSchema = z.object({
  GUARD_MAX_FAILED_ATTEMPTS: z.coerce.number().int().min(1).optional(),
  GUARD_ATTEMPT_WINDOW_MINUTES: z.coerce.number().int().min(1).optional(),
  GUARD_BLOCK_DURATIONS_MINUTES: csv(z.coerce.number().int().positive()).optional(),
  GUARD_RESET_AFTER_HOURS: z.coerce.number().int().min(1).optional(),
  GUARD_DEFAULT_MAX_DEVICES: z.coerce.number().int().min(1).optional(),
  GUARD_CAPPED_ROLES: csv(roleSchema).optional(),
  GUARD_LEGACY_CREDENTIAL_CUTOFF: z.string().datetime().optional(),
  GUARD_RESET_CODE_TTL_MINUTES: z.coerce.number().int().min(1).optional(),
  GUARD_ATTEMPT_RETENTION_DAYS: z.coerce.number().int().min(1).optional(),
  GUARD_LOCK_TIMEOUT_MS: z.coerce.number().int().min(1).optional(),
  JWT_SECRET: z.string().min(1).optional(),
  JWT_TTL_SEC: z.coerce.number().int().min(60).optional()
});

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const result: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    result[key] = value && value.trim().length > 0 ? value.trim() : undefined;
  }
  return result;
}

export function loadGuardConfig(env: NodeJS.ProcessEnv): GuardConfig {
  const parsed = envSchema.parse(blankToUndefined(env));
  const durations =
    parsed.GUARD_BLOCK_DURATIONS_MINUTES ?? DEFAULT_GUARD_CONFIG.blockDurationsMinutes;
  return {
    maxFailedAttempts: parsed.GUARD_MAX_FAILED_ATTEMPTS ?? DEFAULT_GUARD_CONFIG.maxFailedAttempts,
    attemptWindowMinutes:
      parsed.GUARD_ATTEMPT_WINDOW_MINUTES ?? DEFAULT_GUARD_CONFIG.attemptWindowMinutes,
    blockDurationsMinutes: [...durations].sort((a, b) => a - b),
    resetAfterHours: parsed.GUARD_RESET_AFTER_HOURS ?? DEFAULT_GUARD_CONFIG.resetAfterHours,
    defaultMaxDevices: parsed.GUARD_DEFAULT_MAX_DEVICES ?? DEFAULT_GUARD_CONFIG.defaultMaxDevices,
    cappedRoles: parsed.GUARD_CAPPED_ROLES ?? DEFAULT_GUARD_CONFIG.cappedRoles,
    legacyCredentialCutoff: parsed.GUARD_LEGACY_CREDENTIAL_CUTOFF
      ? Date.parse(parsed.GUARD_LEGACY_CREDENTIAL_CUTOFF)
      : undefined,
    jwtSecret: parsed.JWT_SECRET ?? DEFAULT_GUARD_CONFIG.jwtSecret,
    credentialTtlSec: parsed.JWT_TTL_SEC ?? DEFAULT_GUARD_CONFIG.credentialTtlSec,
    resetCodeTtlMinutes:
      parsed.GUARD_RESET_CODE_TTL_MINUTES ?? DEFAULT_GUARD_CONFIG.resetCodeTtlMinutes,
    attemptRetentionDays:
      parsed.GUARD_ATTEMPT_RETENTION_DAYS ?? DEFAULT_GUARD_CONFIG.attemptRetentionDays,
    lockTimeoutMs: parsed.GUARD_LOCK_TIMEOUT_MS ?? DEFAULT_GUARD_CONFIG.lockTimeoutMs
  };
}

export function resolveGuardConfig(overrides: Partial<GuardConfig> = {}): GuardConfig {
  return { ...DEFAULT_GUARD_CONFIG, ...overrides };
}
