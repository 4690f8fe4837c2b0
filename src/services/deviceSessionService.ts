import type { GuardConfig } from '../config';
import { AppError, notFound, retryOnCapacityRace } from '../errors';
import type { Logger } from '../logger';
import type { DataStore } from '../store';
import type { ClientContext, DeactivationReason, DeviceSession, User } from '../types';
import { deviceNameFromUserAgent, now, randomHex, randomToken } from '../utils';

const SESSION_TOKEN_BYTES = 32;

function byLeastRecentUse(a: DeviceSession, b: DeviceSession): number {
  return a.lastUsedAt - b.lastUsedAt;
}

/**
 * Tracks device sessions for capped users. Each session token is embedded in
 * the bearer credential; a credential whose session is gone is rejected on the
 * next request.
 */
export class DeviceSessionGovernor {
  constructor(
    private readonly store: DataStore,
    private readonly config: GuardConfig,
    private readonly logger: Logger
  ) {}

  isCapped(user: Pick<User, 'role'>): boolean {
    return this.config.cappedRoles.includes(user.role);
  }

  /**
   * Reuses the active session of the same device (same row, same token) or
   * creates a new one, evicting the least recently used sessions when the
   * user is at capacity. Never rejects.
   */
  async registerSession(user: User, context: ClientContext): Promise<DeviceSession> {
    const deviceId = context.deviceId?.trim() || undefined;
    const deviceName = context.deviceName?.trim() || deviceNameFromUserAgent(context.userAgent);

    return retryOnCapacityRace(() =>
      this.store.withLock(`user:${user.id}`, async (tx) => {
        const current = now();
        const active = await tx.listDeviceSessions(user.id, { activeOnly: true });
        const existing = deviceId
          ? active.find((session) => session.deviceId === deviceId)
          : active.find((session) => !session.deviceId && session.ipAddress === context.ipAddress);

        if (existing) {
          const refreshed: DeviceSession = {
            ...existing,
            deviceId: existing.deviceId ?? deviceId,
            deviceName,
            ipAddress: context.ipAddress,
            userAgent: context.userAgent ?? existing.userAgent,
            lastUsedAt: current
          };
          await tx.updateDeviceSession(refreshed);
          return refreshed;
        }

        if (this.isCapped(user)) {
          const latest = await tx.getUserById(user.id);
          const cap = latest?.maxAllowedDevices ?? user.maxAllowedDevices;
          const oldestFirst = [...active].sort(byLeastRecentUse);
          while (oldestFirst.length >= cap) {
            const oldest = oldestFirst.shift();
            if (!oldest) {
              break;
            }
            await this.deactivate(tx, oldest, 'evicted', current);
            this.logger.info(
              { userId: user.id, sessionId: oldest.id, deviceName: oldest.deviceName },
              'least recently used device evicted'
            );
          }
        }

        const session: DeviceSession = {
          id: randomToken('dev'),
          userId: user.id,
          sessionToken: randomHex(SESSION_TOKEN_BYTES),
          deviceId,
          deviceName,
          ipAddress: context.ipAddress,
          userAgent: context.userAgent,
          loggedInAt: current,
          lastUsedAt: current,
          isActive: true
        };
        await tx.insertDeviceSession(session);
        return session;
      })
    );
  }

  async validateSession(user: User, sessionToken: string): Promise<boolean> {
    if (!this.isCapped(user)) {
      return true;
    }
    const session = await this.store.getDeviceSessionByToken(sessionToken);
    if (!session || !session.isActive || session.userId !== user.id) {
      return false;
    }
    this.touchLater(sessionToken);
    return true;
  }

  async touch(sessionToken: string): Promise<boolean> {
    return this.store.touchDeviceSession(sessionToken, now());
  }

  async getByToken(sessionToken: string): Promise<DeviceSession | undefined> {
    return this.store.getDeviceSessionByToken(sessionToken);
  }

  async revoke(user: User, sessionId: string): Promise<DeviceSession> {
    return this.store.withLock(`user:${user.id}`, async (tx) => {
      const session = await tx.getDeviceSession(sessionId);
      if (!session || session.userId !== user.id) {
        throw notFound('Device session not found for this user');
      }
      if (!session.isActive) {
        return session;
      }
      const revoked = await this.deactivate(tx, session, 'revoked', now());
      this.logger.info({ userId: user.id, sessionId }, 'device session revoked');
      return revoked;
    });
  }

  async revokeAll(user: User): Promise<number> {
    return this.store.withLock(`user:${user.id}`, async (tx) => {
      const current = now();
      const active = await tx.listDeviceSessions(user.id, { activeOnly: true });
      for (const session of active) {
        await this.deactivate(tx, session, 'revoked', current);
      }
      this.logger.info({ userId: user.id, count: active.length }, 'all device sessions revoked');
      return active.length;
    });
  }

  async setDeviceCap(
    user: User,
    maxDevices: number
  ): Promise<{ maxAllowedDevices: number; activeSessions: number }> {
    if (!Number.isInteger(maxDevices) || maxDevices < 1) {
      throw new AppError(400, 40000, 'max_allowed_devices must be a positive integer');
    }
    return this.store.withLock(`user:${user.id}`, async (tx) => {
      const current = now();
      const latest = (await tx.getUserById(user.id)) ?? user;
      await tx.updateUser({ ...latest, maxAllowedDevices: maxDevices });

      const oldestFirst = (await tx.listDeviceSessions(user.id, { activeOnly: true })).sort(
        byLeastRecentUse
      );
      while (oldestFirst.length > maxDevices) {
        const oldest = oldestFirst.shift();
        if (!oldest) {
          break;
        }
        await this.deactivate(tx, oldest, 'cap_lowered', current);
      }
      this.logger.info({ userId: user.id, maxDevices }, 'device cap updated');
      return { maxAllowedDevices: maxDevices, activeSessions: oldestFirst.length };
    });
  }

  async listSessions(user: User, options: { activeOnly?: boolean } = {}): Promise<DeviceSession[]> {
    return this.store.listDeviceSessions(user.id, options);
  }

  private touchLater(sessionToken: string): void {
    this.touch(sessionToken).catch((err: unknown) => {
      this.logger.warn({ err }, 'failed to record device session use');
    });
  }

  private async deactivate(
    tx: DataStore,
    session: DeviceSession,
    reason: DeactivationReason,
    current: number
  ): Promise<DeviceSession> {
    const next: DeviceSession = {
      ...session,
      isActive: false,
      deactivatedAt: current,
      deactivationReason: reason
    };
    await tx.updateDeviceSession(next);
    return next;
  }
}
