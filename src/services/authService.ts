import type { GuardConfig } from '../config';
import { AppError, sessionInvalid, unauthenticated } from '../errors';
import type { Logger } from '../logger';
import type { DataStore } from '../store';
import type { BlockInfo, ClientContext, DeviceSession, User, UserRole } from '../types';
import {
  hashPassword,
  hashText,
  isEgyptianMobile,
  MINUTE_MS,
  now,
  randomDigits,
  randomToken,
  safeEqualText,
  toIso,
  verifyPassword
} from '../utils';
import type { ProgressiveBlockEngine } from './blockEngine';
import type { CredentialService } from './credentialService';
import type { DeviceSessionGovernor } from './deviceSessionService';
import type { NotificationSender } from './notificationService';

const WEAK_PASSWORDS = new Set(['123456', '12345678', 'password', 'qwerty', '111111', '000000']);
const RESET_CODE_LENGTH = 6;

export interface Principal {
  user: User;
  sessionToken?: string;
}

export interface LoginResult {
  user: User;
  accessToken: string;
  expiresInSec: number;
  session?: DeviceSession;
}

export function rateLimited(block: BlockInfo): AppError {
  return new AppError(429, 42901, block.messageEn, {
    retry_after_sec: block.remainingSeconds,
    blocked_until: toIso(block.blockedUntil),
    block_level: block.blockLevel,
    message_ar: block.messageAr,
    message_en: block.messageEn
  });
}

export class AuthService {
  private dummyHash?: string;
  private readonly legacyCutoff: number;

  constructor(
    private readonly store: DataStore,
    private readonly engine: ProgressiveBlockEngine,
    private readonly sessions: DeviceSessionGovernor,
    private readonly credentials: CredentialService,
    private readonly notifier: NotificationSender,
    private readonly config: GuardConfig,
    private readonly logger: Logger
  ) {
    // Without a configured cutoff, anything issued before startup has expired
    // one credential lifetime later.
    this.legacyCutoff = config.legacyCredentialCutoff ?? now() + config.credentialTtlSec * 1000;
  }

  async register(params: {
    phoneNumber: string;
    password: string;
    name: string;
    role?: UserRole;
  }): Promise<User> {
    if (!isEgyptianMobile(params.phoneNumber)) {
      throw new AppError(400, 40000, 'Phone number must be an 11-digit Egyptian mobile number');
    }
    this.assertPasswordStrength(params.password);
    if (await this.store.getUserByPhone(params.phoneNumber)) {
      throw new AppError(409, 40901, 'This phone number is already registered');
    }

    const user: User = {
      id: randomToken('usr'),
      phoneNumber: params.phoneNumber,
      name: params.name.trim(),
      passwordHash: hashPassword(params.password),
      role: params.role ?? 'student',
      maxAllowedDevices: this.config.defaultMaxDevices,
      createdAt: now()
    };
    try {
      await this.store.createUser(user);
    } catch (err) {
      if (await this.store.getUserByPhone(params.phoneNumber)) {
        throw new AppError(409, 40901, 'This phone number is already registered');
      }
      throw err;
    }
    this.logger.info({ userId: user.id, role: user.role }, 'user registered');
    return user;
  }

  async login(
    params: { phoneNumber: string; password: string },
    context: ClientContext
  ): Promise<LoginResult> {
    const { phoneNumber } = params;
    const blocked = await this.engine.checkGate(phoneNumber, 'login', context);
    if (blocked) {
      throw rateLimited(blocked);
    }

    const user = await this.store.getUserByPhone(phoneNumber);
    // Unknown numbers still pay for a hash check.
    const passwordOk = verifyPassword(params.password, user?.passwordHash ?? this.timingHash());
    const success = Boolean(user) && passwordOk;

    const decision = await this.engine.recordAttempt({
      phoneNumber,
      attemptType: 'login',
      success,
      context,
      failureReason: success ? undefined : 'invalid credentials'
    });
    if (decision.kind === 'blocked') {
      throw rateLimited(decision.block);
    }
    if (!success || !user) {
      throw new AppError(401, 40101, 'Invalid phone number or password', {
        remaining_attempts:
          decision.kind === 'allowed_with_warning' ? decision.remainingAttempts : null
      });
    }

    let session: DeviceSession | undefined;
    if (this.sessions.isCapped(user)) {
      session = await this.sessions.registerSession(user, context);
    }
    const credential = this.credentials.issue(user, session?.sessionToken);
    return { user, ...credential, session };
  }

  async requestPasswordReset(
    phoneNumber: string,
    context: ClientContext
  ): Promise<{ expiresInSec: number; debugCode?: string }> {
    // Every request spends one password reset attempt, known number or not.
    const decision = await this.engine.recordAttempt({
      phoneNumber,
      attemptType: 'password_reset',
      success: false,
      context,
      failureReason: 'reset code requested'
    });
    if (decision.kind === 'blocked') {
      throw rateLimited(decision.block);
    }

    const current = now();
    const code = randomDigits(RESET_CODE_LENGTH);
    const user = await this.store.getUserByPhone(phoneNumber);
    if (user) {
      await this.store.upsertResetCode({
        phoneNumber,
        codeHash: hashText(code),
        expiresAt: current + this.config.resetCodeTtlMinutes * MINUTE_MS,
        createdAt: current
      });
      await this.notifier.sendPasswordResetCode(phoneNumber, code);
    }

    return {
      expiresInSec: this.config.resetCodeTtlMinutes * 60,
      debugCode: process.env.NODE_ENV === 'production' ? undefined : code
    };
  }

  async confirmPasswordReset(
    params: { phoneNumber: string; code: string; newPassword: string },
    context: ClientContext
  ): Promise<void> {
    const { phoneNumber } = params;
    const blocked = await this.engine.checkGate(phoneNumber, 'password_reset', context);
    if (blocked) {
      throw rateLimited(blocked);
    }
    this.assertPasswordStrength(params.newPassword);

    const [record, user] = await Promise.all([
      this.store.getResetCode(phoneNumber),
      this.store.getUserByPhone(phoneNumber)
    ]);
    const codeOk =
      record !== undefined &&
      record.expiresAt > now() &&
      safeEqualText(hashText(params.code), record.codeHash);
    const success = codeOk && user !== undefined;

    const decision = await this.engine.recordAttempt({
      phoneNumber,
      attemptType: 'password_reset',
      success,
      context,
      failureReason: success ? undefined : 'invalid or expired reset code'
    });
    if (decision.kind === 'blocked') {
      throw rateLimited(decision.block);
    }
    if (!success || !user) {
      throw new AppError(401, 40105, 'Reset code is invalid or has expired', {
        remaining_attempts:
          decision.kind === 'allowed_with_warning' ? decision.remainingAttempts : null
      });
    }

    await this.store.updateUser({ ...user, passwordHash: hashPassword(params.newPassword) });
    await this.store.deleteResetCode(phoneNumber);
    this.logger.info({ userId: user.id }, 'password reset completed');
  }

  async authenticate(authorization: string | undefined): Promise<Principal> {
    const token = bearerToken(authorization);
    if (!token) {
      throw unauthenticated();
    }
    const claims = this.credentials.verify(token);
    const user = await this.store.getUserById(claims.userId);
    if (!user) {
      throw unauthenticated();
    }
    if (!this.sessions.isCapped(user)) {
      return { user, sessionToken: claims.sessionToken };
    }

    if (!claims.sessionToken) {
      if (now() >= this.legacyCutoff) {
        throw sessionInvalid();
      }
      this.logger.info({ userId: user.id }, 'legacy credential without device session accepted');
      return { user };
    }

    if (!(await this.sessions.validateSession(user, claims.sessionToken))) {
      throw sessionInvalid();
    }
    return { user, sessionToken: claims.sessionToken };
  }

  /** Deactivates the caller's own device session; false when there was none. */
  async logout(principal: Principal): Promise<boolean> {
    if (!principal.sessionToken) {
      return false;
    }
    const session = await this.sessions.getByToken(principal.sessionToken);
    if (!session || !session.isActive || session.userId !== principal.user.id) {
      return false;
    }
    await this.sessions.revoke(principal.user, session.id);
    return true;
  }

  private assertPasswordStrength(password: string): void {
    if (password.length < 6 || password.length > 64) {
      throw new AppError(400, 40000, 'Password must be 6-64 characters long');
    }
    if (WEAK_PASSWORDS.has(password.toLowerCase())) {
      throw new AppError(400, 40000, 'Password is too weak');
    }
  }

  private timingHash(): string {
    this.dummyHash ??= hashPassword(randomDigits(RESET_CODE_LENGTH));
    return this.dummyHash;
  }
}

export function bearerToken(authorization?: string): string | undefined {
  if (!authorization) {
    return undefined;
  }
  const [type, token] = authorization.split(' ');
  if (type !== 'Bearer' || !token) {
    return undefined;
  }
  return token;
}
