import Fastify, { type FastifyRequest } from 'fastify';
import { z } from 'zod';
import { loadGuardConfig, type GuardConfig } from './config';
import { AppError, notFound } from './errors';
import { createLogger, silentLogger, type Logger } from './logger';
import {
  serializeAttempt,
  serializeBlock,
  serializeHistory,
  serializePage,
  serializeSession,
  serializeStatistics,
  serializeUser
} from './serializers';
import { AttemptLedger } from './services/attemptLedger';
import { AuthService, type Principal } from './services/authService';
import { ProgressiveBlockEngine } from './services/blockEngine';
import { CredentialService } from './services/credentialService';
import { DeviceSessionGovernor } from './services/deviceSessionService';
import { LogNotificationSender, type NotificationSender } from './services/notificationService';
import { createStore, type DataStore, type StoreKind } from './store';
import type { ClientContext, User } from './types';

export interface BuildServerOptions {
  storage?: StoreKind;
  databaseUrl?: string;
  /** Takes precedence over `storage`; the server still owns init and close. */
  store?: DataStore;
  config?: Partial<GuardConfig>;
  logger?: Logger;
  notifier?: NotificationSender;
  trustProxy?: boolean;
}

function header(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : undefined;
}

function clientContext(request: FastifyRequest): ClientContext {
  return {
    ipAddress: request.ip || '0.0.0.0',
    userAgent: header(request, 'user-agent'),
    deviceId: header(request, 'x-device-id'),
    deviceName: header(request, 'x-device-name')
  };
}

const phoneSchema = z.string().regex(/^01[0125]\d{8}$/);
const passwordSchema = z.string().min(6).max(64);
const flagSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true')
  .optional();
const pageSchema = {
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(100).default(20)
};
const reasonSchema = z.object({ reason: z.string().max(500).optional() });

function ok<T>(data?: T) {
  return data === undefined ? { code: 0, message: 'ok' } : { code: 0, message: 'ok', data };
}

export function buildServer(options: BuildServerOptions = {}) {
  const storage =
    options.storage ?? (process.env.STORAGE_DRIVER === 'memory' ? 'memory' : 'postgres');
  const databaseUrl = options.databaseUrl ?? process.env.DATABASE_URL;
  const config: GuardConfig = { ...loadGuardConfig(process.env), ...options.config };
  const logger =
    options.logger ?? (process.env.NODE_ENV === 'test' ? silentLogger() : createLogger());
  const startedAt = Date.now();

  const app = Fastify({
    logger,
    trustProxy: options.trustProxy ?? process.env.TRUST_PROXY === '1'
  });
  const store =
    options.store ??
    createStore({ kind: storage, databaseUrl, lockTimeoutMs: config.lockTimeoutMs });
  const ledger = new AttemptLedger(store);
  const engine = new ProgressiveBlockEngine(store, ledger, config, logger);
  const sessions = new DeviceSessionGovernor(store, config, logger);
  const credentials = new CredentialService(config);
  const authService = new AuthService(
    store,
    engine,
    sessions,
    credentials,
    options.notifier ?? new LogNotificationSender(logger),
    config,
    logger
  );

  app.addHook('onReady', async () => {
    await store.init();
  });

  app.addHook('onClose', async () => {
    await store.close();
  });

  const requireUser = async (request: FastifyRequest): Promise<Principal> =>
    authService.authenticate(header(request, 'authorization'));

  const requireAdmin = async (request: FastifyRequest): Promise<Principal> => {
    const principal = await requireUser(request);
    if (principal.user.role !== 'admin') {
      throw new AppError(403, 40301, 'Operator access required');
    }
    return principal;
  };

  const loadUser = async (userId: string): Promise<User> => {
    const user = await store.getUserById(userId);
    if (!user) {
      throw notFound('User not found');
    }
    return user;
  };

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      reply.status(error.status).send({
        code: error.code,
        message: error.message,
        details: error.details ?? null
      });
      return;
    }

    if (error instanceof z.ZodError) {
      reply.status(400).send({
        code: 40000,
        message: 'Invalid request parameters',
        details: { issues: error.issues }
      });
      return;
    }

    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      reply.status(400).send({ code: 40000, message: error.message, details: null });
      return;
    }

    request.log.error({ err: error }, 'unhandled request error');
    reply.status(500).send({
      code: 50000,
      message: 'Internal server error'
    });
  });

  app.get('/healthz', async () =>
    ok({ status: 'ok', uptime_sec: Math.floor((Date.now() - startedAt) / 1000) })
  );

  app.get('/readyz', async () => ok({ status: 'ready' }));

  app.post('/v1/auth/register', async (request) => {
    const body = z
      .object({
        phone_number: phoneSchema,
        password: passwordSchema,
        name: z.string().trim().min(1).max(100),
        role: z.enum(['student', 'teacher', 'parent']).default('student')
      })
      .parse(request.body);
    const user = await authService.register({
      phoneNumber: body.phone_number,
      password: body.password,
      name: body.name,
      role: body.role
    });
    return ok(serializeUser(user));
  });

  app.post('/v1/auth/login', async (request) => {
    const body = z
      .object({
        phone_number: phoneSchema,
        password: z.string().min(1),
        device_id: z.string().trim().min(1).max(255).optional(),
        device_name: z.string().trim().min(1).max(100).optional()
      })
      .parse(request.body);
    const context = clientContext(request);
    const result = await authService.login(
      { phoneNumber: body.phone_number, password: body.password },
      {
        ...context,
        deviceId: body.device_id ?? context.deviceId,
        deviceName: body.device_name ?? context.deviceName
      }
    );
    return ok({
      user: serializeUser(result.user),
      access_token: result.accessToken,
      token_type: 'Bearer',
      expires_in_sec: result.expiresInSec,
      session: result.session ? serializeSession(result.session, result.session.sessionToken) : null
    });
  });

  app.post('/v1/auth/password/reset/request', async (request) => {
    const body = z.object({ phone_number: phoneSchema }).parse(request.body);
    const result = await authService.requestPasswordReset(
      body.phone_number,
      clientContext(request)
    );
    return ok({ expires_in_sec: result.expiresInSec, debug_code: result.debugCode ?? null });
  });

  app.post('/v1/auth/password/reset/confirm', async (request) => {
    const body = z
      .object({
        phone_number: phoneSchema,
        code: z.string().regex(/^\d{6}$/),
        new_password: passwordSchema
      })
      .parse(request.body);
    await authService.confirmPasswordReset(
      { phoneNumber: body.phone_number, code: body.code, newPassword: body.new_password },
      clientContext(request)
    );
    return ok();
  });

  app.get('/v1/me', async (request) => {
    const principal = await requireUser(request);
    return ok(serializeUser(principal.user));
  });

  app.get('/v1/me/devices', async (request) => {
    const principal = await requireUser(request);
    const items = await sessions.listSessions(principal.user, { activeOnly: true });
    return ok({
      max_allowed_devices: principal.user.maxAllowedDevices,
      capped: sessions.isCapped(principal.user),
      items: items.map((item) => serializeSession(item, principal.sessionToken))
    });
  });

  app.post('/v1/auth/logout', async (request) => {
    const principal = await requireUser(request);
    const loggedOut = await authService.logout(principal);
    return ok({ session_revoked: loggedOut });
  });

  app.get('/v1/admin/security/blocks', async (request) => {
    await requireAdmin(request);
    const query = z
      .object({
        ...pageSchema,
        phone: z.string().trim().min(1).optional(),
        block_type: z.enum(['login', 'password_reset', 'combined']).optional(),
        is_active: flagSchema,
        manually_unblocked: flagSchema
      })
      .parse(request.query);
    const result = await engine.listBlocks(
      {
        phoneContains: query.phone,
        blockTypes: query.block_type ? [query.block_type] : undefined,
        isActive: query.is_active,
        manuallyUnblocked: query.manually_unblocked
      },
      query.page,
      query.page_size
    );
    return ok(serializePage(result, serializeBlock));
  });

  app.get('/v1/admin/security/blocks/:id', async (request) => {
    await requireAdmin(request);
    const params = z.object({ id: z.string().min(1) }).parse(request.params);
    return ok(serializeBlock(await engine.getBlock(params.id)));
  });

  app.post('/v1/admin/security/blocks/:id/deactivate', async (request) => {
    const principal = await requireAdmin(request);
    const params = z.object({ id: z.string().min(1) }).parse(request.params);
    const body = reasonSchema.parse(request.body ?? {});
    const block = await engine.deactivateBlock(params.id, principal.user, body.reason);
    return ok(serializeBlock(block));
  });

  app.post('/v1/admin/security/unblock', async (request) => {
    const principal = await requireAdmin(request);
    const body = reasonSchema.extend({ phone_number: phoneSchema }).parse(request.body);
    const count = await engine.manuallyUnblock(body.phone_number, principal.user, body.reason);
    if (count === 0) {
      throw notFound('No active block found for this phone number');
    }
    return ok({ phone_number: body.phone_number, unblocked_count: count });
  });

  app.get('/v1/admin/security/attempts', async (request) => {
    await requireAdmin(request);
    const query = z
      .object({
        ...pageSchema,
        phone: z.string().trim().min(1).optional(),
        attempt_type: z.enum(['login', 'password_reset']).optional(),
        result: z.enum(['success', 'failed', 'blocked']).optional(),
        since: z.string().datetime().optional(),
        until: z.string().datetime().optional()
      })
      .parse(request.query);
    const result = await ledger.list(
      {
        phoneContains: query.phone,
        attemptType: query.attempt_type,
        result: query.result,
        since: query.since ? Date.parse(query.since) : undefined,
        until: query.until ? Date.parse(query.until) : undefined
      },
      query.page,
      query.page_size
    );
    return ok(serializePage(result, serializeAttempt));
  });

  app.get('/v1/admin/security/stats', async (request) => {
    await requireAdmin(request);
    return ok(serializeStatistics(await ledger.statistics()));
  });

  app.get('/v1/admin/security/phones/:phone/history', async (request) => {
    await requireAdmin(request);
    const params = z.object({ phone: phoneSchema }).parse(request.params);
    return ok(serializeHistory(await engine.phoneHistory(params.phone)));
  });

  app.get('/v1/admin/users/:id/devices', async (request) => {
    await requireAdmin(request);
    const params = z.object({ id: z.string().min(1) }).parse(request.params);
    const query = z.object({ active_only: flagSchema }).parse(request.query);
    const user = await loadUser(params.id);
    const items = await sessions.listSessions(user, { activeOnly: query.active_only ?? false });
    return ok({
      user: serializeUser(user),
      active_sessions: items.filter((item) => item.isActive).length,
      items: items.map((item) => serializeSession(item))
    });
  });

  app.patch('/v1/admin/users/:id/max-devices', async (request) => {
    await requireAdmin(request);
    const params = z.object({ id: z.string().min(1) }).parse(request.params);
    const body = z
      .object({ max_allowed_devices: z.number().int().min(1).max(20) })
      .parse(request.body);
    const user = await loadUser(params.id);
    const result = await sessions.setDeviceCap(user, body.max_allowed_devices);
    return ok({
      max_allowed_devices: result.maxAllowedDevices,
      active_sessions: result.activeSessions
    });
  });

  app.delete('/v1/admin/users/:id/devices/:sessionId', async (request) => {
    await requireAdmin(request);
    const params = z
      .object({ id: z.string().min(1), sessionId: z.string().min(1) })
      .parse(request.params);
    const user = await loadUser(params.id);
    return ok(serializeSession(await sessions.revoke(user, params.sessionId)));
  });

  app.post('/v1/admin/users/:id/devices/revoke-all', async (request) => {
    await requireAdmin(request);
    const params = z.object({ id: z.string().min(1) }).parse(request.params);
    const user = await loadUser(params.id);
    return ok({ revoked_count: await sessions.revokeAll(user) });
  });

  return app;
}
