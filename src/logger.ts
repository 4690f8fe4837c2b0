import pino, { type Logger } from 'pino';

export type { Logger };

export function createLogger(options: { level?: string; name?: string } = {}): Logger {
  return pino({
    name: options.name ?? 'auth-guard',
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    redact: ['req.headers.authorization', 'password', 'newPassword', 'code']
  });
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
