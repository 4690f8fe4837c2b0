import crypto from 'node:crypto';

export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

export function now(): number {
  return Date.now();
}

export function toIso(ts: number): string {
  return new Date(ts).toISOString();
}

export function optionalIso(ts: number | undefined): string | null {
  return ts === undefined ? null : toIso(ts);
}

export function isEgyptianMobile(phone: string): boolean {
  return /^01[0125]\d{8}$/.test(phone);
}

export function hashText(text: string): string {
  return crypto.createHash('sha256').update(text).digest('hex');
}

export function randomDigits(length: number): string {
  return String(crypto.randomInt(0, 10 ** length)).padStart(length, '0');
}

export function randomToken(prefix: string): string {
  return `${prefix}_${crypto.randomUUID()}`;
}

export function randomHex(bytes: number): string {
  return crypto.randomBytes(bytes).toString('hex');
}

export function hashPassword(password: string): string {
  const salt = crypto.randomBytes(16).toString('hex');
  const hash = crypto.scryptSync(password, salt, 64).toString('hex');
  return `${salt}:${hash}`;
}

export function verifyPassword(password: string, stored: string): boolean {
  const [salt, hash] = stored.split(':');
  if (!salt || !hash) {
    return false;
  }
  const candidate = crypto.scryptSync(password, salt, 64).toString('hex');
  const a = Buffer.from(hash, 'hex');
  const b = Buffer.from(candidate, 'hex');
  if (a.length !== b.length) {
    return false;
  }
  return crypto.timingSafeEqual(a, b);
}

export function safeEqualText(a: string, b: string): boolean {
  const left = Buffer.from(hashText(a), 'hex');
  const right = Buffer.from(hashText(b), 'hex');
  return crypto.timingSafeEqual(left, right);
}

export function deviceNameFromUserAgent(userAgent: string | undefined): string {
  if (!userAgent || userAgent === 'Unknown') {
    return 'Unknown Device';
  }
  const ua = userAgent.toLowerCase();
  if (ua.includes('iphone')) {
    return 'iPhone';
  }
  if (ua.includes('ipad')) {
    return 'iPad';
  }
  if (ua.includes('android')) {
    return 'Android Device';
  }
  if (ua.includes('windows')) {
    return 'Windows PC';
  }
  if (ua.includes('macintosh') || ua.includes('mac os')) {
    return 'Mac';
  }
  if (ua.includes('linux')) {
    return 'Linux PC';
  }
  return userAgent.slice(0, 50);
}

export function uniqueValues(values: Array<string | undefined>): string[] {
  const seen = new Set<string>();
  values.forEach((value) => {
    if (value) {
      seen.add(value);
    }
  });
  return [...seen];
}

export function startOfUtcDay(ts: number): number {
  const date = new Date(ts);
  date.setUTCHours(0, 0, 0, 0);
  return date.getTime();
}
