import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { buildServer } from '../src/server';
import { CredentialService } from '../src/services/credentialService';
import { InMemoryStore } from '../src/store';

const MINUTE = 60_000;
const PASSWORD = 'correct-horse-1';
const IPHONE_UA = 'Mozilla/5.0 (iPhone; CPU iPhone OS 17_0 like Mac OS X)';

describe('authentication gateway', () => {
  const baseTime = new Date('2026-03-01T08:00:00.000Z').getTime();
  let store = new InMemoryStore();
  let app = buildServer({ store });

  beforeEach(async () => {
    vi.useFakeTimers();
    vi.setSystemTime(baseTime);
    store = new InMemoryStore();
    app = buildServer({ store, trustProxy: true, config: { jwtSecret: 'test-secret' } });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
    vi.useRealTimers();
  });

  async function register(phone: string, role = 'student'): Promise<string> {
    const resp = await request(app.server)
      .post('/v1/auth/register')
      .send({ phone_number: phone, password: PASSWORD, name: 'Test User', role });
    expect(resp.status).toBe(200);
    return resp.body.data.id as string;
  }

  function login(phone: string, password: string, deviceId?: string) {
    const req = request(app.server).post('/v1/auth/login').set('user-agent', IPHONE_UA);
    if (deviceId) {
      req.set('x-device-id', deviceId);
    }
    return req.send({ phone_number: phone, password });
  }

  function me(token: string) {
    return request(app.server).get('/v1/me').set('authorization', `Bearer ${token}`);
  }

  it('blocks a number after three failed logins and lets it in after the block ends', async () => {
    const phone = '01012345678';
    await register(phone);

    const first = await login(phone, 'wrong-password');
    expect(first.status).toBe(401);
    expect(first.body.code).toBe(40101);
    expect(first.body.details.remaining_attempts).toBe(2);

    vi.setSystemTime(baseTime + 10 * MINUTE);
    const second = await login(phone, 'wrong-password');
    expect(second.body.details.remaining_attempts).toBe(1);

    vi.setSystemTime(baseTime + 20 * MINUTE);
    const third = await login(phone, 'wrong-password');
    expect(third.status).toBe(429);
    expect(third.body.code).toBe(42901);
    expect(third.body.details).toMatchObject({
      block_level: 1,
      blocked_until: '2026-03-01T08:35:00.000Z',
      retry_after_sec: 900,
      message_en:
        'Too many failed sign-in attempts for this number. Try again in 15 minute(s). ' +
        'If these attempts were not made by you, contact support immediately.'
    });

    vi.setSystemTime(baseTime + 21 * MINUTE);
    const fourth = await login(phone, PASSWORD);
    expect(fourth.status).toBe(429);
    expect(fourth.body.details.blocked_until).toBe('2026-03-01T08:35:00.000Z');
    expect(fourth.body.details.retry_after_sec).toBe(840);

    vi.setSystemTime(baseTime + 36 * MINUTE);
    const fifth = await login(phone, PASSWORD);
    expect(fifth.status).toBe(200);
    expect(fifth.body.data.user.phone_number).toBe(phone);
    expect(fifth.body.data.token_type).toBe('Bearer');

    const results = (await store.listAttempts({ phoneNumber: phone })).map((item) => item.result);
    expect(results).toEqual(['success', 'blocked', 'failed', 'failed', 'failed']);
  });

  it('answers unknown numbers like wrong passwords', async () => {
    const resp = await login('01099999999', 'whatever-1');

    expect(resp.status).toBe(401);
    expect(resp.body).toEqual({
      code: 40101,
      message: 'Invalid phone number or password',
      details: { remaining_attempts: 2 }
    });
  });

  it('evicts the least recently used device when a student signs in on a third one', async () => {
    const phone = '01112345678';
    await register(phone);

    const a = await login(phone, PASSWORD, 'device-A');
    vi.setSystemTime(baseTime + MINUTE);
    const b = await login(phone, PASSWORD, 'device-B');
    vi.setSystemTime(baseTime + 2 * MINUTE);
    const c = await login(phone, PASSWORD, 'device-C');
    expect(c.body.data.session.device_name).toBe('iPhone');
    expect(c.body.data.session.is_current).toBe(true);

    const stale = await me(a.body.data.access_token);
    expect(stale.status).toBe(401);
    expect(stale.body.code).toBe(40104);
    expect(stale.body.message).toBe('Session expired. This device has been logged out or removed.');

    expect((await me(b.body.data.access_token)).status).toBe(200);
    expect((await me(c.body.data.access_token)).status).toBe(200);

    const devices = await request(app.server)
      .get('/v1/me/devices')
      .set('authorization', `Bearer ${c.body.data.access_token}`);
    expect(devices.status).toBe(200);
    expect(devices.body.data.max_allowed_devices).toBe(2);
    const ids = devices.body.data.items.map((item: { device_id: string }) => item.device_id);
    expect(ids.sort()).toEqual(['device-B', 'device-C']);
  });

  it('keeps the same session when a device signs in again', async () => {
    const phone = '01212345678';
    await register(phone);

    const first = await login(phone, PASSWORD, 'device-A');
    vi.setSystemTime(baseTime + MINUTE);
    const again = await login(phone, PASSWORD, 'device-A');

    expect(again.body.data.session.id).toBe(first.body.data.session.id);
    expect((await me(first.body.data.access_token)).status).toBe(200);
    const active = await store.listDeviceSessions(first.body.data.user.id, { activeOnly: true });
    expect(active).toHaveLength(1);
  });

  it('takes the device id from the request body', async () => {
    const phone = '01512345678';
    await register(phone);

    const resp = await request(app.server)
      .post('/v1/auth/login')
      .send({
        phone_number: phone,
        password: PASSWORD,
        device_id: 'tablet-1',
        device_name: 'Tablet'
      });

    expect(resp.body.data.session).toMatchObject({ device_id: 'tablet-1', device_name: 'Tablet' });
  });

  it('logs the current device out', async () => {
    const phone = '01012345670';
    await register(phone);
    const session = await login(phone, PASSWORD, 'device-A');
    const token = session.body.data.access_token as string;

    const logout = await request(app.server)
      .post('/v1/auth/logout')
      .set('authorization', `Bearer ${token}`);
    expect(logout.status).toBe(200);
    expect(logout.body.data.session_revoked).toBe(true);

    expect((await me(token)).body.code).toBe(40104);
  });

  it('does not cap devices for teachers', async () => {
    const phone = '01012345671';
    await register(phone, 'teacher');

    const tokens: string[] = [];
    for (const device of ['device-A', 'device-B', 'device-C']) {
      const resp = await login(phone, PASSWORD, device);
      expect(resp.body.data.session).toBeNull();
      tokens.push(resp.body.data.access_token);
    }

    for (const token of tokens) {
      expect((await me(token)).status).toBe(200);
    }
  });

  it('accepts credentials without a session claim until the cutoff', async () => {
    const userId = await register('01012345672');
    const issuer = new CredentialService({ jwtSecret: 'test-secret', credentialTtlSec: 3600 });
    const legacy = issuer.issue({ id: userId, role: 'student' });

    const allowed = await me(legacy.accessToken);
    expect(allowed.status).toBe(200);
    expect(allowed.body.data.id).toBe(userId);

    const strict = buildServer({
      store,
      config: { jwtSecret: 'test-secret', legacyCredentialCutoff: baseTime - 1 }
    });
    await strict.ready();
    const rejected = await request(strict.server)
      .get('/v1/me')
      .set('authorization', `Bearer ${legacy.accessToken}`);
    await strict.close();

    expect(rejected.status).toBe(401);
    expect(rejected.body.code).toBe(40104);
  });

  it('rejects missing and malformed credentials', async () => {
    const missing = await request(app.server).get('/v1/me');
    expect(missing.status).toBe(401);
    expect(missing.body.code).toBe(40103);

    const forged = await me('not-a-jwt');
    expect(forged.body.code).toBe(40103);

    const otherSecret = new CredentialService({
      jwtSecret: 'other-secret',
      credentialTtlSec: 3600
    });
    const foreign = await me(otherSecret.issue({ id: 'usr_x', role: 'admin' }).accessToken);
    expect(foreign.body.code).toBe(40103);
  });

  it('rejects credentials after they expire', async () => {
    const phone = '01012345673';
    await register(phone, 'parent');
    const session = await login(phone, PASSWORD);

    vi.setSystemTime(baseTime + 24 * 60 * MINUTE + 1000);
    expect((await me(session.body.data.access_token)).body.code).toBe(40103);
  });

  it('resets a password with a one-time code', async () => {
    const phone = '01012345674';
    await register(phone);

    const requested = await request(app.server)
      .post('/v1/auth/password/reset/request')
      .send({ phone_number: phone });
    expect(requested.status).toBe(200);
    expect(requested.body.data.expires_in_sec).toBe(600);
    const code = requested.body.data.debug_code as string;
    expect(code).toMatch(/^\d{6}$/);

    const wrong = await request(app.server)
      .post('/v1/auth/password/reset/confirm')
      .send({
        phone_number: phone,
        code: code === '000000' ? '111111' : '000000',
        new_password: 'brand-new-pass'
      });
    expect(wrong.status).toBe(401);
    expect(wrong.body.code).toBe(40105);
    // The code request already spent one attempt.
    expect(wrong.body.details.remaining_attempts).toBe(1);

    const confirmed = await request(app.server)
      .post('/v1/auth/password/reset/confirm')
      .send({ phone_number: phone, code, new_password: 'brand-new-pass' });
    expect(confirmed.status).toBe(200);

    expect((await login(phone, 'brand-new-pass')).status).toBe(200);
    expect((await login(phone, PASSWORD)).status).toBe(401);
  });

  it('gives unknown numbers the same reset response', async () => {
    const resp = await request(app.server)
      .post('/v1/auth/password/reset/request')
      .send({ phone_number: '01099999998' });

    expect(resp.status).toBe(200);
    expect(resp.body.data.expires_in_sec).toBe(600);
    expect(resp.body.data.debug_code).toMatch(/^\d{6}$/);
    expect(await store.getResetCode('01099999998')).toBeUndefined();

    const attempts = await store.listAttempts({ phoneNumber: '01099999998' });
    expect(attempts).toHaveLength(1);
    expect(attempts[0]).toMatchObject({
      attemptType: 'password_reset',
      result: 'failed',
      failureReason: 'reset code requested'
    });
  });

  it('limits reset code requests for a number', async () => {
    const phone = '01012345678';
    await register(phone);
    const requestCode = () =>
      request(app.server).post('/v1/auth/password/reset/request').send({ phone_number: phone });

    const statuses: number[] = [];
    for (let i = 0; i < 4; i += 1) {
      statuses.push((await requestCode()).status);
    }
    expect(statuses).toEqual([200, 200, 429, 429]);

    const blocked = await requestCode();
    expect(blocked.body.code).toBe(42901);
    expect(blocked.body.details.blocked_until).toBe('2026-03-01T08:15:00.000Z');

    const attempts = await store.listAttempts({
      phoneNumber: phone,
      attemptType: 'password_reset'
    });
    const results = attempts.map((item) => item.result).sort();
    expect(results).toEqual(['blocked', 'blocked', 'failed', 'failed', 'failed']);

    expect((await login(phone, PASSWORD)).status).toBe(200);
  });

  it('closes the legacy credential allowance one credential lifetime after startup', async () => {
    const userId = await register('01012345680');
    const issuer = new CredentialService({ jwtSecret: 'test-secret', credentialTtlSec: 7 * 86400 });
    const legacy = issuer.issue({ id: userId, role: 'student' });

    vi.setSystemTime(baseTime + 86_400_000 - 1000);
    expect((await me(legacy.accessToken)).status).toBe(200);

    vi.setSystemTime(baseTime + 86_400_000);
    const rejected = await me(legacy.accessToken);
    expect(rejected.status).toBe(401);
    expect(rejected.body.code).toBe(40104);
  });

  it('blocks password reset without blocking sign-in', async () => {
    const phone = '01012345675';
    await register(phone);
    const confirm = () =>
      request(app.server)
        .post('/v1/auth/password/reset/confirm')
        .send({ phone_number: phone, code: '123456', new_password: 'brand-new-pass' });

    expect((await confirm()).body.details.remaining_attempts).toBe(2);
    expect((await confirm()).body.details.remaining_attempts).toBe(1);
    const blocked = await confirm();
    expect(blocked.status).toBe(429);
    expect(blocked.body.message).toBe(
      'Too many failed password reset attempts for this number. Try again in 15 minute(s). ' +
        'If these attempts were not made by you, contact support immediately.'
    );

    const request2 = await request(app.server)
      .post('/v1/auth/password/reset/request')
      .send({ phone_number: phone });
    expect(request2.status).toBe(429);

    expect((await login(phone, PASSWORD)).status).toBe(200);
  });

  it('validates registration input', async () => {
    await register('01012345676');

    const duplicate = await request(app.server)
      .post('/v1/auth/register')
      .send({ phone_number: '01012345676', password: PASSWORD, name: 'Again' });
    expect(duplicate.status).toBe(409);
    expect(duplicate.body.code).toBe(40901);

    const badPhone = await request(app.server)
      .post('/v1/auth/register')
      .send({ phone_number: '0101234567', password: PASSWORD, name: 'Short' });
    expect(badPhone.status).toBe(400);
    expect(badPhone.body.code).toBe(40000);

    const weak = await request(app.server)
      .post('/v1/auth/register')
      .send({ phone_number: '01012345677', password: 'password', name: 'Weak' });
    expect(weak.status).toBe(400);
    expect(weak.body.message).toBe('Password is too weak');

    const admin = await request(app.server)
      .post('/v1/auth/register')
      .send({ phone_number: '01012345679', password: PASSWORD, name: 'Sneaky', role: 'admin' });
    expect(admin.status).toBe(400);
  });
});
