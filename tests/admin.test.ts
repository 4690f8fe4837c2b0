import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { buildServer } from '../src/server';
import { InMemoryStore } from '../src/store';
import { hashPassword } from '../src/utils';

const MINUTE = 60_000;
const PASSWORD = 'correct-horse-1';
const ADMIN_PHONE = '01000000001';
const STUDENT_PHONE = '01012345678';

describe('operator endpoints', () => {
  const baseTime = new Date('2026-03-01T08:00:00.000Z').getTime();
  let store = new InMemoryStore();
  let app = buildServer({ store });
  let adminToken = '';

  beforeEach(async () => {
    vi.useFakeTimers();
    vi.setSystemTime(baseTime);
    store = new InMemoryStore();
    await store.createUser({
      id: 'usr_admin',
      phoneNumber: ADMIN_PHONE,
      name: 'Operator',
      passwordHash: hashPassword(PASSWORD),
      role: 'admin',
      maxAllowedDevices: 2,
      createdAt: baseTime
    });
    app = buildServer({ store, config: { jwtSecret: 'test-secret' } });
    await app.ready();

    const login = await request(app.server)
      .post('/v1/auth/login')
      .send({ phone_number: ADMIN_PHONE, password: PASSWORD });
    adminToken = login.body.data.access_token;
  });

  afterEach(async () => {
    await app.close();
    vi.useRealTimers();
  });

  async function registerStudent(): Promise<string> {
    const resp = await request(app.server)
      .post('/v1/auth/register')
      .send({ phone_number: STUDENT_PHONE, password: PASSWORD, name: 'Student' });
    return resp.body.data.id as string;
  }

  async function failLogins(times: number): Promise<void> {
    for (let i = 0; i < times; i += 1) {
      await request(app.server)
        .post('/v1/auth/login')
        .send({ phone_number: STUDENT_PHONE, password: 'wrong-password' });
    }
  }

  function asAdmin(method: 'get' | 'post' | 'patch' | 'delete', path: string) {
    return request(app.server)[method](path).set('authorization', `Bearer ${adminToken}`);
  }

  it('requires an operator', async () => {
    await registerStudent();
    const login = await request(app.server)
      .post('/v1/auth/login')
      .send({ phone_number: STUDENT_PHONE, password: PASSWORD });

    const forbidden = await request(app.server)
      .get('/v1/admin/security/blocks')
      .set('authorization', `Bearer ${login.body.data.access_token}`);
    expect(forbidden.status).toBe(403);
    expect(forbidden.body.code).toBe(40301);

    const anonymous = await request(app.server).get('/v1/admin/security/stats');
    expect(anonymous.status).toBe(401);
  });

  it('lists blocks and lifts them by phone number', async () => {
    await registerStudent();
    await failLogins(3);

    const list = await asAdmin('get', '/v1/admin/security/blocks?is_active=true');
    expect(list.status).toBe(200);
    expect(list.body.data.total).toBe(1);
    expect(list.body.data.page_size).toBe(20);
    const [block] = list.body.data.items;
    expect(block).toMatchObject({
      phone_number: STUDENT_PHONE,
      block_type: 'login',
      block_level: 1,
      blocked_until: '2026-03-01T08:15:00.000Z'
    });
    expect(block.failed_attempts).toHaveLength(3);

    const detail = await asAdmin('get', `/v1/admin/security/blocks/${block.id}`);
    expect(detail.body.data.id).toBe(block.id);

    const unblock = await asAdmin('post', '/v1/admin/security/unblock').send({
      phone_number: STUDENT_PHONE,
      reason: 'identity confirmed'
    });
    expect(unblock.status).toBe(200);
    expect(unblock.body.data.unblocked_count).toBe(1);

    const again = await asAdmin('post', '/v1/admin/security/unblock').send({
      phone_number: STUDENT_PHONE
    });
    expect(again.status).toBe(404);
    expect(again.body.code).toBe(40401);

    const lifted = await asAdmin('get', `/v1/admin/security/blocks/${block.id}`);
    expect(lifted.body.data).toMatchObject({
      is_active: false,
      manually_unblocked: true,
      unblocked_by: 'usr_admin',
      unblock_reason: 'identity confirmed'
    });

    const login = await request(app.server)
      .post('/v1/auth/login')
      .send({ phone_number: STUDENT_PHONE, password: PASSWORD });
    expect(login.status).toBe(200);
  });

  it('deactivates a single block', async () => {
    await registerStudent();
    await failLogins(3);
    const [block] = (await store.listBlocks({ phoneNumber: STUDENT_PHONE })).map((item) => item.id);

    const first = await asAdmin('post', `/v1/admin/security/blocks/${block}/deactivate`).send({});
    expect(first.status).toBe(200);
    expect(first.body.data.unblock_reason).toBe('Manually unblocked by an administrator');

    const second = await asAdmin('post', `/v1/admin/security/blocks/${block}/deactivate`);
    expect(second.status).toBe(400);
    expect(second.body.code).toBe(40010);

    const missing = await asAdmin('get', '/v1/admin/security/blocks/blk_missing');
    expect(missing.status).toBe(404);
  });

  it('filters attempts and reports statistics', async () => {
    await registerStudent();
    await failLogins(4);

    const failed = await asAdmin('get', '/v1/admin/security/attempts?result=failed&phone=0101234');
    expect(failed.body.data.total).toBe(3);
    expect(failed.body.data.items[0]).toMatchObject({
      phone_number: STUDENT_PHONE,
      attempt_type: 'login',
      failure_reason: 'invalid credentials'
    });

    const paged = await asAdmin('get', '/v1/admin/security/attempts?page=2&page_size=2');
    expect(paged.body.data.total).toBe(5);
    expect(paged.body.data.items).toHaveLength(2);

    const stats = await asAdmin('get', '/v1/admin/security/stats');
    expect(stats.body.data).toMatchObject({
      total_blocks: 1,
      active_blocks: 1,
      blocks_today: 1,
      blocks_this_week: 1,
      total_attempts: 5,
      failed_attempts_today: 3,
      blocked_attempts_today: 1,
      top_blocked_numbers: [{ phone_number: STUDENT_PHONE, block_count: 1 }],
      block_types_distribution: { login: 1 }
    });

    const history = await asAdmin('get', `/v1/admin/security/phones/${STUDENT_PHONE}/history`);
    expect(history.body.data.current_status.block_level).toBe(1);
    expect(history.body.data.statistics).toEqual({
      total_blocks: 1,
      active_blocks: 1,
      failed_attempts: 3,
      successful_attempts: 0
    });
    expect(history.body.data.recent_attempts).toHaveLength(4);
  });

  it('manages the devices of a user', async () => {
    const userId = await registerStudent();
    const tokens: string[] = [];
    for (const [i, device] of ['device-A', 'device-B'].entries()) {
      vi.setSystemTime(baseTime + i * MINUTE);
      const resp = await request(app.server)
        .post('/v1/auth/login')
        .set('x-device-id', device)
        .send({ phone_number: STUDENT_PHONE, password: PASSWORD });
      tokens.push(resp.body.data.access_token);
    }

    const devices = await asAdmin('get', `/v1/admin/users/${userId}/devices`);
    expect(devices.body.data.active_sessions).toBe(2);

    const lowered = await asAdmin('patch', `/v1/admin/users/${userId}/max-devices`).send({
      max_allowed_devices: 1
    });
    expect(lowered.body.data).toEqual({ max_allowed_devices: 1, active_sessions: 1 });

    const afterCap = await asAdmin('get', `/v1/admin/users/${userId}/devices?active_only=true`);
    const [remaining] = afterCap.body.data.items;
    expect(remaining.device_id).toBe('device-B');

    const removed = await asAdmin('delete', `/v1/admin/users/${userId}/devices/${remaining.id}`);
    expect(removed.body.data).toMatchObject({ is_active: false, deactivation_reason: 'revoked' });
    const rejected = await request(app.server)
      .get('/v1/me')
      .set('authorization', `Bearer ${tokens[1]}`);
    expect(rejected.body.code).toBe(40104);

    const revokeAll = await asAdmin('post', `/v1/admin/users/${userId}/devices/revoke-all`);
    expect(revokeAll.body.data.revoked_count).toBe(0);

    const unknown = await asAdmin('get', '/v1/admin/users/usr_missing/devices');
    expect(unknown.status).toBe(404);

    const invalid = await asAdmin('patch', `/v1/admin/users/${userId}/max-devices`).send({
      max_allowed_devices: 0
    });
    expect(invalid.status).toBe(400);
    expect(invalid.body.code).toBe(40000);
  });
});
