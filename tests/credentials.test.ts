import { afterEach, describe, expect, it, vi } from 'vitest';
import { CredentialService } from '../src/services/credentialService';

describe('credential service', () => {
  const credentials = new CredentialService({ jwtSecret: 'test-secret', credentialTtlSec: 3600 });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('carries the session token as a claim', () => {
    const issued = credentials.issue({ id: 'usr_1', role: 'student' }, 'session-token-1');

    expect(issued.expiresInSec).toBe(3600);
    expect(credentials.verify(issued.accessToken)).toEqual({
      userId: 'usr_1',
      role: 'student',
      sessionToken: 'session-token-1'
    });
  });

  it('omits the claim when there is no session', () => {
    const issued = credentials.issue({ id: 'usr_2', role: 'teacher' });

    expect(credentials.verify(issued.accessToken).sessionToken).toBeUndefined();
  });

  it('rejects expired and foreign tokens', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T08:00:00.000Z'));
    const issued = credentials.issue({ id: 'usr_3', role: 'parent' });

    vi.setSystemTime(new Date('2026-03-01T09:00:01.000Z'));
    expect(() => credentials.verify(issued.accessToken)).toThrow(
      'Not signed in or credential is no longer valid'
    );

    const foreign = new CredentialService({ jwtSecret: 'other-secret', credentialTtlSec: 3600 });
    const foreignToken = foreign.issue({ id: 'usr_3', role: 'parent' }).accessToken;
    expect(() => credentials.verify(foreignToken)).toThrow(
      'Not signed in or credential is no longer valid'
    );
  });
});
