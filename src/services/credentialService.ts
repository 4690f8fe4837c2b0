import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { GuardConfig } from '../config';
import { unauthenticated } from '../errors';
import type { User, UserRole } from '../types';

const ISSUER = 'auth-guard';

const claimsSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(['student', 'teacher', 'parent', 'admin']),
  session_token: z.string().min(1).optional()
});

export interface CredentialClaims {
  userId: string;
  role: UserRole;
  /** Absent on credentials minted before device sessions existed. */
  sessionToken?: string;
}

export interface IssuedCredential {
  accessToken: string;
  expiresInSec: number;
}

export class CredentialService {
  constructor(private readonly config: Pick<GuardConfig, 'jwtSecret' | 'credentialTtlSec'>) {}

  issue(user: Pick<User, 'id' | 'role'>, sessionToken?: string): IssuedCredential {
    const payload: Record<string, string> = { role: user.role };
    if (sessionToken) {
      payload.session_token = sessionToken;
    }
    const accessToken = jwt.sign(payload, this.config.jwtSecret, {
      algorithm: 'HS256',
      expiresIn: this.config.credentialTtlSec,
      issuer: ISSUER,
      subject: user.id
    });
    return { accessToken, expiresInSec: this.config.credentialTtlSec };
  }

  verify(token: string): CredentialClaims {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.config.jwtSecret, {
        algorithms: ['HS256'],
        issuer: ISSUER
      });
    } catch {
      throw unauthenticated();
    }
    if (typeof decoded === 'string') {
      throw unauthenticated();
    }
    const claims = claimsSchema.safeParse(decoded);
    if (!claims.success) {
      throw unauthenticated();
    }
    return {
      userId: claims.data.sub,
      role: claims.data.role,
      sessionToken: claims.data.session_token
    };
  }
}
