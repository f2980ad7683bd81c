import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { Role } from '../types/entry-pass.types';
import { InvalidTokenError } from '../errors';

export interface TokenSubject {
  id: string;
  username: string;
  role: Role;
}

export interface AccessTokenPayload {
  sub: string;
  username: string;
  role: Role;
  jti: string;
  iat: number;
  exp: number;
}

export interface JwtConfig {
  JWT_SECRET: string;
  JWT_EXPIRES_IN_SECONDS: number;
}

const ISSUER = 'entry-pass-service';
const ROLES: readonly Role[] = ['admin', 'scanner', 'user'];

function isRole(value: unknown): value is Role {
  return ROLES.some((role) => role === value);
}

export class JWTService {
  // jti -> expiry (seconds since epoch)
  private readonly revoked = new Map<string, number>();

  constructor(private readonly config: JwtConfig) {}

  sign(subject: TokenSubject): { token: string; payload: AccessTokenPayload } {
    const token = jwt.sign(
      { username: subject.username, role: subject.role },
      this.config.JWT_SECRET,
      {
        algorithm: 'HS256',
        subject: subject.id,
        jwtid: uuidv4(),
        issuer: ISSUER,
        expiresIn: this.config.JWT_EXPIRES_IN_SECONDS,
      }
    );
    return { token, payload: this.verify(token) };
  }

  verify(token: string): AccessTokenPayload {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.config.JWT_SECRET, { algorithms: ['HS256'], issuer: ISSUER });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new InvalidTokenError('Token has expired');
      }
      throw new InvalidTokenError();
    }

    if (
      typeof decoded === 'string' ||
      typeof decoded.sub !== 'string' ||
      typeof decoded.jti !== 'string' ||
      typeof decoded.username !== 'string' ||
      typeof decoded.iat !== 'number' ||
      typeof decoded.exp !== 'number' ||
      !isRole(decoded.role)
    ) {
      throw new InvalidTokenError('Malformed token');
    }

    if (this.revoked.has(decoded.jti)) {
      throw new InvalidTokenError('Token has been revoked');
    }

    return {
      sub: decoded.sub,
      username: decoded.username,
      role: decoded.role,
      jti: decoded.jti,
      iat: decoded.iat,
      exp: decoded.exp,
    };
  }

  revoke(payload: Pick<AccessTokenPayload, 'jti' | 'exp'>): void {
    this.pruneRevoked();
    this.revoked.set(payload.jti, payload.exp);
  }

  private pruneRevoked(): void {
    const now = Math.floor(Date.now() / 1000);
    for (const [jti, exp] of this.revoked) {
      if (exp <= now) this.revoked.delete(jti);
    }
  }
}
