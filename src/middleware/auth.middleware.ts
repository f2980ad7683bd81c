import { FastifyRequest } from 'fastify';
import { JWTService } from '../services/jwt.service';
import { Role } from '../types/entry-pass.types';
import { ForbiddenError, UnauthorizedError } from '../errors';

export interface RequestPrincipal {
  id: string;
  username: string;
  role: Role;
  jti: string;
  exp: number;
}

// Extend FastifyRequest to include user property
declare module 'fastify' {
  interface FastifyRequest {
    user?: RequestPrincipal;
  }
}

export function requireUser(request: FastifyRequest): RequestPrincipal {
  if (!request.user) {
    throw new UnauthorizedError();
  }
  return request.user;
}

export function createAuthMiddleware(jwtService: JWTService) {
  return {
    /**
     * Verifies the bearer token and populates request.user.
     */
    authenticate: async (request: FastifyRequest) => {
      const authHeader = request.headers.authorization;
      if (!authHeader || !authHeader.startsWith('Bearer ')) {
        throw new UnauthorizedError('Missing or invalid authorization header');
      }

      const payload = jwtService.verify(authHeader.substring(7).trim());
      request.user = {
        id: payload.sub,
        username: payload.username,
        role: payload.role,
        jti: payload.jti,
        exp: payload.exp,
      };
    },

    requireRole: (...roles: Role[]) => {
      return async (request: FastifyRequest) => {
        const user = requireUser(request);
        if (!roles.includes(user.role)) {
          throw new ForbiddenError(`Requires role: ${roles.join(' or ')}`);
        }
      };
    },
  };
}
