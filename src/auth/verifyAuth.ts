import type { FastifyReply, FastifyRequest } from 'fastify';
import { type AuthUser, type UserRole, verifyToken } from './jwt.js';
import { ForbiddenError, UnauthorizedError } from '../errors.js';

declare module 'fastify' {
  interface FastifyRequest {
    user?: AuthUser;
  }
}

export interface VerifyAuthOptions {
  jwtSecret: string;
  cookieName: string;
}

function extractToken(request: FastifyRequest, cookieName: string): string | null {
  const header = request.headers.authorization;
  if (header && header.startsWith('Bearer ')) {
    const token = header.slice('Bearer '.length).trim();
    if (token) {
      return token;
    }
  }

  return request.cookies[cookieName] || null;
}

/**
 * preHandler: accepts a token from `Authorization: Bearer` or the session
 * cookie and puts the user on `request.user`.
 */
export function createVerifyAuth(options: VerifyAuthOptions) {
  return async function verifyAuth(request: FastifyRequest, _reply: FastifyReply): Promise<void> {
    const token = extractToken(request, options.cookieName);
    if (!token) {
      throw new UnauthorizedError('Authentication required');
    }

    const user = verifyToken(token, options.jwtSecret);
    if (!user) {
      request.log.warn('[auth] Invalid or expired token');
      throw new UnauthorizedError('Invalid or expired token');
    }

    request.user = user;
  };
}

/** Must run after verifyAuth. */
export function createRequireRole(...roles: UserRole[]) {
  return async function requireRole(request: FastifyRequest, _reply: FastifyReply): Promise<void> {
    if (!request.user) {
      throw new UnauthorizedError('Authentication required');
    }
    if (!roles.includes(request.user.role)) {
      request.log.warn({ userId: request.user.userId, role: request.user.role }, '[auth] Access denied');
      throw new ForbiddenError(`Requires one of roles: ${roles.join(', ')}`);
    }
  };
}

export function requireUser(request: FastifyRequest): AuthUser {
  if (!request.user) {
    throw new UnauthorizedError('Authentication required');
  }
  return request.user;
}
