import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';

export const USER_ROLES = ['user', 'moderator', 'admin'] as const;
export type UserRole = (typeof USER_ROLES)[number];

export interface AuthUser {
  userId: string;
  email: string | null;
  role: UserRole;
}

const tokenPayloadSchema = z.object({
  sub: z.string().min(1),
  email: z.string().email().optional(),
  role: z.enum(USER_ROLES).default('user'),
});

export interface CreateTokenParams {
  userId: string;
  email?: string;
  role?: UserRole;
  secret: string;
  expiresInDays?: number; // 7 by default
}

/**
 * Tokens are issued by the account service; this is used by scripts and tests.
 */
export function createToken(params: CreateTokenParams): string {
  const { userId, email, role = 'user', secret, expiresInDays = 7 } = params;

  return jwt.sign({ ...(email ? { email } : {}), role }, secret, {
    algorithm: 'HS256',
    subject: userId,
    expiresIn: expiresInDays * 24 * 60 * 60,
  });
}

/**
 * Returns the user carried by a valid HS256 token, or null for anything else
 * (bad signature, expired, malformed payload).
 */
export function verifyToken(token: string, secret: string): AuthUser | null {
  let decoded: string | JwtPayload;
  try {
    decoded = jwt.verify(token, secret, { algorithms: ['HS256'] });
  } catch {
    return null;
  }

  const parsed = tokenPayloadSchema.safeParse(decoded);
  if (!parsed.success) {
    return null;
  }

  return {
    userId: parsed.data.sub,
    email: parsed.data.email ?? null,
    role: parsed.data.role,
  };
}
