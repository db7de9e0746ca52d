/**
 * Orchestrator Authentication
 *
 * Bearer JWTs signed with MCP_AUTH_SECRET guard both the MCP socket and the
 * device HTTP routes. With no secret configured, every caller is accepted.
 */

import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { componentLogger } from '../services/logger';

const log = componentLogger('Auth');

const claimsSchema = z.object({
  sub: z.string().min(1),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

export type OrchestratorClaims = z.infer<typeof claimsSchema>;

export type AuthResult =
  | { ok: true; claims: OrchestratorClaims | null }
  | { ok: false; reason: 'missing' | 'expired' | 'invalid' };

/**
 * Check an Authorization header value against the secret.
 */
export function verifyBearer(authHeader: string | undefined, secret: string | undefined): AuthResult {
  if (!secret) {
    return { ok: true, claims: null };
  }
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return { ok: false, reason: 'missing' };
  }

  const token = authHeader.substring(7);
  try {
    const parsed = claimsSchema.safeParse(jwt.verify(token, secret));
    if (!parsed.success) {
      return { ok: false, reason: 'invalid' };
    }
    return { ok: true, claims: parsed.data };
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      return { ok: false, reason: 'expired' };
    }
    if (error instanceof jwt.JsonWebTokenError) {
      return { ok: false, reason: 'invalid' };
    }
    throw error;
  }
}

/**
 * Express guard for the device routes
 */
export function requireAuth(secret: string | undefined) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = verifyBearer(req.headers.authorization, secret);
    if (result.ok) {
      next();
      return;
    }

    log.warn('Rejected HTTP request', { path: req.path, reason: result.reason });
    if (result.reason === 'expired') {
      res.status(401).json({ error: 'Token expired', code: 'TOKEN_EXPIRED' });
      return;
    }
    res.status(401).json({ error: result.reason === 'missing' ? 'Authentication required' : 'Invalid token' });
  };
}

/**
 * Issue a token for an orchestrator (provisioning and tests)
 */
export function generateOrchestratorToken(secret: string, subject: string, expiresInSeconds = 12 * 60 * 60): string {
  return jwt.sign({}, secret, { subject, expiresIn: expiresInSeconds });
}
