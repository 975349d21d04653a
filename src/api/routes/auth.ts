import { Router, type Request, type Response } from 'express';
import crypto from 'crypto';
import { issueToken, validateToken } from '../../auth/token.js';
import { logger as rootLogger } from '../../lib/logger.js';
import { isRecord } from '../../lib/guards.js';

const log = rootLogger.child({ component: 'auth-routes' });

export interface AuthRouteConfig {
  tokenSecret: string | null;
  adminSecret: string | null;
  defaultTtlSeconds: number;
}

// Timing-safe comparison to prevent timing attacks
export function secureCompare(a: string, b: string): boolean {
  const bufA = Buffer.from(a);
  const bufB = Buffer.from(b);
  if (bufA.length !== bufB.length) {
    // Still do a comparison so length mismatches cost the same
    crypto.timingSafeEqual(bufA, bufA);
    return false;
  }
  return crypto.timingSafeEqual(bufA, bufB);
}

export function createAuthRouter(config: AuthRouteConfig): Router {
  const router = Router();

  // POST /api/v1/auth/tokens
  // Issue an access token. Admin only.
  router.post('/tokens', (req: Request, res: Response) => {
    const provided = req.header('x-admin-secret') ?? '';
    if (!config.adminSecret || !secureCompare(provided, config.adminSecret)) {
      res.status(401).json({ success: false, error: 'Unauthorized' });
      return;
    }
    if (!config.tokenSecret) {
      res.status(503).json({ success: false, error: 'Token secret is not configured' });
      return;
    }

    const body: unknown = req.body;
    const ttlRaw = isRecord(body) ? body.ttlSeconds : undefined;
    const ttlSeconds = ttlRaw === undefined ? config.defaultTtlSeconds : ttlRaw;
    if (typeof ttlSeconds !== 'number' || !Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      res.status(400).json({ success: false, error: 'ttlSeconds must be a positive integer' });
      return;
    }

    const token = issueToken(config.tokenSecret, ttlSeconds);
    const validation = validateToken(token, config.tokenSecret);
    log.info({ ttlSeconds }, 'Access token issued');

    res.status(201).json({
      success: true,
      token,
      expiresAt: validation.valid ? validation.expiry : null,
    });
  });

  // POST /api/v1/auth/verify
  router.post('/verify', (req: Request, res: Response) => {
    const body: unknown = req.body;
    const token = isRecord(body) ? body.token : undefined;
    if (typeof token !== 'string' || token.length === 0) {
      res.status(400).json({ success: false, error: 'Missing required field: token' });
      return;
    }

    const result = config.tokenSecret ? validateToken(token, config.tokenSecret) : { valid: false as const };
    res.json({ success: true, ...result });
  });

  return router;
}
