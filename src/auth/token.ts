/**
 * Access token codec.
 *
 * Compact HS256 tokens (`header.payload.signature`, base64url) whose only
 * claim is `exp` in epoch seconds. Validation never throws: anything that is
 * not a well-formed, correctly signed, unexpired token is simply invalid.
 */

import crypto from 'crypto';
import { AuthConfigError } from '../lib/errors.js';
import { isRecord } from '../lib/guards.js';

const HEADER = { alg: 'HS256', typ: 'JWT' } as const;
const SEGMENT = /^[A-Za-z0-9_-]+$/;

export type TokenValidation =
  | { valid: true; expiry: number }
  | { valid: false };

export function currentTimeSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

function encodeSegment(value: object): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}

function decodeSegment(segment: string): unknown {
  return JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'));
}

function sign(input: string, secret: string): string {
  return crypto.createHmac('sha256', secret).update(input).digest('base64url');
}

function safeEqual(a: string, b: string): boolean {
  const bufA = Buffer.from(a);
  const bufB = Buffer.from(b);
  if (bufA.length !== bufB.length) return false;
  return crypto.timingSafeEqual(bufA, bufB);
}

export function issueToken(secret: string, ttlSeconds: number, now: number = currentTimeSeconds()): string {
  if (!secret) {
    throw new AuthConfigError('Token secret is not configured');
  }
  if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) {
    throw new RangeError(`ttlSeconds must be a positive number, got ${ttlSeconds}`);
  }

  const header = encodeSegment(HEADER);
  const payload = encodeSegment({ exp: Math.floor(now + ttlSeconds) });
  return `${header}.${payload}.${sign(`${header}.${payload}`, secret)}`;
}

export function validateToken(token: string, secret: string, now: number = currentTimeSeconds()): TokenValidation {
  const invalid: TokenValidation = { valid: false };
  if (!secret || typeof token !== 'string') return invalid;

  const parts = token.trim().split('.');
  if (parts.length !== 3 || !parts.every((p) => SEGMENT.test(p))) return invalid;
  const [header, payload, signature] = parts;

  if (!safeEqual(signature, sign(`${header}.${payload}`, secret))) return invalid;

  let decodedHeader: unknown;
  let claims: unknown;
  try {
    decodedHeader = decodeSegment(header);
    claims = decodeSegment(payload);
  } catch {
    return invalid;
  }

  if (!isRecord(decodedHeader) || decodedHeader.alg !== HEADER.alg) return invalid;
  if (!isRecord(claims)) return invalid;

  const exp = claims.exp;
  if (typeof exp !== 'number' || !Number.isFinite(exp)) return invalid;

  return exp >= now ? { valid: true, expiry: exp } : invalid;
}
