import type { NextFunction, Request, Response } from 'express';

import { verifySessionToken } from './session.js';

export function extractBearerToken(req: Request): string | null {
  const raw = req.header('authorization') ?? '';
  const m = raw.match(/^Bearer\s+(.+)$/i);
  const token = m?.[1];
  return token ? token.trim() : null;
}

export async function requireEngineeringSession(req: Request, res: Response, next: NextFunction) {
  const token = extractBearerToken(req);
  if (!token) return res.status(401).json({ ok: false, error: 'missing bearer token' });
  try {
    const session = await verifySessionToken(token);
    if (!session.authenticated) return res.status(401).json({ ok: false, error: 'not authenticated' });
  } catch {
    return res.status(401).json({ ok: false, error: 'invalid token' });
  }
  return next();
}
