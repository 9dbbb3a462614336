import { Router } from 'express';
import { loginBodySchema, authenticatedSession } from '@procmon/shared';

import { requireEngineeringSession } from '../auth/middleware.js';
import { signSessionToken } from '../auth/session.js';
import { getEngineeringKey } from '../config.js';
import { logError, logWarn } from '../utils/logger.js';

export const authRouter = Router();

authRouter.post('/login', async (req, res) => {
  try {
    const parsed = loginBodySchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ ok: false, error: 'invalid request body', kind: 'validation', details: parsed.error.flatten() });

    const key = getEngineeringKey();
    if (!key) return res.status(503).json({ ok: false, error: 'engineering key is not configured' });
    if (parsed.data.password !== key) {
      logWarn('engineering login rejected');
      return res.status(401).json({ ok: false, error: 'invalid password' });
    }

    const token = await signSessionToken();
    return res.json({ ok: true, token, session: authenticatedSession() });
  } catch (e) {
    logError('auth login failed', { error: String(e) });
    return res.status(500).json({ ok: false, error: String(e) });
  }
});

authRouter.get('/session', requireEngineeringSession, (_req, res) => {
  res.json({ ok: true, session: authenticatedSession() });
});
