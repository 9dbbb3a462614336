import { Router } from 'express';

import { backendVersion } from '../version.js';

export const healthRouter = Router();

healthRouter.get('/', (_req, res) => {
  res.json({ ok: true, version: backendVersion });
});
