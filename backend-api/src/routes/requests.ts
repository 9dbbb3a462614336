import { Router, type Response } from 'express';
import { submitRequestBodySchema, updateStagesBodySchema } from '@procmon/shared';

import { requireEngineeringSession } from '../auth/middleware.js';
import { PersistenceError } from '../services/persistenceClient.js';
import {
  ValidationError,
  listProcurementRequests,
  submitProcurementRequest,
  updateProcurementStages,
} from '../services/requestsService.js';
import { logError } from '../utils/logger.js';

export const requestsRouter = Router();

function sendFailure(res: Response, e: unknown, action: string) {
  if (e instanceof ValidationError) {
    return res.status(400).json({ ok: false, error: e.message, kind: 'validation' });
  }
  if (e instanceof PersistenceError) {
    // service errors are shown to the user verbatim
    return res.status(e.kind === 'transport' ? 502 : 422).json({ ok: false, error: e.message, kind: e.kind });
  }
  logError(`${action} failed`, { error: String(e) });
  return res.status(500).json({ ok: false, error: String(e) });
}

requestsRouter.get('/', requireEngineeringSession, async (_req, res) => {
  try {
    const requests = await listProcurementRequests();
    return res.json({ ok: true, requests });
  } catch (e) {
    return sendFailure(res, e, 'list requests');
  }
});

requestsRouter.post('/', async (req, res) => {
  try {
    const parsed = submitRequestBodySchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ ok: false, error: 'invalid request body', kind: 'validation', details: parsed.error.flatten() });
    const requestId = await submitProcurementRequest(parsed.data);
    return res.json({ ok: true, requestId });
  } catch (e) {
    return sendFailure(res, e, 'submit request');
  }
});

requestsRouter.patch('/:requestId/stages', requireEngineeringSession, async (req, res) => {
  try {
    const parsed = updateStagesBodySchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ ok: false, error: 'invalid request body', kind: 'validation', details: parsed.error.flatten() });
    await updateProcurementStages(req.params.requestId, parsed.data);
    return res.json({ ok: true });
  } catch (e) {
    return sendFailure(res, e, 'update stages');
  }
});
