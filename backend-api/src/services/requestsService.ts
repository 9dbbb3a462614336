import {
  allStageKeys,
  needsDateBackfill,
  normalizeDate,
  normalizeRecord,
  normalizeState,
  serializeStagePatch,
  todayIsoDate,
  withLowerCaseAliases,
  type ProcurementRequest,
  type StageKey,
  type StageState,
  type SubmitRequestBody,
  type UpdateStagesBody,
} from '@procmon/shared';

import { shouldSendLowerCaseFields } from '../config.js';
import { logDebug, logInfo } from '../utils/logger.js';
import { listRequests, submitRequest, updateRequest } from './persistenceClient.js';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

const DEFAULT_MIME = 'application/octet-stream';

export async function listProcurementRequests(): Promise<ProcurementRequest[]> {
  const rows = await listRequests();
  const requests = rows.map(normalizeRecord).filter((r) => r.requestId !== '');
  const backfill = requests.reduce(
    (acc, r) => acc + allStageKeys().filter((key) => needsDateBackfill(r.stages[key])).length,
    0,
  );
  if (backfill > 0) logDebug('done stages without date', { count: backfill });
  return requests;
}

export async function submitProcurementRequest(body: SubmitRequestBody, now: Date = new Date()): Promise<string> {
  const title = body.title.trim();
  if (!title) throw new ValidationError('title is required');
  if (body.files.length === 0) throw new ValidationError('at least one file is required');

  let uploadDate = todayIsoDate(now);
  const rawDate = (body.uploadDate ?? '').trim();
  if (rawDate) {
    const parsed = normalizeDate(rawDate);
    if (!parsed) throw new ValidationError(`invalid upload date: ${rawDate}`);
    uploadDate = parsed;
  }

  const requestId = await submitRequest({
    uploadDate,
    shipReference: (body.shipReference ?? '').trim(),
    title,
    files: body.files.map((f) => ({
      name: f.name,
      mime: (f.mime ?? '').trim() || DEFAULT_MIME,
      base64Payload: f.base64Payload,
    })),
  });
  logInfo('procurement request submitted', { requestId, files: body.files.length });
  return requestId;
}

/**
 * Every stage goes through normalizeState before serialization. A Done stage whose date
 * cannot be read rejects the whole patch; nothing is sent in that case.
 */
export function buildStagePatch(body: UpdateStagesBody): Record<string, string> {
  const stages: Partial<Record<StageKey, StageState>> = {};
  for (const key of allStageKeys()) {
    const input = body.stages[key];
    if (!input) continue;
    const state = normalizeState(input.status, input.date);
    const rawDate = (input.date ?? '').trim();
    if (state.status === 'Done' && rawDate && !state.date) {
      throw new ValidationError(`invalid date for ${key}: ${rawDate}`);
    }
    stages[key] = state;
  }
  const fields = serializeStagePatch(stages);
  if (Object.keys(fields).length === 0) throw new ValidationError('no stages to update');
  return shouldSendLowerCaseFields() ? withLowerCaseAliases(fields) : fields;
}

export async function updateProcurementStages(requestId: string, body: UpdateStagesBody): Promise<void> {
  const id = requestId.trim();
  if (!id) throw new ValidationError('request id is required');
  const fields = buildStagePatch(body);
  await updateRequest(id, fields);
  logInfo('procurement stages updated', { requestId: id, stages: Object.keys(body.stages).length });
}
