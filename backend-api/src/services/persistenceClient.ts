import type { z } from 'zod';
import {
  persistenceListResponseSchema,
  persistenceSubmitResponseSchema,
  persistenceUpdateResponseSchema,
  type FailureKind,
  type RawRecord,
  type StageWireFields,
  type UploadFile,
} from '@procmon/shared';

import { getEngineeringKey, getPersistenceTimeoutMs, getPersistenceUrl } from '../config.js';
import { logDebug, logWarn } from '../utils/logger.js';

export type PersistenceFailureKind = Exclude<FailureKind, 'validation'>;

export class PersistenceError extends Error {
  constructor(
    readonly kind: PersistenceFailureKind,
    message: string,
  ) {
    super(message);
    this.name = 'PersistenceError';
  }
}

export type SubmitRequestInput = {
  uploadDate: string;
  shipReference: string;
  title: string;
  files: UploadFile[];
};

type Action = 'list_requests' | 'submit_request' | 'update_request';

function requireKey(): string {
  const key = getEngineeringKey();
  if (!key) throw new PersistenceError('application', 'engineering key is not configured');
  return key;
}

function isTimeout(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'name' in e && e.name === 'TimeoutError';
}

/** One POST, one JSON answer. No retries: a failure ends the user action that caused it. */
async function postAction<T extends { ok: boolean; error?: string | null }>(
  action: Action,
  payload: Record<string, unknown>,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T> {
  const url = getPersistenceUrl();
  const timeoutMs = getPersistenceTimeoutMs();
  logDebug('persistence call', { action });

  let res: Response;
  try {
    res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ action, ...payload }),
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (e) {
    const reason = isTimeout(e) ? `timeout after ${timeoutMs} ms` : String(e);
    logWarn('persistence unreachable', { action, reason });
    throw new PersistenceError('transport', `persistence service unreachable: ${reason}`);
  }

  let text: string;
  try {
    text = await res.text();
  } catch (e) {
    const reason = isTimeout(e) ? `timeout after ${timeoutMs} ms` : String(e);
    logWarn('persistence response body unreadable', { action, reason });
    throw new PersistenceError('transport', `persistence response unreadable: ${reason}`);
  }
  if (!res.ok) {
    logWarn('persistence http error', { action, status: res.status });
    throw new PersistenceError('transport', `persistence HTTP ${res.status}: ${text.slice(0, 200) || 'no body'}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    logWarn('persistence returned malformed json', { action });
    throw new PersistenceError('transport', 'persistence service returned malformed JSON');
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    logWarn('persistence returned unexpected shape', { action, issues: parsed.error.issues.length });
    throw new PersistenceError('transport', 'persistence service returned an unexpected response');
  }
  if (!parsed.data.ok) {
    throw new PersistenceError('application', parsed.data.error || `${action} failed`);
  }
  return parsed.data;
}

export async function listRequests(): Promise<RawRecord[]> {
  const r = await postAction('list_requests', { key: requireKey() }, persistenceListResponseSchema);
  return r.data ?? r.rows ?? [];
}

export async function submitRequest(input: SubmitRequestInput): Promise<string> {
  const r = await postAction(
    'submit_request',
    {
      tanggal_upload: input.uploadDate,
      no_spbj_kapal: input.shipReference,
      judul_permintaan: input.title,
      files: input.files.map((f) => ({ name: f.name, mime: f.mime, base64Payload: f.base64Payload })),
    },
    persistenceSubmitResponseSchema,
  );
  const requestId = r.request_id == null ? '' : String(r.request_id);
  if (!requestId) throw new PersistenceError('application', 'submit_request returned no request_id');
  return requestId;
}

export async function updateRequest(requestId: string, fields: StageWireFields): Promise<void> {
  await postAction('update_request', { key: requireKey(), request_id: requestId, fields }, persistenceUpdateResponseSchema);
}
