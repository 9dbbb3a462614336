import type { z } from 'zod';
import { apiFailureSchema, type ApiFailure } from '@procmon/shared';

const API_BASE = import.meta.env.VITE_API_BASE_URL ?? '';

const TOKEN_KEY = 'procmon_session_token';
const LOG_KEY = 'procmon_web_log';

export type ApiResult<T> = ({ ok: true } & T) | ApiFailure;

// sessionStorage: the engineering login lasts for one browser session only.
export function getSessionToken(): string | null {
  return sessionStorage.getItem(TOKEN_KEY);
}

export function setSessionToken(token: string) {
  sessionStorage.setItem(TOKEN_KEY, token);
}

export function clearSessionToken() {
  sessionStorage.removeItem(TOKEN_KEY);
}

export async function apiFetch(path: string, init?: RequestInit): Promise<{ ok: boolean; status: number; json?: unknown; text?: string }> {
  const headers = new Headers(init?.headers ?? {});
  const token = getSessionToken();
  if (token) headers.set('Authorization', `Bearer ${token}`);

  if (localStorage.getItem(LOG_KEY) === 'true') {
    const method = init?.method ?? 'GET';
    console.info(`[web api] ${method} ${path}`);
  }

  const res = await fetch(`${API_BASE}${path}`, { ...init, headers });
  const status = res.status;
  const text = await res.text().catch(() => '');
  let json: unknown;
  try {
    json = text ? JSON.parse(text) : undefined;
  } catch {
    json = undefined;
  }
  if (status === 401) clearSessionToken();
  return { ok: res.ok, status, json, text };
}

/**
 * Sends one request and validates the answer. Network errors and unexpected bodies come back
 * as transport failures; `{ ok: false, error }` answers are passed through unchanged.
 */
export async function apiCall<S extends z.ZodTypeAny>(path: string, init: RequestInit, schema: S): Promise<ApiResult<z.infer<S>>> {
  let r: Awaited<ReturnType<typeof apiFetch>>;
  try {
    r = await apiFetch(path, init);
  } catch (e) {
    return { ok: false, error: String(e), kind: 'transport' };
  }
  const failure = apiFailureSchema.safeParse(r.json);
  if (failure.success) return failure.data;
  const parsed = schema.safeParse(r.json);
  if (parsed.success) return { ...parsed.data, ok: true };
  if (!r.ok) return { ok: false, error: `HTTP ${r.status}`, kind: 'transport' };
  return { ok: false, error: 'unexpected server response', kind: 'transport' };
}

export function jsonInit(method: string, body: unknown): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}
