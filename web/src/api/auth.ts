import { loginResponseSchema, sessionResponseSchema } from '@procmon/shared';

import { apiCall, clearSessionToken, getSessionToken, jsonInit, setSessionToken } from './client.js';

export async function login(password: string) {
  const r = await apiCall('/auth/login', jsonInit('POST', { password }), loginResponseSchema);
  if (r.ok) setSessionToken(r.token);
  return r;
}

export function logout() {
  clearSessionToken();
}

export async function currentSession() {
  if (!getSessionToken()) return null;
  return apiCall('/auth/session', { method: 'GET' }, sessionResponseSchema);
}
