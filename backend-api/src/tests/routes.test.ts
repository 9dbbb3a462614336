import { beforeEach, describe, expect, it, vi } from 'vitest';
import request from 'supertest';

const { listRequests, submitRequest, updateRequest } = vi.hoisted(() => ({
  listRequests: vi.fn(),
  submitRequest: vi.fn(),
  updateRequest: vi.fn(),
}));

vi.mock('../services/persistenceClient.js', async () => {
  const actual = await vi.importActual<typeof import('../services/persistenceClient.js')>('../services/persistenceClient.js');
  return { ...actual, listRequests, submitRequest, updateRequest };
});

vi.mock('../utils/logger.js', () => ({
  logDebug: vi.fn(),
  logInfo: vi.fn(),
  logWarn: vi.fn(),
  logError: vi.fn(),
}));

import { createApp } from '../app.js';
import { backendVersion } from '../version.js';
import { PersistenceError } from '../services/persistenceClient.js';

async function loginToken(): Promise<string> {
  const res = await request(createApp()).post('/auth/login').send({ password: 'test-secret' });
  expect(res.status).toBe(200);
  return String(res.body.token);
}

describe('backend routes', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    process.env.PROCMON_ENGINEERING_KEY = 'test-secret';
    process.env.PROCMON_SESSION_SECRET = 'test-session-secret-0123456789abcdef';
    delete process.env.PROCMON_PERSISTENCE_LOWERCASE_FIELDS;
  });

  it('GET /health returns ok', async () => {
    const res = await request(createApp()).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true, version: backendVersion });
  });

  it('POST /auth/login rejects a wrong password', async () => {
    const res = await request(createApp()).post('/auth/login').send({ password: 'nope' });
    expect(res.status).toBe(401);
    expect(res.body).toEqual({ ok: false, error: 'invalid password' });
  });

  it('POST /auth/login answers 503 when no key is configured', async () => {
    process.env.PROCMON_ENGINEERING_KEY = '';
    const res = await request(createApp()).post('/auth/login').send({ password: 'anything' });
    expect(res.status).toBe(503);
  });

  it('POST /auth/login issues a session token', async () => {
    const res = await request(createApp()).post('/auth/login').send({ password: 'test-secret' });
    expect(res.status).toBe(200);
    expect(res.body.session).toEqual({ authenticated: true });
    const check = await request(createApp()).get('/auth/session').set('Authorization', `Bearer ${String(res.body.token)}`);
    expect(check.status).toBe(200);
    expect(check.body.session).toEqual({ authenticated: true });
  });

  it('GET /requests requires a session', async () => {
    const missing = await request(createApp()).get('/requests');
    expect(missing.status).toBe(401);
    const invalid = await request(createApp()).get('/requests').set('Authorization', 'Bearer not-a-token');
    expect(invalid.status).toBe(401);
    expect(listRequests).not.toHaveBeenCalled();
  });

  it('GET /requests returns normalized requests', async () => {
    const token = await loginToken();
    listRequests.mockResolvedValueOnce([
      { REQUEST_ID: 'R1', JUDUL_PERMINTAAN: 'Pompa', EVALUASI_STATUS: 'Selesai', EVALUASI_TANGGAL: '2025-01-10T00:00:00Z' },
    ]);
    const res = await request(createApp()).get('/requests').set('Authorization', `Bearer ${token}`);
    expect(res.status).toBe(200);
    expect(res.body.ok).toBe(true);
    expect(res.body.requests).toHaveLength(1);
    expect(res.body.requests[0].title).toBe('Pompa');
    expect(res.body.requests[0].stages.Evaluation).toEqual({ status: 'Done', date: '2025-01-10' });
  });

  it('maps transport failures to 502', async () => {
    const token = await loginToken();
    listRequests.mockRejectedValueOnce(new PersistenceError('transport', 'persistence service unreachable: timeout after 60000 ms'));
    const res = await request(createApp()).get('/requests').set('Authorization', `Bearer ${token}`);
    expect(res.status).toBe(502);
    expect(res.body).toEqual({
      ok: false,
      error: 'persistence service unreachable: timeout after 60000 ms',
      kind: 'transport',
    });
  });

  it('passes application failures through verbatim', async () => {
    const token = await loginToken();
    updateRequest.mockRejectedValueOnce(new PersistenceError('application', 'REQUEST_ID tidak ditemukan'));
    const res = await request(createApp())
      .patch('/requests/R404/stages')
      .set('Authorization', `Bearer ${token}`)
      .send({ stages: { Supply: { status: 'Done', date: '2025-01-10' } } });
    expect(res.status).toBe(422);
    expect(res.body).toEqual({ ok: false, error: 'REQUEST_ID tidak ditemukan', kind: 'application' });
  });

  it('PATCH /requests/:id/stages sends one patch', async () => {
    const token = await loginToken();
    updateRequest.mockResolvedValueOnce(undefined);
    const res = await request(createApp())
      .patch('/requests/R1/stages')
      .set('Authorization', `Bearer ${token}`)
      .send({ stages: { PurchaseOrder: { status: 'progress', date: '2025-01-10' } } });
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
    expect(updateRequest).toHaveBeenCalledWith('R1', { PO_STATUS: 'In Process', PO_TANGGAL: '' });
  });

  it('PATCH /requests/:id/stages rejects unknown stages without sending anything', async () => {
    const token = await loginToken();
    const res = await request(createApp())
      .patch('/requests/R1/stages')
      .set('Authorization', `Bearer ${token}`)
      .send({ stages: { Supply: { status: 'Done' }, Shipping: { status: 'Done' } } });
    expect(res.status).toBe(400);
    expect(updateRequest).not.toHaveBeenCalled();
  });

  it('POST /requests submits without a session', async () => {
    submitRequest.mockResolvedValueOnce('REQ-1');
    const res = await request(createApp())
      .post('/requests')
      .send({ uploadDate: '2025-01-10', title: 'Filter oli', files: [{ name: 'a.pdf', mime: 'application/pdf', base64Payload: 'QQ==' }] });
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true, requestId: 'REQ-1' });
  });

  it('POST /requests validates title', async () => {
    const res = await request(createApp())
      .post('/requests')
      .send({ title: ' ', files: [{ name: 'a.pdf', base64Payload: 'QQ==' }] });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ ok: false, error: 'title is required', kind: 'validation' });
    expect(submitRequest).not.toHaveBeenCalled();
  });

  it('answers 400 on malformed JSON bodies', async () => {
    const res = await request(createApp()).post('/requests').set('Content-Type', 'application/json').send('{"title":');
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ ok: false, error: 'invalid json' });
  });
});
