import React, { useEffect, useMemo, useRef, useState } from 'react';
import { anonymousSession, formatDisplayDate, stageDefinition, todayIsoDate, type ProcurementRequest, type Session } from '@procmon/shared';

import { login, logout } from '../api/auth.js';
import { listRequests, updateStages } from '../api/requests.js';
import { AttachmentList } from './components/AttachmentList.js';
import { Button } from './components/Button.js';
import { Input } from './components/Input.js';
import { RequestsTable } from './components/RequestsTable.js';
import { StageEditor } from './components/StageEditor.js';
import { buildRows, filterRows } from './utils/requestRows.js';
import {
  changeDate,
  changeStatus,
  draftsFromRequest,
  draftsToPatch,
  invalidDraftKeys,
  isDirty,
  noticeAfterRequestChange,
  type SaveNotice,
  type StageDrafts,
} from './utils/stageForm.js';

function LoginForm(props: { onLoggedIn: (session: Session) => void }) {
  const [password, setPassword] = useState('');
  const [error, setError] = useState<string | null>(null);
  const [busy, setBusy] = useState(false);

  async function doLogin() {
    setBusy(true);
    setError(null);
    const r = await login(password);
    setBusy(false);
    if (r.ok) {
      setPassword('');
      props.onLoggedIn(r.session);
      return;
    }
    setError(r.kind === 'transport' ? `Error koneksi / API: ${r.error}` : r.error === 'invalid password' ? 'Password salah.' : r.error);
  }

  return (
    <form
      style={{ display: 'flex', flexDirection: 'column', gap: 10, maxWidth: 360 }}
      onSubmit={(e) => {
        e.preventDefault();
        void doLogin();
      }}
    >
      <Input label="Password Teknik" type="password" value={password} onChange={(e) => setPassword(e.target.value)} />
      <div>
        <Button type="submit" busy={busy} disabled={!password}>
          Login
        </Button>
      </div>
      {error && <div style={{ color: '#b91c1c', fontSize: 13 }}>{error}</div>}
    </form>
  );
}

function RequestDetail(props: { request: ProcurementRequest; onSaved: () => void }) {
  const { request } = props;
  const [drafts, setDrafts] = useState<StageDrafts>(() => draftsFromRequest(request));
  const [status, setStatus] = useState<SaveNotice | null>(null);
  const [busy, setBusy] = useState(false);
  const shownId = useRef<string | null>(request.requestId);

  useEffect(() => {
    setDrafts(draftsFromRequest(request));
    const previousId = shownId.current;
    setStatus((prev) => noticeAfterRequestChange(prev, previousId, request.requestId));
    shownId.current = request.requestId;
  }, [request]);

  async function save() {
    const invalid = invalidDraftKeys(drafts);
    if (invalid.length > 0) {
      setStatus({ tone: 'error', text: `Tanggal tidak valid: ${invalid.map((k) => stageDefinition(k).label).join(', ')}` });
      return;
    }
    setBusy(true);
    setStatus(null);
    const r = await updateStages(request.requestId, draftsToPatch(drafts));
    setBusy(false);
    if (!r.ok) {
      setStatus({ tone: 'error', text: r.kind === 'transport' ? `Error simpan: ${r.error}` : `Gagal: ${r.error}` });
      return;
    }
    setStatus({ tone: 'ok', text: 'Update tersimpan.' });
    props.onSaved();
  }

  return (
    <div style={{ display: 'grid', gridTemplateColumns: '1.2fr 1fr', gap: 20, alignItems: 'start' }}>
      <div style={{ display: 'flex', flexDirection: 'column', gap: 6 }}>
        <div>
          <strong>Tanggal Upload:</strong> {formatDisplayDate(request.uploadDate)}
        </div>
        <div>
          <strong>No SPBJ Kapal:</strong> {request.shipReference}
        </div>
        <div>
          <strong>Judul:</strong> {request.title}
        </div>
        <strong style={{ marginTop: 8 }}>File Lampiran (Download):</strong>
        <AttachmentList files={request.attachments} />
      </div>
      <div style={{ display: 'flex', flexDirection: 'column', gap: 12 }}>
        <StageEditor
          drafts={drafts}
          onStatus={(key, next) =>
            setDrafts((prev) => ({ ...prev, [key]: changeStatus(prev[key], next, request.stages[key].date ?? todayIsoDate()) }))
          }
          onDate={(key, date) => setDrafts((prev) => ({ ...prev, [key]: changeDate(prev[key], date) }))}
        />
        <div style={{ display: 'flex', gap: 10, alignItems: 'center' }}>
          <Button busy={busy} disabled={!isDirty(drafts, request)} onClick={() => void save()}>
            Simpan Update
          </Button>
          {status && <span style={{ color: status.tone === 'ok' ? '#15803d' : '#b91c1c', fontSize: 13 }}>{status.text}</span>}
        </div>
      </div>
    </div>
  );
}

export function EngineeringPage(props: { session: Session; onSessionChange: (session: Session) => void }) {
  const [requests, setRequests] = useState<ProcurementRequest[] | null>(null);
  const [loadError, setLoadError] = useState<string | null>(null);
  const [loading, setLoading] = useState(false);
  const [query, setQuery] = useState('');
  const [selectedId, setSelectedId] = useState<string | null>(null);

  async function reload() {
    setLoading(true);
    const r = await listRequests();
    setLoading(false);
    if (!r.ok) {
      // no stale table after a failed load
      setRequests(null);
      setLoadError(r.error);
      if (r.error === 'invalid token' || r.error === 'missing bearer token') props.onSessionChange(anonymousSession);
      return;
    }
    setLoadError(null);
    setRequests(r.requests);
    setSelectedId((prev) => (prev && r.requests.some((x) => x.requestId === prev) ? prev : r.requests[0]?.requestId ?? null));
  }

  function doLogout() {
    logout();
    setRequests(null);
    setLoadError(null);
    setSelectedId(null);
    props.onSessionChange(anonymousSession);
  }

  useEffect(() => {
    if (props.session.authenticated) void reload();
  }, [props.session.authenticated]);

  const rows = useMemo(() => filterRows(buildRows(requests ?? []), query), [requests, query]);
  const selected = useMemo(() => requests?.find((r) => r.requestId === selectedId) ?? null, [requests, selectedId]);

  if (!props.session.authenticated) {
    return <LoginForm onLoggedIn={props.onSessionChange} />;
  }
  if (loadError) {
    return (
      <div style={{ display: 'flex', flexDirection: 'column', gap: 10 }}>
        <div style={{ color: '#b91c1c' }}>Error ambil data: {loadError}</div>
        <div style={{ display: 'flex', gap: 8 }}>
          <Button variant="ghost" busy={loading} onClick={() => void reload()}>
            Muat ulang
          </Button>
          <Button variant="ghost" onClick={doLogout}>
            Logout
          </Button>
        </div>
      </div>
    );
  }
  if (!requests) return <div style={{ color: '#6b7280' }}>Memuat data…</div>;

  return (
    <div style={{ display: 'flex', flexDirection: 'column', gap: 16 }}>
      <div style={{ display: 'flex', gap: 10, alignItems: 'center' }}>
        <h2 style={{ margin: 0 }}>Daftar Permintaan</h2>
        <span style={{ flex: 1 }} />
        <Input placeholder="Cari…" value={query} onChange={(e) => setQuery(e.target.value)} style={{ width: 240 }} />
        <Button variant="ghost" busy={loading} onClick={() => void reload()}>
          Muat ulang
        </Button>
        <Button variant="ghost" onClick={doLogout}>
          Logout
        </Button>
      </div>
      {requests.length === 0 ? (
        <div style={{ color: '#6b7280' }}>Belum ada permintaan masuk.</div>
      ) : (
        <>
          <RequestsTable rows={rows} selectedId={selectedId} onSelect={setSelectedId} />
          <h3 style={{ margin: 0 }}>Update Progress{selected ? `: ${selected.requestId}` : ''}</h3>
          {selected ? (
            <RequestDetail request={selected} onSaved={() => void reload()} />
          ) : (
            <div style={{ color: '#6b7280' }}>Pilih satu REQUEST_ID di tabel.</div>
          )}
        </>
      )}
    </div>
  );
}
