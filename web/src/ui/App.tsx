import React, { useEffect, useState } from 'react';
import { anonymousSession, type Session } from '@procmon/shared';

import { currentSession } from '../api/auth.js';
import { EngineeringPage } from './EngineeringPage.js';
import { ShipUploadPage } from './ShipUploadPage.js';
import { ErrorBoundary } from './components/ErrorBoundary.js';
import { Tabs } from './components/Tabs.js';

type TabId = 'upload' | 'engineering';

const TABS: { id: TabId; label: string }[] = [
  { id: 'upload', label: 'User Kapal (Upload)' },
  { id: 'engineering', label: 'User Teknik (Monitoring)' },
];

export function App() {
  const [tab, setTab] = useState<TabId>('upload');
  const [session, setSession] = useState<Session>(anonymousSession);

  // A token from earlier in this browser session is still honoured after reload.
  useEffect(() => {
    let alive = true;
    void currentSession().then((r) => {
      if (alive && r?.ok) setSession(r.session);
    });
    return () => {
      alive = false;
    };
  }, []);

  return (
    <div style={{ maxWidth: 1400, margin: '0 auto', padding: 20, display: 'flex', flexDirection: 'column', gap: 16, fontFamily: 'system-ui, sans-serif' }}>
      <h1 style={{ margin: 0, fontSize: 22 }}>Monitoring Permintaan Pengadaan</h1>
      <Tabs tabs={TABS} active={tab} onChange={setTab} />
      {tab === 'upload' ? (
        <ErrorBoundary title="Upload gagal ditampilkan">
          <ShipUploadPage />
        </ErrorBoundary>
      ) : (
        <ErrorBoundary title="Monitoring gagal ditampilkan">
          <EngineeringPage session={session} onSessionChange={setSession} />
        </ErrorBoundary>
      )}
    </div>
  );
}
