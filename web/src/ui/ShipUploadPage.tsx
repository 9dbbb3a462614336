import React, { useRef, useState } from 'react';
import { todayIsoDate } from '@procmon/shared';

import { readFileAsUpload, submitRequest } from '../api/requests.js';
import { Button } from './components/Button.js';
import { Input } from './components/Input.js';

type Notice = { tone: 'success' | 'warning' | 'error'; text: string };

const toneColor: Record<Notice['tone'], string> = {
  success: '#15803d',
  warning: '#b45309',
  error: '#b91c1c',
};

export function ShipUploadPage() {
  const [uploadDate, setUploadDate] = useState<string>(() => todayIsoDate());
  const [shipReference, setShipReference] = useState('');
  const [title, setTitle] = useState('');
  const [files, setFiles] = useState<File[]>([]);
  const [busy, setBusy] = useState(false);
  const [notice, setNotice] = useState<Notice | null>(null);
  const fileInputRef = useRef<HTMLInputElement | null>(null);

  function resetForm() {
    setUploadDate(todayIsoDate());
    setShipReference('');
    setTitle('');
    setFiles([]);
    if (fileInputRef.current) fileInputRef.current.value = '';
  }

  async function submit() {
    if (!title.trim()) {
      setNotice({ tone: 'warning', text: 'Judul Permintaan wajib diisi.' });
      return;
    }
    if (files.length === 0) {
      setNotice({ tone: 'warning', text: 'Minimal upload 1 file.' });
      return;
    }
    setBusy(true);
    setNotice(null);
    try {
      const uploads = await Promise.all(files.map(readFileAsUpload));
      const r = await submitRequest({ uploadDate, shipReference: shipReference.trim(), title: title.trim(), files: uploads });
      if (r.ok) {
        setNotice({ tone: 'success', text: `Berhasil! REQUEST_ID: ${r.requestId}. Tim Teknik bisa download file dan update progress.` });
        resetForm();
      } else if (r.kind === 'transport') {
        setNotice({ tone: 'error', text: `Error koneksi / API: ${r.error}` });
      } else {
        setNotice({ tone: 'error', text: `Gagal: ${r.error}` });
      }
    } catch (e) {
      setNotice({ tone: 'error', text: `Error: ${String(e)}` });
    } finally {
      setBusy(false);
    }
  }

  return (
    <div style={{ display: 'flex', flexDirection: 'column', gap: 12, maxWidth: 720 }}>
      <h2 style={{ margin: 0 }}>Upload Permintaan Pengadaan</h2>
      <div style={{ display: 'grid', gridTemplateColumns: '1fr 1fr', gap: 12 }}>
        <Input label="Tanggal Upload" type="date" value={uploadDate} onChange={(e) => setUploadDate(e.target.value)} />
        <Input label="No. SPBJ Kapal (opsional)" value={shipReference} onChange={(e) => setShipReference(e.target.value)} />
      </div>
      <Input
        label="Judul Permintaan"
        placeholder="Contoh: Pengadaan sparepart mesin ..."
        value={title}
        onChange={(e) => setTitle(e.target.value)}
      />
      <label style={{ display: 'flex', flexDirection: 'column', gap: 4, fontSize: 13 }}>
        <span style={{ fontWeight: 600 }}>Upload Dokumen (boleh lebih dari 1 file)</span>
        <input
          ref={fileInputRef}
          type="file"
          multiple
          onChange={(e) => setFiles(e.target.files ? Array.from(e.target.files) : [])}
        />
      </label>
      {files.length > 0 && <div style={{ fontSize: 12, color: '#6b7280' }}>{files.map((f) => f.name).join(', ')}</div>}
      <div>
        <Button busy={busy} onClick={() => void submit()}>
          Submit Permintaan
        </Button>
      </div>
      {notice && <div style={{ color: toneColor[notice.tone], fontSize: 14 }}>{notice.text}</div>}
    </div>
  );
}
