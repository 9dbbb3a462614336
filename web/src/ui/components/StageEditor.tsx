import React from 'react';
import { STAGE_DEFINITIONS, STAGE_STATUSES, StageStatus, isStageStatus, type StageDefinition, type StageKey } from '@procmon/shared';

import type { StageDraft, StageDrafts } from '../utils/stageForm.js';
import { Input } from './Input.js';

function StageField(props: {
  index: number;
  def: StageDefinition;
  draft: StageDraft;
  onStatus: (key: StageKey, status: StageStatus) => void;
  onDate: (key: StageKey, date: string) => void;
}) {
  const { def, draft } = props;
  return (
    <div style={{ display: 'flex', flexDirection: 'column', gap: 6 }}>
      <strong>
        {props.index + 1}) {def.label}
      </strong>
      <label style={{ display: 'flex', flexDirection: 'column', gap: 4, fontSize: 13 }}>
        <span>Status {def.label}</span>
        <select
          value={draft.status}
          onChange={(e) => {
            if (isStageStatus(e.target.value)) props.onStatus(def.key, e.target.value);
          }}
          style={{ padding: '6px 8px', borderRadius: 8, border: '1px solid #d1d5db', background: '#fff' }}
        >
          {STAGE_STATUSES.map((s) => (
            <option key={s} value={s}>
              {s}
            </option>
          ))}
        </select>
      </label>
      {draft.status === StageStatus.Done ? (
        <Input label={`Tanggal ${def.label}`} type="date" value={draft.date} onChange={(e) => props.onDate(def.key, e.target.value)} />
      ) : (
        <div style={{ color: '#6b7280', fontSize: 12 }}>Tanggal {def.label}: (kosong)</div>
      )}
    </div>
  );
}

export function StageEditor(props: {
  drafts: StageDrafts;
  onStatus: (key: StageKey, status: StageStatus) => void;
  onDate: (key: StageKey, date: string) => void;
}) {
  const field = (def: StageDefinition) => (
    <StageField
      key={def.key}
      index={STAGE_DEFINITIONS.indexOf(def)}
      def={def}
      draft={props.drafts[def.key]}
      onStatus={props.onStatus}
      onDate={props.onDate}
    />
  );
  const branchAdmin = STAGE_DEFINITIONS.filter((d) => d.group === 'branch_admin');
  const firstAdmin = STAGE_DEFINITIONS.findIndex((d) => d.group === 'branch_admin');
  const before = STAGE_DEFINITIONS.slice(0, firstAdmin);
  const after = STAGE_DEFINITIONS.slice(firstAdmin).filter((d) => d.group !== 'branch_admin');

  return (
    <div style={{ display: 'flex', flexDirection: 'column', gap: 14 }}>
      {before.map(field)}
      <div style={{ border: '1px solid #e5e7eb', borderRadius: 12, padding: 12 }}>
        <div style={{ fontWeight: 800, marginBottom: 8 }}>Administrasi Cabang</div>
        <div style={{ display: 'grid', gridTemplateColumns: `repeat(${branchAdmin.length}, minmax(0, 1fr))`, gap: 12 }}>
          {branchAdmin.map(field)}
        </div>
      </div>
      {after.map(field)}
    </div>
  );
}
