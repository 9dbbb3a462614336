import { firstFileList, type FileRef } from './fileRefs.js';
import { formatDisplayDate, normalizeDate, serializeDate, type IsoDate } from './normalize.js';
import {
  STAGE_DEFINITIONS,
  allStageKeys,
  buildStageRecord,
  countDoneStages,
  normalizeState,
  stageDefinition,
  StageKey,
  type StageState,
} from './stages.js';
import type { StageStatus } from './stageStatus.js';

// A row exactly as the persistence service returned it; key casing varies between backend versions.
export type RawRecord = Record<string, unknown>;

export type ProcurementRequest = {
  requestId: string;
  uploadDate: IsoDate | null;
  shipReference: string;
  title: string;
  attachments: FileRef[];
  stages: Record<StageKey, StageState>;
  lastUpdate: string | null;
};

export type StageWireFields = Record<string, string>;

export const RecordColumn = {
  RequestId: 'REQUEST_ID',
  UploadDate: 'TANGGAL_UPLOAD',
  ShipReference: 'NO_SPBJ_KAPAL',
  Title: 'JUDUL_PERMINTAAN',
  Files: 'FILES',
  FilesJson: 'FILES_JSON',
  LastUpdate: 'LAST_UPDATE',
} as const;

export function statusColumn(key: StageKey): string {
  return `${stageDefinition(key).wirePrefix}_STATUS`;
}

export function dateColumn(key: StageKey): string {
  return `${stageDefinition(key).wirePrefix}_TANGGAL`;
}

function isBlank(v: unknown): boolean {
  return v == null || (typeof v === 'string' && v.trim() === '');
}

// When two spellings of a column collide, a blank value never replaces a filled one.
export function canonicalizeKeys(raw: RawRecord): RawRecord {
  const out: RawRecord = {};
  for (const [k, v] of Object.entries(raw)) {
    const key = String(k).trim().toUpperCase();
    if (key in out && isBlank(v) && !isBlank(out[key])) continue;
    out[key] = v;
  }
  return out;
}

function text(v: unknown): string {
  if (typeof v === 'string') return v.trim();
  if (typeof v === 'number' && Number.isFinite(v)) return String(v);
  return '';
}

// Legacy rows sometimes carry the file JSON in the evaluation status column.
const attachmentSources: Array<(row: RawRecord) => unknown> = [
  (row) => row[RecordColumn.Files],
  (row) => row[RecordColumn.FilesJson],
  (row) => row[statusColumn(StageKey.Evaluation)],
];

export function normalizeRecord(raw: RawRecord): ProcurementRequest {
  const row = canonicalizeKeys(raw);
  const stages = buildStageRecord((key) => normalizeState(row[statusColumn(key)], row[dateColumn(key)]));
  const lastUpdate = text(row[RecordColumn.LastUpdate]);
  return {
    requestId: text(row[RecordColumn.RequestId]),
    uploadDate: normalizeDate(row[RecordColumn.UploadDate]),
    shipReference: text(row[RecordColumn.ShipReference]),
    title: text(row[RecordColumn.Title]),
    attachments: firstFileList(...attachmentSources.map((source) => source(row))),
    stages,
    lastUpdate: lastUpdate || null,
  };
}

export function serializeStageFields(key: StageKey, state: StageState): StageWireFields {
  const clean = normalizeState(state.status, state.date);
  return {
    [statusColumn(key)]: clean.status,
    [dateColumn(key)]: serializeDate(clean.date),
  };
}

/** Builds one patch for every provided stage; a failure on any stage aborts the whole patch. */
export function serializeStagePatch(stages: Partial<Record<StageKey, StageState>>): StageWireFields {
  const fields: StageWireFields = {};
  for (const key of allStageKeys()) {
    const state = stages[key];
    if (!state) continue;
    Object.assign(fields, serializeStageFields(key, state));
  }
  return fields;
}

export function withLowerCaseAliases(fields: StageWireFields): StageWireFields {
  const out: StageWireFields = { ...fields };
  for (const [k, v] of Object.entries(fields)) {
    out[k.toLowerCase()] = v;
  }
  return out;
}

export type StageCell = { status: StageStatus; date: string };

export type RequestSummaryRow = {
  requestId: string;
  uploadDate: string;
  shipReference: string;
  title: string;
  stages: Record<StageKey, StageCell>;
  doneCount: number;
  stageCount: number;
  lastUpdate: string;
};

export function toSummaryRow(request: ProcurementRequest): RequestSummaryRow {
  const cells = buildStageRecord<StageCell>((key) => ({
    status: request.stages[key].status,
    date: formatDisplayDate(request.stages[key].date),
  }));
  return {
    requestId: request.requestId,
    uploadDate: formatDisplayDate(request.uploadDate),
    shipReference: request.shipReference,
    title: request.title,
    stages: cells,
    doneCount: countDoneStages(request.stages),
    stageCount: STAGE_DEFINITIONS.length,
    lastUpdate: formatDisplayDate(request.lastUpdate),
  };
}
