// Fixed approval pipeline for procurement requests (shared by the server and the web app).

import { normalizeDate, normalizeStatus, type IsoDate } from './normalize.js';
import { StageStatus, isStageStatus } from './stageStatus.js';

export const StageKey = {
  Evaluation: 'Evaluation',
  ProposalLetter: 'ProposalLetter',
  ApprovalLetter: 'ApprovalLetter',
  DeliveryOrderCert: 'DeliveryOrderCert', // SP2B/J
  PurchaseOrder: 'PurchaseOrder',
  Paid: 'Paid',
  Supply: 'Supply',
} as const;

export type StageKey = (typeof StageKey)[keyof typeof StageKey];

export type StageState = {
  status: StageStatus;
  date: IsoDate | null; // only when status === Done
};

export type StageGroup = 'single' | 'branch_admin';

export type StageDefinition = {
  key: StageKey;
  wirePrefix: string; // spreadsheet column stem: {prefix}_STATUS / {prefix}_TANGGAL
  label: string;
  group: StageGroup;
};

export const STAGE_DEFINITIONS: readonly StageDefinition[] = [
  { key: StageKey.Evaluation, wirePrefix: 'EVALUASI', label: 'Evaluasi Cabang', group: 'single' },
  { key: StageKey.ProposalLetter, wirePrefix: 'SURAT_USULAN', label: 'Surat Usulan ke Pusat', group: 'single' },
  { key: StageKey.ApprovalLetter, wirePrefix: 'SURAT_PERSETUJUAN', label: 'Surat Persetujuan Pusat', group: 'single' },
  { key: StageKey.DeliveryOrderCert, wirePrefix: 'SP2BJ', label: 'SP2B/J', group: 'branch_admin' },
  { key: StageKey.PurchaseOrder, wirePrefix: 'PO', label: 'PO', group: 'branch_admin' },
  { key: StageKey.Paid, wirePrefix: 'TERBAYAR', label: 'Terbayar', group: 'branch_admin' },
  { key: StageKey.Supply, wirePrefix: 'SUPPLY', label: 'Supply Barang', group: 'single' },
];

const definitionsByKey = new Map<StageKey, StageDefinition>(STAGE_DEFINITIONS.map((d) => [d.key, d]));

export function allStageKeys(): StageKey[] {
  return STAGE_DEFINITIONS.map((d) => d.key);
}

export function isStageKey(value: unknown): value is StageKey {
  return STAGE_DEFINITIONS.some((d) => d.key === value);
}

export function stageDefinition(key: StageKey): StageDefinition {
  const def = definitionsByKey.get(key);
  if (!def) throw new Error(`unknown stage: ${String(key)}`);
  return def;
}

/**
 * A date is allowed only on a `Done` stage. `Done` without a date is still legal:
 * older rows arrive that way until someone backfills the date.
 */
export function isLegalState(status: unknown, date: IsoDate | null | undefined): boolean {
  if (!isStageStatus(status)) return false;
  if (status !== StageStatus.Done) return date == null;
  return true;
}

export function needsDateBackfill(state: StageState): boolean {
  return state.status === StageStatus.Done && state.date === null;
}

/** The only place where a raw (status, date) pair becomes a StageState. */
export function normalizeState(rawStatus: unknown, rawDate: unknown): StageState {
  const status = normalizeStatus(rawStatus);
  if (status !== StageStatus.Done) return { status, date: null };
  return { status, date: normalizeDate(rawDate) };
}

export function emptyStageState(): StageState {
  return { status: StageStatus.None, date: null };
}

export function buildStageRecord<T>(make: (key: StageKey) => T): Record<StageKey, T> {
  return {
    Evaluation: make(StageKey.Evaluation),
    ProposalLetter: make(StageKey.ProposalLetter),
    ApprovalLetter: make(StageKey.ApprovalLetter),
    DeliveryOrderCert: make(StageKey.DeliveryOrderCert),
    PurchaseOrder: make(StageKey.PurchaseOrder),
    Paid: make(StageKey.Paid),
    Supply: make(StageKey.Supply),
  };
}

export function emptyStages(): Record<StageKey, StageState> {
  return buildStageRecord(() => emptyStageState());
}

export function countDoneStages(stages: Record<StageKey, StageState>): number {
  return allStageKeys().filter((key) => stages[key].status === StageStatus.Done).length;
}
