// Canonicalization of raw spreadsheet values. Every function here is total:
// bad input degrades to None / null / '' and nothing is thrown.

import { StageStatus } from './stageStatus.js';

export type IsoDate = string; // YYYY-MM-DD, no time of day

const NONE_TOKENS = new Set(['', 'none', 'null', 'nan', 'nat', 'false', '0']);
const IN_PROCESS_TOKENS = new Set([
  'in process',
  'in_progress',
  'inprogress',
  'process',
  'proses',
  'progress',
  'ongoing',
  'on progress',
  'onprogress',
]);
const DONE_TOKENS = new Set(['done', 'selesai', 'finish', 'finished', 'completed', 'complete', 'ok', 'yes', 'true', '1']);

const EMPTY_DATE_TOKENS = new Set(['', 'none', 'nan', 'nat', 'false']);

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const SPACED_DATETIME_RE = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}/;

function primitiveText(raw: unknown): string | null {
  if (typeof raw === 'string') return raw;
  if (typeof raw === 'number' || typeof raw === 'boolean' || typeof raw === 'bigint') return String(raw);
  return null;
}

export function normalizeStatus(raw: unknown): StageStatus {
  const text = primitiveText(raw);
  if (text == null) return StageStatus.None;
  const token = text.trim().toLowerCase();
  if (NONE_TOKENS.has(token)) return StageStatus.None;
  if (IN_PROCESS_TOKENS.has(token)) return StageStatus.InProcess;
  if (DONE_TOKENS.has(token)) return StageStatus.Done;
  return StageStatus.None;
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

export function normalizeDate(raw: unknown): IsoDate | null {
  if (typeof raw !== 'string') return null;
  let s = raw.trim();
  if (EMPTY_DATE_TOKENS.has(s.toLowerCase())) return null;
  if (s.includes('T') || SPACED_DATETIME_RE.test(s)) s = s.slice(0, 10);
  const m = ISO_DATE_RE.exec(s);
  if (!m) return null;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  if (!isCalendarDate(year, month, day)) return null;
  return s;
}

export function serializeDate(date: IsoDate | null | undefined): string {
  return date ? date : '';
}

/** dd-mm-yyyy for tables and detail panels. */
export function formatDisplayDate(raw: unknown): string {
  const iso = normalizeDate(raw);
  if (!iso) return '';
  const [year, month, day] = iso.split('-');
  return `${day}-${month}-${year}`;
}

export function todayIsoDate(now: Date = new Date()): IsoDate {
  const y = String(now.getFullYear()).padStart(4, '0');
  const m = String(now.getMonth() + 1).padStart(2, '0');
  const d = String(now.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}
