import {
  StageStatus,
  allStageKeys,
  buildStageRecord,
  normalizeDate,
  type ProcurementRequest,
  type StageInput,
  type StageKey,
} from '@procmon/shared';

// Editor state of one stage. `date` is the <input type="date"> value, '' when absent.
export type StageDraft = { status: StageStatus; date: string };

export type StageDrafts = Record<StageKey, StageDraft>;

export function draftsFromRequest(request: ProcurementRequest): StageDrafts {
  return buildStageRecord((key) => ({
    status: request.stages[key].status,
    date: request.stages[key].date ?? '',
  }));
}

/** Only Done carries a date; entering Done pre-fills the stored date or today. */
export function changeStatus(draft: StageDraft, status: StageStatus, fallbackDate: string): StageDraft {
  if (status !== StageStatus.Done) return { status, date: '' };
  return { status, date: draft.date || fallbackDate };
}

export function changeDate(draft: StageDraft, date: string): StageDraft {
  if (draft.status !== StageStatus.Done) return draft;
  return { ...draft, date };
}

export function draftsToPatch(drafts: StageDrafts): Partial<Record<StageKey, StageInput>> {
  const patch: Partial<Record<StageKey, StageInput>> = {};
  for (const key of allStageKeys()) {
    const d = drafts[key];
    patch[key] = { status: d.status, date: d.status === StageStatus.Done && d.date ? d.date : null };
  }
  return patch;
}

export function invalidDraftKeys(drafts: StageDrafts): StageKey[] {
  return allStageKeys().filter((key) => {
    const d = drafts[key];
    return d.status === StageStatus.Done && d.date !== '' && normalizeDate(d.date) === null;
  });
}

export function isDirty(drafts: StageDrafts, request: ProcurementRequest): boolean {
  return allStageKeys().some((key) => {
    const saved = request.stages[key];
    const d = drafts[key];
    return d.status !== saved.status || (d.date || null) !== saved.date;
  });
}

export type SaveNotice = { tone: 'ok' | 'error'; text: string };

/** A reload of the same request keeps the notice; selecting another request drops it. */
export function noticeAfterRequestChange(notice: SaveNotice | null, previousId: string | null, nextId: string): SaveNotice | null {
  return previousId === nextId ? notice : null;
}
