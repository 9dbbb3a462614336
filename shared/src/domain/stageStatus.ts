export const StageStatus = {
  None: 'None',
  InProcess: 'In Process',
  Done: 'Done',
} as const;

export type StageStatus = (typeof StageStatus)[keyof typeof StageStatus];

export const STAGE_STATUSES: readonly StageStatus[] = [StageStatus.None, StageStatus.InProcess, StageStatus.Done];

export function isStageStatus(value: unknown): value is StageStatus {
  return value === StageStatus.None || value === StageStatus.InProcess || value === StageStatus.Done;
}
