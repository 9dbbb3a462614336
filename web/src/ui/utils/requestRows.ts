import { toSummaryRow, type ProcurementRequest, type RequestSummaryRow } from '@procmon/shared';

export function buildRows(requests: ProcurementRequest[]): RequestSummaryRow[] {
  return requests.map(toSummaryRow);
}

export function matchesQuery(row: RequestSummaryRow, query: string): boolean {
  const q = query.trim().toLowerCase();
  if (!q) return true;
  return [row.requestId, row.shipReference, row.title, row.uploadDate].some((v) => v.toLowerCase().includes(q));
}

export function filterRows(rows: RequestSummaryRow[], query: string): RequestSummaryRow[] {
  return rows.filter((row) => matchesQuery(row, query));
}
