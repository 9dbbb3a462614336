import { beforeEach, describe, expect, it, vi } from 'vitest';

const { listRequests, submitRequest, updateRequest } = vi.hoisted(() => ({
  listRequests: vi.fn(),
  submitRequest: vi.fn(),
  updateRequest: vi.fn(),
}));

vi.mock('../services/persistenceClient.js', async () => {
  const actual = await vi.importActual<typeof import('../services/persistenceClient.js')>('../services/persistenceClient.js');
  return { ...actual, listRequests, submitRequest, updateRequest };
});

vi.mock('../utils/logger.js', () => ({
  logDebug: vi.fn(),
  logInfo: vi.fn(),
  logWarn: vi.fn(),
  logError: vi.fn(),
}));

import {
  ValidationError,
  buildStagePatch,
  listProcurementRequests,
  submitProcurementRequest,
  updateProcurementStages,
} from '../services/requestsService.js';

describe('requests service', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    delete process.env.PROCMON_PERSISTENCE_LOWERCASE_FIELDS;
  });

  it('normalizes listed rows and skips rows without an id', async () => {
    listRequests.mockResolvedValueOnce([
      { request_id: 'R1', evaluasi_status: 'Selesai', evaluasi_tanggal: '2025-01-10T00:00:00Z' },
      { REQUEST_ID: '', JUDUL_PERMINTAAN: 'orphan' },
      { REQUEST_ID: 'R2', PO_STATUS: 'progress', PO_TANGGAL: '2025-01-10' },
    ]);
    const requests = await listProcurementRequests();
    expect(requests.map((r) => r.requestId)).toEqual(['R1', 'R2']);
    expect(requests[0]?.stages.Evaluation).toEqual({ status: 'Done', date: '2025-01-10' });
    expect(requests[1]?.stages.PurchaseOrder).toEqual({ status: 'In Process', date: null });
  });

  it('rejects a submission without title or files', async () => {
    await expect(submitProcurementRequest({ title: '   ', files: [{ name: 'a.pdf', base64Payload: 'QQ==' }] })).rejects.toThrow(
      'title is required',
    );
    await expect(submitProcurementRequest({ title: 'Pompa', files: [] })).rejects.toThrow('at least one file is required');
    expect(submitRequest).not.toHaveBeenCalled();
  });

  it('fills defaults before submitting', async () => {
    submitRequest.mockResolvedValueOnce('REQ-9');
    const id = await submitProcurementRequest(
      { title: ' Pompa air ', shipReference: null, files: [{ name: 'a.pdf', mime: '', base64Payload: 'QQ==' }] },
      new Date(2025, 1, 3, 9, 0),
    );
    expect(id).toBe('REQ-9');
    expect(submitRequest).toHaveBeenCalledWith({
      uploadDate: '2025-02-03',
      shipReference: '',
      title: 'Pompa air',
      files: [{ name: 'a.pdf', mime: 'application/octet-stream', base64Payload: 'QQ==' }],
    });
  });

  it('rejects an unreadable upload date', async () => {
    await expect(
      submitProcurementRequest({ title: 'Pompa', uploadDate: '31-12-2025', files: [{ name: 'a.pdf', base64Payload: 'QQ==' }] }),
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it('builds a patch that drops dates of unfinished stages', () => {
    expect(
      buildStagePatch({
        stages: {
          Evaluation: { status: 'Done', date: '2025-01-10' },
          PurchaseOrder: { status: 'In Process', date: '2025-01-10' },
          Supply: { status: 'None', date: null },
        },
      }),
    ).toEqual({
      EVALUASI_STATUS: 'Done',
      EVALUASI_TANGGAL: '2025-01-10',
      PO_STATUS: 'In Process',
      PO_TANGGAL: '',
      SUPPLY_STATUS: 'None',
      SUPPLY_TANGGAL: '',
    });
  });

  it('adds lower-case field names when configured', () => {
    process.env.PROCMON_PERSISTENCE_LOWERCASE_FIELDS = 'true';
    expect(buildStagePatch({ stages: { Paid: { status: 'done' } } })).toEqual({
      TERBAYAR_STATUS: 'Done',
      TERBAYAR_TANGGAL: '',
      terbayar_status: 'Done',
      terbayar_tanggal: '',
    });
  });

  it('aborts the whole patch when one Done date is unreadable', async () => {
    await expect(
      updateProcurementStages('R1', {
        stages: {
          Evaluation: { status: 'Done', date: '2025-01-10' },
          Supply: { status: 'Done', date: 'kemarin' },
        },
      }),
    ).rejects.toThrow('invalid date for Supply: kemarin');
    expect(updateRequest).not.toHaveBeenCalled();
  });

  it('rejects an empty patch', () => {
    expect(() => buildStagePatch({ stages: {} })).toThrow('no stages to update');
  });

  it('sends one patch per update', async () => {
    updateRequest.mockResolvedValueOnce(undefined);
    await updateProcurementStages(' R1 ', { stages: { ApprovalLetter: { status: 'Done', date: '2025-03-04' } } });
    expect(updateRequest).toHaveBeenCalledTimes(1);
    expect(updateRequest).toHaveBeenCalledWith('R1', {
      SURAT_PERSETUJUAN_STATUS: 'Done',
      SURAT_PERSETUJUAN_TANGGAL: '2025-03-04',
    });
  });
});
