import {
  okResponseSchema,
  requestsListResponseSchema,
  submitResponseSchema,
  type StageInput,
  type StageKey,
  type UploadFile,
} from '@procmon/shared';

import { apiCall, jsonInit } from './client.js';

export function listRequests() {
  return apiCall('/requests', { method: 'GET' }, requestsListResponseSchema);
}

export function submitRequest(args: { uploadDate: string; shipReference: string; title: string; files: UploadFile[] }) {
  return apiCall('/requests', jsonInit('POST', args), submitResponseSchema);
}

export function updateStages(requestId: string, stages: Partial<Record<StageKey, StageInput>>) {
  return apiCall(`/requests/${encodeURIComponent(requestId)}/stages`, jsonInit('PATCH', { stages }), okResponseSchema);
}

export async function readFileAsUpload(file: File): Promise<UploadFile> {
  const base64Payload = await new Promise<string>((resolve, reject) => {
    const reader = new FileReader();
    reader.onerror = () => reject(new Error(`file read failed: ${file.name}`));
    reader.onload = () => {
      const result = String(reader.result || '');
      const comma = result.indexOf(',');
      resolve(comma >= 0 ? result.slice(comma + 1) : '');
    };
    reader.readAsDataURL(file);
  });
  return { name: file.name, mime: file.type || 'application/octet-stream', base64Payload };
}
