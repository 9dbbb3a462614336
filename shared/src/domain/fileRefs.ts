// Attachment descriptors as the persistence service stores them.
// Bytes live in the storage provider (Google Drive); rows only keep links or ids.

export type FileRef = {
  name: string;
  mime?: string | null;
  downloadUrl?: string | null;
  viewUrl?: string | null;
  fileId?: string | number | null;
  id?: string | number | null;
};

// Only exists between the browser and the persistence service at submission time.
export type UploadFile = {
  name: string;
  mime: string;
  base64Payload: string;
};

export type FileLink =
  | { kind: 'explicit'; url: string }
  | { kind: 'synthesized'; url: string }
  | { kind: 'none'; url: null };

export const DRIVE_DOWNLOAD_BASE = 'https://drive.google.com/uc?export=download&id=';

function optionalText(v: unknown): string | null {
  return typeof v === 'string' ? v : null;
}

function optionalId(v: unknown): string | number | null {
  return typeof v === 'string' || typeof v === 'number' ? v : null;
}

function toFileRef(item: unknown): FileRef | null {
  if (!item || typeof item !== 'object' || Array.isArray(item)) return null;
  const name: unknown = Reflect.get(item, 'name');
  if (typeof name !== 'string' || !name.trim()) return null;
  return {
    name,
    mime: optionalText(Reflect.get(item, 'mime')),
    downloadUrl: optionalText(Reflect.get(item, 'downloadUrl')),
    viewUrl: optionalText(Reflect.get(item, 'viewUrl')),
    fileId: optionalId(Reflect.get(item, 'fileId')),
    id: optionalId(Reflect.get(item, 'id')),
  };
}

function fromList(list: unknown[]): FileRef[] {
  const out: FileRef[] = [];
  for (const item of list) {
    const ref = toFileRef(item);
    if (ref) out.push(ref);
  }
  return out;
}

function decodeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function normalizeFileRefs(raw: unknown): FileRef[] {
  if (Array.isArray(raw)) return fromList(raw);
  if (typeof raw !== 'string') return [];
  const s = raw.trim();
  if (!s.startsWith('[') && !s.startsWith('{')) return [];
  const decoded = decodeJson(s);
  if (Array.isArray(decoded)) return fromList(decoded);
  if (decoded && typeof decoded === 'object') return fromList([decoded]);
  return [];
}

/** Candidates are tried in order; the first one that yields at least one file wins. */
export function firstFileList(...candidates: unknown[]): FileRef[] {
  for (const candidate of candidates) {
    const list = normalizeFileRefs(candidate);
    if (list.length > 0) return list;
  }
  return [];
}

function nonBlank(v: string | number | null | undefined): string | null {
  if (v == null) return null;
  const s = String(v).trim();
  return s === '' ? null : s;
}

export function resolveFileLink(ref: FileRef): FileLink {
  const explicit = nonBlank(ref.downloadUrl) ?? nonBlank(ref.viewUrl);
  if (explicit) return { kind: 'explicit', url: explicit };
  const fid = nonBlank(ref.fileId) ?? nonBlank(ref.id);
  if (fid) return { kind: 'synthesized', url: `${DRIVE_DOWNLOAD_BASE}${encodeURIComponent(fid)}` };
  return { kind: 'none', url: null };
}
