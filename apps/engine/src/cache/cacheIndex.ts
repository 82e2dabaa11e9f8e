export type CacheEntry = {
  key: string;
  path: string;
  voice: string;
  preview: string;
  createdAt: string;
};

/** On-disk / in-Redis shape of one index entry. */
export type CacheIndexRecord = {
  path: string;
  voice: string;
  text_preview: string;
  created_at: string;
};

export interface CacheIndex {
  get(key: string): Promise<CacheEntry | null>;
  set(entry: CacheEntry): Promise<void>;
  delete(key: string): Promise<void>;
  entries(): Promise<CacheEntry[]>;
}

export const PREVIEW_CHARS = 100;

export function toIndexRecord(entry: CacheEntry): CacheIndexRecord {
  return {
    path: entry.path,
    voice: entry.voice,
    text_preview: entry.preview,
    created_at: entry.createdAt
  };
}

function readString(value: object, field: string): string | null {
  const item: unknown = Reflect.get(value, field);
  return typeof item === "string" ? item : null;
}

export function fromIndexRecord(key: string, value: unknown): CacheEntry | null {
  if (!value || typeof value !== "object") {
    return null;
  }
  const filePath = readString(value, "path");
  if (!filePath) {
    return null;
  }
  return {
    key,
    path: filePath,
    voice: readString(value, "voice") ?? "",
    preview: readString(value, "text_preview") ?? "",
    createdAt: readString(value, "created_at") ?? new Date(0).toISOString()
  };
}
