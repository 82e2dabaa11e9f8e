import { createHash } from "node:crypto";

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => canonicalize(item));
  }
  if (value && typeof value === "object") {
    const record: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const item: unknown = Reflect.get(value, key);
      if (item !== undefined) {
        record[key] = canonicalize(item);
      }
    }
    return record;
  }
  return value;
}

/** JSON with object keys sorted at every depth; undefined fields are dropped. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function sha256Hex(input: string | Buffer) {
  return createHash("sha256").update(input).digest("hex");
}

export function contentHash(value: unknown) {
  return sha256Hex(canonicalJson(value));
}
