import { createHash } from "crypto";

/** SHA-256 of a UTF-8 string. */
export function sha256String(data: string): string {
  return createHash("sha256").update(data, "utf8").digest("hex");
}

/**
 * JSON with object keys sorted at every depth, so equal inputs serialize
 * identically whatever their key insertion order.
 */
export function canonicalJsonStringify(obj: unknown): string {
  return JSON.stringify(sortKeysDeep(obj));
}

function sortKeysDeep(obj: unknown): unknown {
  if (obj === null || typeof obj !== "object") return obj;
  if (Array.isArray(obj)) return obj.map(sortKeysDeep);
  const entries = Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries.map(([key, value]) => [key, sortKeysDeep(value)]));
}

/** Fingerprint of an evaluation input: SHA-256 of its canonical JSON. */
export function fingerprint(obj: unknown): string {
  return sha256String(canonicalJsonStringify(obj));
}
