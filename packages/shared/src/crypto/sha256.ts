import { createHash } from "node:crypto";

function canonicalize(value: unknown): unknown {
  if (value === null) return null;

  if (Array.isArray(value)) {
    return value.map((item) => canonicalize(item));
  }

  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return value;
    case "object": {
      const record: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        record[key] = canonicalize(entry);
      }
      return record;
    }
    default:
      return null;
  }
}

/** JSON with object keys sorted at every depth, so equal values hash equally. */
export function stableJsonStringify(value: unknown): string {
  const json = JSON.stringify(value);
  if (json === undefined) {
    throw new Error("Value is not JSON-serializable (JSON.stringify returned undefined)");
  }

  const parsed: unknown = JSON.parse(json);
  return JSON.stringify(canonicalize(parsed));
}

export function hashJsonSha256(value: unknown): string {
  return createHash("sha256").update(stableJsonStringify(value)).digest("hex");
}
