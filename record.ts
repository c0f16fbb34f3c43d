/**
 * Memory record model: ids, timestamps, the metadata envelope and the
 * mapping between store rows and records.
 */

import { randomUUID } from "node:crypto";

import { MemoryError } from "./errors.js";
import type {
  JsonObject,
  JsonValue,
  MemoryMetadata,
  MemoryStats,
  MemoryView,
  NearestMemoryRow,
  SearchHit,
  StoredMemoryRow,
} from "./types.js";

export const MAX_TEXT_LENGTH = 100_000;

export function generateMemoryId(): string {
  return `mem_${randomUUID().replace(/-/g, "").slice(0, 12)}`;
}

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/** `2025-12-09T13:45:00Z` */
export function formatTimestamp(unixSeconds: number): string {
  return new Date(unixSeconds * 1000).toISOString().replace(/\.\d{3}Z$/, "Z");
}

/** Length in code points, so astral characters count once */
export function characterCount(text: string): number {
  let count = 0;
  for (const _ of text) count++;
  return count;
}

export function assertStorableText(text: string): void {
  // Code points never outnumber UTF-16 units
  if (text.length <= MAX_TEXT_LENGTH) return;
  const count = characterCount(text);
  if (count > MAX_TEXT_LENGTH) {
    throw new MemoryError(
      "InvalidArgument",
      `Text exceeds ${MAX_TEXT_LENGTH} character limit (${count})`,
    );
  }
}

// ============================================================================
// Metadata envelope
// ============================================================================

type WellKnownField = Exclude<keyof MemoryMetadata, "extra">;

const WELL_KNOWN_KEYS: ReadonlyArray<[WellKnownField, string]> = [
  ["contextType", "context_type"],
  ["topic", "topic"],
  ["timestamp", "timestamp"],
  ["conversationId", "conversation_id"],
  ["relatedTo", "related_to"],
  ["priority", "priority"],
  ["status", "status"],
  ["category", "category"],
];

const STORED_KEY_TO_FIELD = new Map<string, WellKnownField>(WELL_KNOWN_KEYS.map(([field, key]) => [key, field]));

export function emptyMetadata(): MemoryMetadata {
  return { extra: {} };
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read a stored JSON object into the envelope. Well-known keys holding
 * anything but a string stay in `extra`.
 */
export function metadataFromJson(raw: JsonObject): MemoryMetadata {
  const metadata = emptyMetadata();
  for (const [key, value] of Object.entries(raw)) {
    const field = STORED_KEY_TO_FIELD.get(key);
    if (field && typeof value === "string") {
      metadata[field] = value;
    } else {
      // defineProperty keeps "__proto__" as an own key
      Object.defineProperty(metadata.extra, key, {
        value,
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
  }
  return metadata;
}

export function metadataToJson(metadata: MemoryMetadata): JsonObject {
  const out: JsonObject = { ...metadata.extra };
  for (const [field, key] of WELL_KNOWN_KEYS) {
    const value = metadata[field];
    if (value !== undefined) out[key] = value;
  }
  return out;
}

export function serializeMetadata(metadata: MemoryMetadata): string {
  return JSON.stringify(metadataToJson(metadata));
}

/**
 * Parse the stored metadata column. NULL and empty strings read as empty
 * metadata; anything that is not a JSON object is a protocol error.
 */
export function parseMetadata(raw: unknown): MemoryMetadata {
  if (raw === null || raw === undefined || raw === "") return emptyMetadata();
  if (typeof raw !== "string") {
    throw new MemoryError("StoreProtocolError", "Metadata column is not text");
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new MemoryError("StoreProtocolError", "Metadata column is not valid JSON", { cause: err });
  }
  if (!isJsonObject(parsed)) {
    throw new MemoryError("StoreProtocolError", "Metadata column is not a JSON object");
  }
  return metadataFromJson(parsed);
}

// ============================================================================
// Row mapping
// ============================================================================

function column<T>(
  row: unknown[],
  index: number,
  name: string,
  guard: (value: unknown) => value is T,
): T {
  const value = row[index];
  if (!guard(value)) {
    throw new MemoryError("StoreProtocolError", `Row column ${index} (${name}) is missing or mistyped`);
  }
  return value;
}

const isString = (v: unknown): v is string => typeof v === "string";
const isNumber = (v: unknown): v is number => typeof v === "number" && Number.isFinite(v);
const isNumberOrNull = (v: unknown): v is number | null => v === null || isNumber(v);

/** Columns: id, content, metadata, created_at */
export function rowToStored(row: unknown[]): StoredMemoryRow {
  return {
    id: column(row, 0, "id", isString),
    text: column(row, 1, "content", isString),
    metadata: parseMetadata(row[2]),
    createdAt: column(row, 3, "created_at", isNumber),
  };
}

/** Columns: id, content, metadata, created_at, distance */
export function rowToNearest(row: unknown[]): NearestMemoryRow {
  return { ...rowToStored(row), distance: column(row, 4, "distance", isNumber) };
}

/** Columns: COUNT(*), MIN(created_at), MAX(created_at) */
export function rowToStats(row: unknown[] | undefined): MemoryStats {
  if (!row) return { count: 0, firstCreatedAt: null, lastCreatedAt: null };
  const count = column(row, 0, "count", isNumber);
  if (count === 0) return { count: 0, firstCreatedAt: null, lastCreatedAt: null };
  return {
    count,
    firstCreatedAt: column(row, 1, "min_created_at", isNumberOrNull),
    lastCreatedAt: column(row, 2, "max_created_at", isNumberOrNull),
  };
}

export function toView(row: StoredMemoryRow): MemoryView {
  return {
    id: row.id,
    text: row.text,
    metadata: row.metadata,
    createdAt: formatTimestamp(row.createdAt),
  };
}

export function toHit(row: StoredMemoryRow, similarity: number): SearchHit {
  return { ...toView(row), similarity };
}

/**
 * Parse a `vector_extract` readback into a vector, or null when it is not a
 * JSON array of finite numbers.
 */
export function parseVectorText(raw: unknown): number[] | null {
  if (typeof raw !== "string") return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!Array.isArray(parsed) || parsed.length === 0) return null;
  return parsed.every((v): v is number => typeof v === "number" && Number.isFinite(v)) ? parsed : null;
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      return Array.isArray(value)
        ? value.every(isJsonValue)
        : Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}
