/**
 * Snapshot record — keyed view over parsed lines, plus text rendering.
 * Annotation text and body lines stay opaque strings.
 */

import type { IsoTimestamp, Uuid } from "./core.js";
import { ValidationError } from "./errors.js";
import { ANNOTATION_FENCE, headerPrefix } from "./snapshotLine.js";
import type { HeaderType, Snapshot } from "./snapshotLine.js";
import { isIsoTimestamp, isUuid } from "./validation.js";

export interface SnapshotRecord {
  readonly momentId: Uuid;
  readonly snapshotId: Uuid;
  readonly previousSnapshotId: Uuid | null;
  readonly timestamp: IsoTimestamp;
  /** Fenced block text without its opening and closing line breaks. */
  readonly annotations: string | null;
  /** MomentLine texts in source order. */
  readonly body: readonly string[];
}

const HEADER_TYPES: readonly HeaderType[] = [
  "MomentId",
  "SnapshotId",
  "PreviousSnapshotId",
  "Timestamp",
  "Annotations",
];

function stripLeadingLineBreak(text: string): string {
  if (text.startsWith("\r\n")) return text.slice(2);
  if (text.startsWith("\n") || text.startsWith("\r")) return text.slice(1);
  return text;
}

function stripTrailingLineBreak(text: string): string {
  if (text.endsWith("\r\n")) return text.slice(0, -2);
  if (text.endsWith("\n") || text.endsWith("\r")) return text.slice(0, -1);
  return text;
}

function required<T>(value: T | null, header: HeaderType): T {
  if (value === null) {
    throw new ValidationError(`Missing ${header} header`, { header });
  }
  return value;
}

/**
 * Fold lines into a record. Moment ID, Snapshot ID and Timestamp are required;
 * every header may appear at most once.
 */
export function buildSnapshotRecord(snapshot: Snapshot): SnapshotRecord {
  let momentId: Uuid | null = null;
  let snapshotId: Uuid | null = null;
  let previousSnapshotId: Uuid | null = null;
  let timestamp: IsoTimestamp | null = null;
  let annotations: string | null = null;
  const body: string[] = [];
  const seen = new Set<HeaderType>();

  for (const line of snapshot.lines) {
    if (line.type === "MomentLine") {
      body.push(line.text);
      continue;
    }
    if (seen.has(line.type)) {
      throw new ValidationError(`Duplicate ${line.type} header`, { header: line.type });
    }
    seen.add(line.type);
    switch (line.type) {
      case "MomentId":
        momentId = line.value;
        break;
      case "SnapshotId":
        snapshotId = line.value;
        break;
      case "PreviousSnapshotId":
        previousSnapshotId = line.value;
        break;
      case "Timestamp":
        timestamp = line.value;
        break;
      case "Annotations":
        annotations = stripTrailingLineBreak(stripLeadingLineBreak(line.raw));
        break;
    }
  }

  return {
    momentId: required(momentId, "MomentId"),
    snapshotId: required(snapshotId, "SnapshotId"),
    previousSnapshotId,
    timestamp: required(timestamp, "Timestamp"),
    annotations,
    body,
  };
}

/** Render a record as snapshot text: headers first, then body lines. */
export function renderSnapshotRecord(record: SnapshotRecord): string {
  let text = "";
  text += `${headerPrefix("MomentId")} ${record.momentId}\n`;
  text += `${headerPrefix("SnapshotId")} ${record.snapshotId}\n`;
  if (record.previousSnapshotId !== null) {
    text += `${headerPrefix("PreviousSnapshotId")} ${record.previousSnapshotId}\n`;
  }
  text += `${headerPrefix("Timestamp")} ${record.timestamp}\n`;
  if (record.annotations !== null) {
    text += `${headerPrefix("Annotations")} ${ANNOTATION_FENCE}\n${record.annotations}\n${ANNOTATION_FENCE}\n`;
  }
  for (const line of record.body) {
    text += line + "\n";
  }
  return text;
}

function readUuid(obj: Record<string, unknown>, field: string): Uuid {
  const value = obj[field];
  if (typeof value !== "string" || !isUuid(value)) {
    throw new ValidationError(`${field} must be a UUID`, { field });
  }
  return value;
}

function readAnnotations(value: unknown): string | null {
  if (value == null) return null;
  if (typeof value !== "string") {
    throw new ValidationError("annotations must be a string", { field: "annotations" });
  }
  if (value.includes(ANNOTATION_FENCE)) {
    throw new ValidationError(`annotations must not contain ${ANNOTATION_FENCE}`, { field: "annotations" });
  }
  // Rendering appends "\n"; a trailing "\r" would merge into "\r\n" and be stripped.
  if (value.endsWith("\r")) {
    throw new ValidationError("annotations must not end with a carriage return", { field: "annotations" });
  }
  return value;
}

/**
 * Validate untyped data (e.g. a JSON body) as a SnapshotRecord.
 * Rejects values that would not render back to the same record.
 */
export function readSnapshotRecord(data: unknown): SnapshotRecord {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new ValidationError("Snapshot record must be an object");
  }
  const obj = data as Record<string, unknown>;

  const momentId = readUuid(obj, "momentId");
  const snapshotId = readUuid(obj, "snapshotId");
  const previousSnapshotId = obj.previousSnapshotId == null ? null : readUuid(obj, "previousSnapshotId");

  const timestamp = obj.timestamp;
  if (typeof timestamp !== "string" || !isIsoTimestamp(timestamp)) {
    throw new ValidationError("timestamp must be an ISO-8601 timestamp", { field: "timestamp" });
  }

  const annotations = readAnnotations(obj.annotations);

  const rawBody = obj.body ?? [];
  if (!Array.isArray(rawBody)) {
    throw new ValidationError("body must be an array of strings", { field: "body" });
  }
  const items: readonly unknown[] = rawBody;
  const body: string[] = [];
  for (const [index, line] of items.entries()) {
    if (typeof line !== "string" || /[\r\n]/.test(line)) {
      throw new ValidationError("body lines must be single-line strings", { field: "body", index });
    }
    const text = line;
    if (HEADER_TYPES.some((type) => text.startsWith(headerPrefix(type)))) {
      throw new ValidationError("body line must not start with a header prefix", { field: "body", index });
    }
    body.push(text);
  }

  return { momentId, snapshotId, previousSnapshotId, timestamp, annotations, body };
}
