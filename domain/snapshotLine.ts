/**
 * Snapshot lines — immutable, tagged by `type`. Source order is meaningful.
 */

import type { IsoTimestamp, Uuid } from "./core.js";

export interface MomentIdLine {
  readonly type: "MomentId";
  readonly value: Uuid;
}

export interface SnapshotIdLine {
  readonly type: "SnapshotId";
  readonly value: Uuid;
}

export interface PreviousSnapshotIdLine {
  readonly type: "PreviousSnapshotId";
  readonly value: Uuid;
}

export interface TimestampLine {
  readonly type: "Timestamp";
  readonly value: IsoTimestamp;
}

/** Text between the fences, verbatim (line breaks included). */
export interface AnnotationsLine {
  readonly type: "Annotations";
  readonly raw: string;
}

/** Any line without a header prefix, minus its terminator. */
export interface MomentLine {
  readonly type: "MomentLine";
  readonly text: string;
}

export type HeaderLine =
  | MomentIdLine
  | SnapshotIdLine
  | PreviousSnapshotIdLine
  | TimestampLine
  | AnnotationsLine;

export type SnapshotLine = HeaderLine | MomentLine;

export type HeaderType = HeaderLine["type"];

/** Parsed snapshot. Frozen; each parse yields a fresh one. */
export interface Snapshot {
  readonly lines: readonly SnapshotLine[];
}

/** Literal line prefix for a header. */
export function headerPrefix(type: HeaderType): string {
  switch (type) {
    case "MomentId":
      return "# Moment ID:";
    case "SnapshotId":
      return "# Snapshot ID:";
    case "PreviousSnapshotId":
      return "# Previous Snapshot ID:";
    case "Timestamp":
      return "# Timestamp:";
    case "Annotations":
      return "# Annotations:";
  }
}

export const ANNOTATION_FENCE = "```";
