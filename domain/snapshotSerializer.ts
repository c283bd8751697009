/**
 * Snapshot serializer — canonical text for parsed lines.
 * Inverse of parseSnapshot for well-formed, `\n`-terminated input.
 */

import { ANNOTATION_FENCE, headerPrefix } from "./snapshotLine.js";
import type { Snapshot, SnapshotLine } from "./snapshotLine.js";
import { neverReached } from "./validation.js";

/** Canonical text of one line, without terminator. */
export function formatSnapshotLine(line: SnapshotLine): string {
  switch (line.type) {
    case "MomentId":
    case "SnapshotId":
    case "PreviousSnapshotId":
    case "Timestamp":
      return `${headerPrefix(line.type)} ${line.value}`;
    case "Annotations":
      return `${headerPrefix(line.type)} ${ANNOTATION_FENCE}${line.raw}${ANNOTATION_FENCE}`;
    case "MomentLine":
      return line.text;
    default:
      return neverReached(line, "Unknown snapshot line");
  }
}

export function serializeSnapshot(snapshot: Snapshot): string {
  return snapshot.lines.map((line) => formatSnapshotLine(line) + "\n").join("");
}
