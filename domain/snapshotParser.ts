/**
 * Snapshot parser — single forward cursor, ordered header alternation.
 * Pure and synchronous; linear in input length.
 */

import { asLineNumber } from "./core.js";
import { MalformedHeaderError, UnterminatedAnnotationsError } from "./errors.js";
import { ANNOTATION_FENCE, headerPrefix } from "./snapshotLine.js";
import type { HeaderLine, HeaderType, Snapshot, SnapshotLine } from "./snapshotLine.js";
import { isIsoTimestamp, isUuid, TIMESTAMP_EXPECTATION, UUID_EXPECTATION } from "./validation.js";

/**
 * What to do with a line whose header prefix matches but whose payload does not.
 * "reject" throws MalformedHeaderError; "keep-as-text" keeps the line as a MomentLine.
 */
export type MalformedHeaderPolicy = "reject" | "keep-as-text";

export interface ParseOptions {
  readonly malformedHeaders?: MalformedHeaderPolicy;
}

interface Step {
  readonly kind: "matched";
  readonly line: SnapshotLine;
  /** Offset of the next line start. */
  readonly next: number;
  /** Line breaks consumed, including the terminator. */
  readonly breaks: number;
}

type MatchResult =
  | { readonly kind: "none" }
  | Step
  | { readonly kind: "malformed"; readonly header: HeaderType; readonly line: number; readonly expected: string };

type HeaderMatcher = (text: string, start: number, line: number) => MatchResult;

const NO_MATCH: MatchResult = { kind: "none" };

/** End of the line starting at `from` and the offset after its terminator. */
function lineEnd(text: string, from: number): { end: number; next: number } {
  for (let i = from; i < text.length; i++) {
    const ch = text[i];
    if (ch === "\n") return { end: i, next: i + 1 };
    if (ch === "\r") return { end: i, next: text[i + 1] === "\n" ? i + 2 : i + 1 };
  }
  return { end: text.length, next: text.length };
}

/** Length of the terminator at `at`: 0 at end of input, null if none there. */
function terminatorLength(text: string, at: number): number | null {
  if (at === text.length) return 0;
  if (text[at] === "\n") return 1;
  if (text[at] === "\r") return text[at + 1] === "\n" ? 2 : 1;
  return null;
}

function skipHorizontalSpace(text: string, from: number): number {
  let i = from;
  while (text[i] === " " || text[i] === "\t") i++;
  return i;
}

function countLineBreaks(text: string): number {
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    if (text[i] === "\n") count++;
    else if (text[i] === "\r" && text[i + 1] !== "\n") count++;
  }
  return count;
}

/** Header with a single-line typed payload (ids, timestamp). */
function valueHeader(
  type: Exclude<HeaderType, "Annotations">,
  expected: string,
  build: (payload: string) => HeaderLine | null
): HeaderMatcher {
  const prefix = headerPrefix(type);
  return (text, start, line) => {
    if (!text.startsWith(prefix, start)) return NO_MATCH;
    const { end, next } = lineEnd(text, start);
    const afterPrefix = start + prefix.length;
    const payloadStart = skipHorizontalSpace(text, afterPrefix);
    if (payloadStart === afterPrefix) {
      return { kind: "malformed", header: type, line, expected: `whitespace then ${expected}` };
    }
    const built = build(text.slice(payloadStart, end));
    if (built === null) return { kind: "malformed", header: type, line, expected };
    return { kind: "matched", line: built, next, breaks: next > end ? 1 : 0 };
  };
}

/**
 * Fenced annotations block. The body runs to the first fence found by substring
 * search; inside a longer run of backticks the last three close the block.
 */
const annotationsHeader: HeaderMatcher = (text, start, line) => {
  const prefix = headerPrefix("Annotations");
  if (!text.startsWith(prefix, start)) return NO_MATCH;
  const afterPrefix = start + prefix.length;
  const openAt = skipHorizontalSpace(text, afterPrefix);
  if (openAt === afterPrefix || !text.startsWith(ANNOTATION_FENCE, openAt)) {
    return { kind: "malformed", header: "Annotations", line, expected: `whitespace then ${ANNOTATION_FENCE}` };
  }

  const bodyStart = openAt + ANNOTATION_FENCE.length;
  let closeAt = text.indexOf(ANNOTATION_FENCE, bodyStart);
  if (closeAt === -1) throw new UnterminatedAnnotationsError(asLineNumber(line));
  while (text[closeAt + ANNOTATION_FENCE.length] === "`") closeAt++;

  const raw = text.slice(bodyStart, closeAt);
  const innerBreaks = countLineBreaks(raw);
  const afterClose = closeAt + ANNOTATION_FENCE.length;
  const terminator = terminatorLength(text, afterClose);
  if (terminator === null) {
    return {
      kind: "malformed",
      header: "Annotations",
      line: line + innerBreaks,
      expected: `line break after closing ${ANNOTATION_FENCE}`,
    };
  }
  return {
    kind: "matched",
    line: { type: "Annotations", raw },
    next: afterClose + terminator,
    breaks: innerBreaks + (terminator > 0 ? 1 : 0),
  };
};

/** Tried in order; first non-"none" result wins. */
const HEADER_MATCHERS: readonly HeaderMatcher[] = [
  valueHeader("MomentId", UUID_EXPECTATION, (p) => (isUuid(p) ? { type: "MomentId", value: p } : null)),
  valueHeader("SnapshotId", UUID_EXPECTATION, (p) => (isUuid(p) ? { type: "SnapshotId", value: p } : null)),
  valueHeader("PreviousSnapshotId", UUID_EXPECTATION, (p) =>
    isUuid(p) ? { type: "PreviousSnapshotId", value: p } : null
  ),
  valueHeader("Timestamp", TIMESTAMP_EXPECTATION, (p) =>
    isIsoTimestamp(p) ? { type: "Timestamp", value: p } : null
  ),
  annotationsHeader,
];

function momentLineAt(text: string, start: number): Step {
  const { end, next } = lineEnd(text, start);
  return {
    kind: "matched",
    line: { type: "MomentLine", text: text.slice(start, end) },
    next,
    breaks: next > end ? 1 : 0,
  };
}

function stepAt(text: string, start: number, line: number, policy: MalformedHeaderPolicy): Step {
  for (const matcher of HEADER_MATCHERS) {
    const result = matcher(text, start, line);
    switch (result.kind) {
      case "none":
        continue;
      case "matched":
        return result;
      case "malformed":
        if (policy === "reject") {
          throw new MalformedHeaderError(result.header, asLineNumber(result.line), result.expected);
        }
        return momentLineAt(text, start);
    }
  }
  return momentLineAt(text, start);
}

/**
 * Parse snapshot text into its ordered lines.
 * Throws MalformedHeaderError (policy "reject") or UnterminatedAnnotationsError.
 */
export function parseSnapshot(text: string, options: ParseOptions = {}): Snapshot {
  const policy = options.malformedHeaders ?? "reject";
  const lines: SnapshotLine[] = [];
  let pos = 0;
  let line = 1;
  while (pos < text.length) {
    const step = stepAt(text, pos, line, policy);
    lines.push(Object.freeze(step.line));
    pos = step.next;
    line += step.breaks;
  }
  return Object.freeze({ lines: Object.freeze(lines) });
}
