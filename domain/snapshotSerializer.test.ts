import { describe, expect, it } from "vitest";
import { parseSnapshot } from "./snapshotParser.js";
import { formatSnapshotLine, serializeSnapshot } from "./snapshotSerializer.js";
import { asIsoTimestamp, asUuid } from "./core.js";

const MOMENT_ID = "77e39706-d044-4345-afdf-61f7c729f1e3";
const SNAPSHOT_ID = "84bcdd64-fb5f-48b6-a44a-cd3e13a65a88";
const PREVIOUS_ID = "0a1b2c3d-4e5f-4a6b-8c7d-9e0f1a2b3c4d";

describe("formatSnapshotLine()", () => {
  it("formats each line kind canonically", () => {
    expect(formatSnapshotLine({ type: "MomentId", value: asUuid(MOMENT_ID) })).toBe(`# Moment ID: ${MOMENT_ID}`);
    expect(formatSnapshotLine({ type: "SnapshotId", value: asUuid(SNAPSHOT_ID) })).toBe(
      `# Snapshot ID: ${SNAPSHOT_ID}`
    );
    expect(formatSnapshotLine({ type: "PreviousSnapshotId", value: asUuid(PREVIOUS_ID) })).toBe(
      `# Previous Snapshot ID: ${PREVIOUS_ID}`
    );
    expect(formatSnapshotLine({ type: "Timestamp", value: asIsoTimestamp("2023-02-05T14:23:50Z") })).toBe(
      "# Timestamp: 2023-02-05T14:23:50Z"
    );
    expect(formatSnapshotLine({ type: "Annotations", raw: "\nk: v\n" })).toBe("# Annotations: ```\nk: v\n```");
    expect(formatSnapshotLine({ type: "MomentLine", text: "User: hi" })).toBe("User: hi");
  });
});

describe("serializeSnapshot()", () => {
  it("reproduces well-formed input exactly", () => {
    const text = [
      `# Moment ID: ${MOMENT_ID}`,
      `# Snapshot ID: ${SNAPSHOT_ID}`,
      `# Previous Snapshot ID: ${PREVIOUS_ID}`,
      "# Timestamp: 2023-02-05T14:23:50.983374+00:00",
      "# Annotations: ```",
      "toxicity: 0.0004",
      "quoted: `x` and ``y``",
      "```",
      "Self: hello",
      "",
      "User: hi",
      "",
    ].join("\n");
    expect(serializeSnapshot(parseSnapshot(text))).toBe(text);
  });

  it("normalizes terminators and header spacing", () => {
    const text = "# Moment ID:\t  " + MOMENT_ID + "\r\nbody\r\n# Annotations: ```a```";
    expect(serializeSnapshot(parseSnapshot(text))).toBe("# Moment ID: " + MOMENT_ID + "\nbody\n# Annotations: ```a```\n");
  });

  it("empty snapshot serializes to empty text", () => {
    expect(serializeSnapshot(parseSnapshot(""))).toBe("");
  });
});
