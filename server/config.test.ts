import { describe, expect, it } from "vitest";
import { loadConfig } from "./config.js";
import { ValidationError } from "../domain/errors.js";

describe("loadConfig()", () => {
  it("defaults when env is empty", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      host: "0.0.0.0",
      maxBodyBytes: 1_048_576,
      malformedHeaders: "reject",
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      PORT: "8080",
      HOST: "127.0.0.1",
      MAX_BODY_BYTES: "2048",
      SNAPSHOT_MALFORMED_HEADERS: "keep-as-text",
    });
    expect(config).toEqual({ port: 8080, host: "127.0.0.1", maxBodyBytes: 2048, malformedHeaders: "keep-as-text" });
  });

  it("rejects non-positive or non-integer numbers", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow("PORT must be a positive integer");
    expect(() => loadConfig({ MAX_BODY_BYTES: "0" })).toThrow(ValidationError);
    expect(() => loadConfig({ MAX_BODY_BYTES: "1.5" })).toThrow(ValidationError);
  });

  it("rejects unknown malformed-header policies", () => {
    expect(() => loadConfig({ SNAPSHOT_MALFORMED_HEADERS: "ignore" })).toThrow(
      "SNAPSHOT_MALFORMED_HEADERS must be 'reject' or 'keep-as-text'"
    );
  });
});
