/**
 * Server configuration from environment variables.
 * Invalid values fail at startup.
 */

import { ValidationError } from "../domain/errors.js";
import type { MalformedHeaderPolicy } from "../domain/snapshotParser.js";

export interface ServerConfig {
  readonly port: number;
  readonly host: string;
  readonly maxBodyBytes: number;
  readonly malformedHeaders: MalformedHeaderPolicy;
}

const DEFAULT_PORT = 3_000;
const DEFAULT_HOST = "0.0.0.0";
const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive integer`, { name, value: raw });
  }
  return value;
}

function readPolicy(env: NodeJS.ProcessEnv): MalformedHeaderPolicy {
  const raw = env.SNAPSHOT_MALFORMED_HEADERS;
  if (raw === undefined || raw === "") return "reject";
  if (raw === "reject" || raw === "keep-as-text") return raw;
  throw new ValidationError("SNAPSHOT_MALFORMED_HEADERS must be 'reject' or 'keep-as-text'", { value: raw });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: readPositiveInt(env, "PORT", DEFAULT_PORT),
    host: env.HOST || DEFAULT_HOST,
    maxBodyBytes: readPositiveInt(env, "MAX_BODY_BYTES", DEFAULT_MAX_BODY_BYTES),
    malformedHeaders: readPolicy(env),
  };
}
