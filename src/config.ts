import { z } from "zod/v4";

export interface BrokerServerConfig {
  port: number;
  host: string;
  model: string;
  maxTurns: number;
  heartbeatMs: number;
  /** Per-question limit; undefined means askers wait until answered or drained. */
  requestTimeoutMs?: number;
  sweepIntervalMs: number;
  settledRetentionMs: number;
  debug: boolean;
}

type Env = Record<string, string | undefined>;

const positiveInt = z.coerce.number().int().positive();

function readInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;

  const parsed = positiveInt.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`${key} must be a positive integer, got "${raw}"`);
  }
  return parsed.data;
}

export function loadConfig(env: Env = process.env): BrokerServerConfig {
  const timeout = env.REQUEST_TIMEOUT_MS;

  return {
    port: readInt(env, "PORT", 8000),
    host: env.HOST || "0.0.0.0",
    model: env.AGENT_MODEL || "claude-sonnet-4-5",
    maxTurns: readInt(env, "MAX_TURNS", 6),
    heartbeatMs: readInt(env, "HEARTBEAT_MS", 15_000),
    requestTimeoutMs: timeout ? readInt(env, "REQUEST_TIMEOUT_MS", 0) : undefined,
    sweepIntervalMs: readInt(env, "SWEEP_INTERVAL_MS", 60_000),
    settledRetentionMs: readInt(env, "SETTLED_RETENTION_MS", 300_000),
    debug: env.DEBUG === "true",
  };
}

/** The ordering agent cannot start without a model key. */
export function requireApiKey(env: Env = process.env): string {
  const key = env.ANTHROPIC_API_KEY;
  if (!key) {
    throw new Error("ANTHROPIC_API_KEY environment variable is required");
  }
  return key;
}
