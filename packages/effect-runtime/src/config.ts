/**
 * Graph configuration: defaults, then GRADGRAPH_* environment variables,
 * then explicit overrides. Every field is validated.
 */
import { Effect } from "effect";
import {
  type GraphConfig,
  type LogLevelName,
  ConfigError,
  defaultGraphConfig,
  isDtype,
} from "@gradgraph/core";
import { backendRegistry } from "@gradgraph/tensor";

export type Env = Readonly<Record<string, string | undefined>>;

const LOG_LEVELS: readonly LogLevelName[] = ["debug", "info", "warn", "error"];

function isLogLevel(s: string): s is LogLevelName {
  return LOG_LEVELS.some((l) => l === s);
}

function envNumber(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = Number(raw);
  if (Number.isNaN(n)) {
    throw new ConfigError({ message: `${key}: "${raw}" is not a number` });
  }
  return n;
}

function fromEnv(env: Env): Partial<Record<keyof GraphConfig, string | number>> {
  const out: Partial<Record<keyof GraphConfig, string | number>> = {};
  if (env.GRADGRAPH_BACKEND) out.backend = env.GRADGRAPH_BACKEND;
  if (env.GRADGRAPH_DTYPE) out.dtype = env.GRADGRAPH_DTYPE;
  if (env.GRADGRAPH_LOG_LEVEL) out.logLevel = env.GRADGRAPH_LOG_LEVEL;
  const eps = envNumber(env, "GRADGRAPH_GRADCHECK_EPS");
  if (eps !== undefined) out.gradCheckEps = eps;
  const atol = envNumber(env, "GRADGRAPH_GRADCHECK_ATOL");
  if (atol !== undefined) out.gradCheckAtol = atol;
  const rtol = envNumber(env, "GRADGRAPH_GRADCHECK_RTOL");
  if (rtol !== undefined) out.gradCheckRtol = rtol;
  return out;
}

function validate(raw: Record<keyof GraphConfig, string | number>): GraphConfig {
  const backend = String(raw.backend);
  if (!backendRegistry.has(backend)) {
    throw new ConfigError({
      message: `backend: unknown "${backend}". Available: ${backendRegistry.list().join(", ")}`,
    });
  }
  const dtype = String(raw.dtype);
  if (!isDtype(dtype)) {
    throw new ConfigError({ message: `dtype: expected f32 or f64, got "${dtype}"` });
  }
  const logLevel = String(raw.logLevel).toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigError({ message: `logLevel: expected one of ${LOG_LEVELS.join(", ")}, got "${raw.logLevel}"` });
  }
  const num = (key: "gradCheckEps" | "gradCheckAtol" | "gradCheckRtol", allowZero: boolean): number => {
    const v = Number(raw[key]);
    if (!Number.isFinite(v) || v < 0 || (!allowZero && v === 0)) {
      throw new ConfigError({
        message: `${key}: expected a ${allowZero ? "non-negative" : "positive"} number, got ${raw[key]}`,
      });
    }
    return v;
  };
  return {
    backend,
    dtype,
    logLevel,
    gradCheckEps: num("gradCheckEps", false),
    gradCheckAtol: num("gradCheckAtol", true),
    gradCheckRtol: num("gradCheckRtol", true),
  };
}

export function loadConfig(
  overrides: Partial<GraphConfig> = {},
  env: Env = process.env,
): Effect.Effect<GraphConfig, ConfigError> {
  return Effect.try({
    try: () => validate({ ...defaultGraphConfig, ...fromEnv(env), ...overrides }),
    catch: (cause) =>
      cause instanceof ConfigError ? cause : new ConfigError({ message: String(cause), cause }),
  });
}
