/**
 * Effect layers for dependency injection.
 *
 * The backend is resolved from config through the tensor registry; the
 * runtime wrapper also installs the pretty logger at the configured level.
 */
import { Layer, Effect, Logger } from "effect";
import {
  BackendService,
  ConfigError,
  type Backend,
  type GraphConfig,
} from "@gradgraph/core";
import { backendRegistry } from "@gradgraph/tensor";
import { prettyLogger, parseLogLevel } from "./logging.js";

// ── Backend Layer ──────────────────────────────────────────────────────────

export const BackendLive = (config: GraphConfig) =>
  Layer.effect(
    BackendService,
    Effect.try({
      try: () => backendRegistry.get(config.backend, config.dtype),
      catch: (cause) => new ConfigError({ message: `cannot create backend "${config.backend}"`, cause }),
    }),
  );

export const BackendFrom = (backend: Backend) =>
  Layer.succeed(BackendService, backend);

// ── Logger Layer ───────────────────────────────────────────────────────────

export const PrettyLoggerLive = Logger.replace(Logger.defaultLogger, prettyLogger);

// ── Runtime ────────────────────────────────────────────────────────────────

/** Provide the configured backend and logger to a program. */
export const withRuntime = (config: GraphConfig) =>
  <A, E>(program: Effect.Effect<A, E, BackendService>): Effect.Effect<A, E | ConfigError> =>
    program.pipe(
      Effect.provide(BackendLive(config)),
      Effect.provide(PrettyLoggerLive),
      Logger.withMinimumLogLevel(parseLogLevel(config.logLevel)),
    );
