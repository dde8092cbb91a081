/**
 * Typed error classes for every subsystem.
 *
 * These are thrown directly by the synchronous graph API and surface in the
 * error channel of the Effect wrappers.
 */
import { Data } from "effect";
import type { Shape } from "./types.js";

export type GraphErrorKind =
  | "cycle"
  | "duplicate-name"
  | "missing-input"
  | "missing-value"
  | "backward-before-forward"
  | "non-scalar-output"
  | "invalid-order"
  | "invalid-parameter"
  | "unknown-node";

/** Structural misuse of the graph: wiring, ordering or construction bugs. */
export class GraphError extends Data.TaggedError("GraphError")<{
  readonly kind: GraphErrorKind;
  readonly message: string;
  readonly node?: string;
}> {}

/** `expected` uses -1 for a dimension of any size. */
export class ShapeError extends Data.TaggedError("ShapeError")<{
  readonly message: string;
  readonly node?: string;
  readonly expected: Shape;
  readonly actual: Shape;
}> {}

export class BackendError extends Data.TaggedError("BackendError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}
