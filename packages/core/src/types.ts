/**
 * Core types for the gradgraph system.
 */

// ── Dtype ──────────────────────────────────────────────────────────────────
export type Dtype = "f32" | "f64";

export type NumericArray = Float32Array | Float64Array;

/** Zero-filled backing array of `size` elements for a dtype. */
export function allocArray(d: Dtype, size: number): NumericArray {
  switch (d) {
    case "f32": return new Float32Array(size);
    case "f64": return new Float64Array(size);
  }
}

export function isDtype(s: string): s is Dtype {
  return s === "f32" || s === "f64";
}

// ── Shape helpers ──────────────────────────────────────────────────────────
export type Shape = readonly number[];

export function shapeSize(shape: Shape): number {
  let s = 1;
  for (const d of shape) s *= d;
  return s;
}

export function shapeEquals(a: Shape, b: Shape): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/** `[2,3]`, or `[]` for a scalar. */
export function formatShape(shape: Shape): string {
  return `[${shape.join(",")}]`;
}

// ── Graph config ───────────────────────────────────────────────────────────
export type LogLevelName = "debug" | "info" | "warn" | "error";

export interface GraphConfig {
  readonly backend: string;
  readonly dtype: Dtype;
  readonly logLevel: LogLevelName;
  /** Step used for central differences in gradCheck. */
  readonly gradCheckEps: number;
  readonly gradCheckAtol: number;
  readonly gradCheckRtol: number;
}

export const defaultGraphConfig: GraphConfig = {
  backend: "cpu_ref",
  dtype: "f64",
  logLevel: "info",
  gradCheckEps: 1e-6,
  gradCheckAtol: 1e-6,
  gradCheckRtol: 1e-4,
};
