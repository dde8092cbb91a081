/**
 * Subsystem interfaces (ports).
 */
import { Context } from "effect";
import type { Dtype, NumericArray, Shape } from "./types.js";

// ── Tensor (lightweight handle) ────────────────────────────────────────────
export interface TensorData {
  readonly shape: Shape;
  readonly dtype: Dtype;
  readonly data: NumericArray;
}

// ── Backend ────────────────────────────────────────────────────────────────
/**
 * The tensor capability set the graph depends on. Binary ops require exact
 * shape agreement; nothing broadcasts.
 */
export interface Backend {
  readonly name: string;
  readonly dtype: Dtype;

  // creation
  zeros(shape: Shape): TensorData;
  ones(shape: Shape): TensorData;
  full(shape: Shape, value: number): TensorData;
  /** 0-dimensional tensor holding `value`. */
  scalar(value: number): TensorData;
  fromArray(data: readonly number[], shape: Shape): TensorData;

  // element-wise
  add(a: TensorData, b: TensorData): TensorData;
  sub(a: TensorData, b: TensorData): TensorData;
  mul(a: TensorData, b: TensorData): TensorData;
  scale(a: TensorData, s: number): TensorData;
  neg(a: TensorData): TensorData;
  square(a: TensorData): TensorData;
  tanh(a: TensorData): TensorData;

  // reductions / linear algebra
  /** Sum of every element, as a 0-d tensor. */
  sum(a: TensorData): TensorData;
  /** Inner product of two equal-length vectors, as a 0-d tensor. */
  dot(a: TensorData, b: TensorData): TensorData;
  /** [m,n] · [n] → [m] */
  matvec(m: TensorData, v: TensorData): TensorData;
  transpose(m: TensorData): TensorData;
  /** [m] ⊗ [n] → [m,n] */
  outer(a: TensorData, b: TensorData): TensorData;

  // accumulation
  /** target += src, in place. */
  addInplace(target: TensorData, src: TensorData): void;

  // utility
  /** Value of a single-element tensor. */
  item(a: TensorData): number;
  clone(a: TensorData): TensorData;
  equal(a: TensorData, b: TensorData): boolean;
  allClose(a: TensorData, b: TensorData, atol?: number, rtol?: number): boolean;
}

export class BackendService extends Context.Tag("BackendService")<
  BackendService,
  Backend
>() {}
