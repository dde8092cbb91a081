/**
 * cpu_ref -- Reference CPU backend for the gradgraph tensor system.
 *
 * Every operation is implemented with straightforward loops over typed arrays.
 * The goal is correctness, not speed.
 */

import {
  type Backend,
  type TensorData,
  type Dtype,
  type Shape,
  type NumericArray,
  ShapeError,
  allocArray,
  shapeSize,
  shapeEquals,
  formatShape,
} from "@gradgraph/core";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeTensor(shape: Shape, dtype: Dtype, data: NumericArray): TensorData {
  return { shape: [...shape], dtype, data };
}

function allocTensor(shape: Shape, dtype: Dtype): TensorData {
  return makeTensor(shape, dtype, allocArray(dtype, shapeSize(shape)));
}

/** Resolve the common dtype for a binary op (promote to f64 if mixed). */
function commonDtype(a: Dtype, b: Dtype): Dtype {
  return a === b ? a : "f64";
}

function requireSameShape(op: string, a: TensorData, b: TensorData): void {
  if (!shapeEquals(a.shape, b.shape)) {
    throw new ShapeError({
      message: `${op}: shape mismatch, expected ${formatShape(a.shape)} but got ${formatShape(b.shape)}`,
      expected: a.shape,
      actual: b.shape,
    });
  }
}

function requireRank(op: string, a: TensorData, rank: number): void {
  if (a.shape.length !== rank) {
    throw new ShapeError({
      message: `${op}: expected a rank-${rank} tensor but got ${formatShape(a.shape)}`,
      expected: new Array<number>(rank).fill(-1),
      actual: a.shape,
    });
  }
}

function binaryOp(
  op: string,
  a: TensorData,
  b: TensorData,
  fn: (x: number, y: number) => number,
): TensorData {
  requireSameShape(op, a, b);
  const out = allocTensor(a.shape, commonDtype(a.dtype, b.dtype));
  for (let i = 0; i < out.data.length; i++) {
    out.data[i] = fn(a.data[i], b.data[i]);
  }
  return out;
}

function unaryOp(a: TensorData, fn: (x: number) => number): TensorData {
  const out = allocTensor(a.shape, a.dtype);
  for (let i = 0; i < a.data.length; i++) {
    out.data[i] = fn(a.data[i]);
  }
  return out;
}

// ---------------------------------------------------------------------------
// CpuRefBackend
// ---------------------------------------------------------------------------

export class CpuRefBackend implements Backend {
  readonly name = "cpu_ref";
  readonly dtype: Dtype;

  constructor(dtype: Dtype = "f64") {
    this.dtype = dtype;
  }

  // ── creation ────────────────────────────────────────────────────────────

  zeros(shape: Shape): TensorData {
    return allocTensor(shape, this.dtype);
  }

  ones(shape: Shape): TensorData {
    return this.full(shape, 1);
  }

  full(shape: Shape, value: number): TensorData {
    const t = allocTensor(shape, this.dtype);
    t.data.fill(value);
    return t;
  }

  scalar(value: number): TensorData {
    return this.full([], value);
  }

  fromArray(data: readonly number[], shape: Shape): TensorData {
    const size = shapeSize(shape);
    if (data.length !== size) {
      throw new ShapeError({
        message: `fromArray: data length ${data.length} does not match shape ${formatShape(shape)} (size ${size})`,
        expected: shape,
        actual: [data.length],
      });
    }
    const t = allocTensor(shape, this.dtype);
    t.data.set(data);
    return t;
  }

  // ── element-wise ────────────────────────────────────────────────────────

  add(a: TensorData, b: TensorData): TensorData {
    return binaryOp("add", a, b, (x, y) => x + y);
  }

  sub(a: TensorData, b: TensorData): TensorData {
    return binaryOp("sub", a, b, (x, y) => x - y);
  }

  mul(a: TensorData, b: TensorData): TensorData {
    return binaryOp("mul", a, b, (x, y) => x * y);
  }

  scale(a: TensorData, s: number): TensorData {
    return unaryOp(a, (x) => x * s);
  }

  neg(a: TensorData): TensorData {
    return unaryOp(a, (x) => -x);
  }

  square(a: TensorData): TensorData {
    return unaryOp(a, (x) => x * x);
  }

  tanh(a: TensorData): TensorData {
    return unaryOp(a, Math.tanh);
  }

  // ── reductions / linear algebra ─────────────────────────────────────────

  sum(a: TensorData): TensorData {
    let s = 0;
    for (let i = 0; i < a.data.length; i++) s += a.data[i];
    const out = allocTensor([], a.dtype);
    out.data[0] = s;
    return out;
  }

  dot(a: TensorData, b: TensorData): TensorData {
    requireRank("dot", a, 1);
    requireSameShape("dot", a, b);
    let s = 0;
    for (let i = 0; i < a.data.length; i++) s += a.data[i] * b.data[i];
    const out = allocTensor([], commonDtype(a.dtype, b.dtype));
    out.data[0] = s;
    return out;
  }

  matvec(m: TensorData, v: TensorData): TensorData {
    requireRank("matvec", m, 2);
    requireRank("matvec", v, 1);
    const [rows, cols] = m.shape;
    if (v.shape[0] !== cols) {
      throw new ShapeError({
        message: `matvec: expected vector ${formatShape([cols])} for matrix ${formatShape(m.shape)} but got ${formatShape(v.shape)}`,
        expected: [cols],
        actual: v.shape,
      });
    }
    const out = allocTensor([rows], commonDtype(m.dtype, v.dtype));
    for (let i = 0; i < rows; i++) {
      let s = 0;
      const off = i * cols;
      for (let j = 0; j < cols; j++) s += m.data[off + j] * v.data[j];
      out.data[i] = s;
    }
    return out;
  }

  transpose(m: TensorData): TensorData {
    requireRank("transpose", m, 2);
    const [rows, cols] = m.shape;
    const out = allocTensor([cols, rows], m.dtype);
    for (let i = 0; i < rows; i++) {
      for (let j = 0; j < cols; j++) {
        out.data[j * rows + i] = m.data[i * cols + j];
      }
    }
    return out;
  }

  outer(a: TensorData, b: TensorData): TensorData {
    requireRank("outer", a, 1);
    requireRank("outer", b, 1);
    const m = a.shape[0], n = b.shape[0];
    const out = allocTensor([m, n], commonDtype(a.dtype, b.dtype));
    for (let i = 0; i < m; i++) {
      for (let j = 0; j < n; j++) {
        out.data[i * n + j] = a.data[i] * b.data[j];
      }
    }
    return out;
  }

  // ── accumulation ────────────────────────────────────────────────────────

  addInplace(target: TensorData, src: TensorData): void {
    requireSameShape("addInplace", target, src);
    for (let i = 0; i < target.data.length; i++) {
      target.data[i] += src.data[i];
    }
  }

  // ── utility ─────────────────────────────────────────────────────────────

  item(a: TensorData): number {
    if (a.data.length !== 1) {
      throw new ShapeError({
        message: `item: expected a single-element tensor but got ${formatShape(a.shape)}`,
        expected: [],
        actual: a.shape,
      });
    }
    return a.data[0];
  }

  clone(a: TensorData): TensorData {
    return makeTensor(a.shape, a.dtype, a.data.slice());
  }

  equal(a: TensorData, b: TensorData): boolean {
    if (!shapeEquals(a.shape, b.shape)) return false;
    for (let i = 0; i < a.data.length; i++) {
      if (a.data[i] !== b.data[i]) return false;
    }
    return true;
  }

  allClose(a: TensorData, b: TensorData, atol = 1e-8, rtol = 1e-5): boolean {
    if (!shapeEquals(a.shape, b.shape)) return false;
    for (let i = 0; i < a.data.length; i++) {
      if (Math.abs(a.data[i] - b.data[i]) > atol + rtol * Math.abs(b.data[i])) return false;
    }
    return true;
  }
}
