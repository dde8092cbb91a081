/**
 * Differentiable primitives: the closed set of node variants.
 *
 * Each operator reads its predecessors' `out` in forward, keeps what its
 * backward needs, and in backward adds (chain rule) its local derivative
 * times `dOut` into every predecessor's `dOut`.
 */
import { type TensorData, type Backend, GraphError, formatShape } from "@gradgraph/core";
import { Node } from "./node.js";

export type NodeKind =
  | "leaf"
  | "vector-scalar-affine"
  | "squared-l2-distance"
  | "l2-norm-penalty"
  | "elementwise-sum"
  | "affine"
  | "tanh";

export type AnyNode =
  | Leaf
  | VectorScalarAffine
  | SquaredL2Distance
  | L2NormPenalty
  | ElementwiseSum
  | Affine
  | Tanh;

// helper: forward-time cache, which backward requires
function saved<T>(node: Node, value: T | undefined): T {
  if (value === undefined) {
    throw new GraphError({
      kind: "backward-before-forward",
      node: node.name,
      message: `backward called on ${node} before forward`,
    });
  }
  return value;
}

// ── Leaf ───────────────────────────────────────────────────────────────────

/** Externally supplied data or parameters. Has no predecessors. */
export class Leaf extends Node {
  readonly kind = "leaf" as const;

  constructor(name: string, value?: TensorData) {
    super(name, []);
    this.out = value;
  }

  set(value: TensorData): void {
    this.out = value;
  }

  protected compute(): TensorData {
    if (this.out === undefined) {
      throw new GraphError({
        kind: "missing-value",
        node: this.name,
        message: `${this} has no value assigned`,
      });
    }
    return this.out;
  }

  protected propagate(): void {
    // nothing upstream
  }
}

// ── VectorScalarAffine ─────────────────────────────────────────────────────

/** out = dot(x, w) + b, with x and w vectors of equal length and b a scalar. */
export class VectorScalarAffine extends Node {
  readonly kind = "vector-scalar-affine" as const;
  readonly x: AnyNode;
  readonly w: AnyNode;
  readonly b: AnyNode;
  private cache: { x: TensorData; w: TensorData } | undefined;

  constructor(name: string, x: AnyNode, w: AnyNode, b: AnyNode) {
    super(name, [x, w, b]);
    this.x = x;
    this.w = w;
    this.b = b;
  }

  protected compute(B: Backend): TensorData {
    const x = this.valueOf(this.x);
    const w = this.valueOf(this.w);
    const b = this.valueOf(this.b);
    this.expectRank("x", x, 1);
    this.expectShape("w", w, x.shape);
    this.expectShape("b", b, []);
    this.cache = { x, w };
    return B.add(B.dot(x, w), b);
  }

  protected propagate(B: Backend, dOut: TensorData): void {
    const { x, w } = saved(this, this.cache);
    const g = B.item(dOut);
    this.accumulate(B, this.x, B.scale(w, g));
    this.accumulate(B, this.w, B.scale(x, g));
    this.accumulate(B, this.b, dOut);
  }
}

// ── SquaredL2Distance ──────────────────────────────────────────────────────

/** out = sum((a - b)^2) */
export class SquaredL2Distance extends Node {
  readonly kind = "squared-l2-distance" as const;
  readonly a: AnyNode;
  readonly b: AnyNode;
  private diff: TensorData | undefined;

  constructor(name: string, a: AnyNode, b: AnyNode) {
    super(name, [a, b]);
    this.a = a;
    this.b = b;
  }

  protected compute(B: Backend): TensorData {
    const a = this.valueOf(this.a);
    const b = this.valueOf(this.b);
    this.expectShape("b", b, a.shape);
    const diff = B.sub(a, b);
    this.diff = diff;
    return B.sum(B.square(diff));
  }

  protected propagate(B: Backend, dOut: TensorData): void {
    const diff = saved(this, this.diff);
    const ga = B.scale(diff, 2 * B.item(dOut));
    this.accumulate(B, this.a, ga);
    this.accumulate(B, this.b, B.neg(ga));
  }
}

// ── L2NormPenalty ──────────────────────────────────────────────────────────

/**
 * out = lambda * sum(w^2). `lambda` is a fixed construction parameter, not a
 * predecessor, and receives no gradient.
 */
export class L2NormPenalty extends Node {
  readonly kind = "l2-norm-penalty" as const;
  readonly lambda: number;
  readonly w: AnyNode;
  private weights: TensorData | undefined;

  constructor(name: string, lambda: number, w: AnyNode) {
    super(name, [w]);
    if (!Number.isFinite(lambda) || lambda < 0) {
      throw new GraphError({
        kind: "invalid-parameter",
        node: name,
        message: `l2-norm-penalty(${name}): lambda must be a finite non-negative number, got ${lambda}`,
      });
    }
    this.lambda = lambda;
    this.w = w;
  }

  protected compute(B: Backend): TensorData {
    const w = this.valueOf(this.w);
    this.weights = w;
    return B.scale(B.sum(B.square(w)), this.lambda);
  }

  protected propagate(B: Backend, dOut: TensorData): void {
    const w = saved(this, this.weights);
    this.accumulate(B, this.w, B.scale(w, 2 * this.lambda * B.item(dOut)));
  }
}

// ── ElementwiseSum ─────────────────────────────────────────────────────────

/** out = a + b, same shapes. */
export class ElementwiseSum extends Node {
  readonly kind = "elementwise-sum" as const;
  readonly a: AnyNode;
  readonly b: AnyNode;

  constructor(name: string, a: AnyNode, b: AnyNode) {
    super(name, [a, b]);
    this.a = a;
    this.b = b;
  }

  protected compute(B: Backend): TensorData {
    const a = this.valueOf(this.a);
    const b = this.valueOf(this.b);
    this.expectShape("b", b, a.shape);
    return B.add(a, b);
  }

  protected propagate(B: Backend, dOut: TensorData): void {
    this.accumulate(B, this.a, dOut);
    this.accumulate(B, this.b, dOut);
  }
}

// ── Affine ─────────────────────────────────────────────────────────────────

/** out = W·x + b, with W [m,n], x [n], b [m]. */
export class Affine extends Node {
  readonly kind = "affine" as const;
  readonly W: AnyNode;
  readonly x: AnyNode;
  readonly b: AnyNode;
  private cache: { W: TensorData; x: TensorData } | undefined;

  constructor(name: string, W: AnyNode, x: AnyNode, b: AnyNode) {
    super(name, [W, x, b]);
    this.W = W;
    this.x = x;
    this.b = b;
  }

  protected compute(B: Backend): TensorData {
    const W = this.valueOf(this.W);
    const x = this.valueOf(this.x);
    const b = this.valueOf(this.b);
    this.expectRank("W", W, 2);
    const [m, n] = W.shape;
    this.expectShape("x", x, [n]);
    this.expectShape("b", b, [m]);
    this.cache = { W, x };
    return B.add(B.matvec(W, x), b);
  }

  protected propagate(B: Backend, dOut: TensorData): void {
    const { W, x } = saved(this, this.cache);
    // dW = dOut ⊗ x, dx = Wᵀ·dOut
    this.accumulate(B, this.W, B.outer(dOut, x));
    this.accumulate(B, this.x, B.matvec(B.transpose(W), dOut));
    this.accumulate(B, this.b, dOut);
  }
}

// ── Tanh ───────────────────────────────────────────────────────────────────

/** Element-wise hyperbolic tangent. */
export class Tanh extends Node {
  readonly kind = "tanh" as const;
  readonly a: AnyNode;

  constructor(name: string, a: AnyNode) {
    super(name, [a]);
    this.a = a;
  }

  protected compute(B: Backend): TensorData {
    return B.tanh(this.valueOf(this.a));
  }

  protected propagate(B: Backend, dOut: TensorData, out: TensorData): void {
    // d tanh(a) = 1 - tanh(a)^2, reusing the forward output
    const local = B.sub(B.ones(out.shape), B.square(out));
    this.accumulate(B, this.a, B.mul(dOut, local));
  }
}

// ── Description ────────────────────────────────────────────────────────────

/** One-line formula for debug output, e.g. `y = tanh(h)`. */
export function describeNode(node: AnyNode): string {
  switch (node.kind) {
    case "leaf":
      return `${node.name} = leaf${node.out ? formatShape(node.out.shape) : "(unset)"}`;
    case "vector-scalar-affine":
      return `${node.name} = dot(${node.x.name}, ${node.w.name}) + ${node.b.name}`;
    case "squared-l2-distance":
      return `${node.name} = sum((${node.a.name} - ${node.b.name})^2)`;
    case "l2-norm-penalty":
      return `${node.name} = ${node.lambda} * sum(${node.w.name}^2)`;
    case "elementwise-sum":
      return `${node.name} = ${node.a.name} + ${node.b.name}`;
    case "affine":
      return `${node.name} = ${node.W.name}·${node.x.name} + ${node.b.name}`;
    case "tanh":
      return `${node.name} = tanh(${node.a.name})`;
  }
}
