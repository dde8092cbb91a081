/**
 * Shared fixtures for the autograd suites.
 */
import type { Backend, TensorData } from "@gradgraph/core";
import {
  Leaf,
  Affine,
  Tanh,
  VectorScalarAffine,
  SquaredL2Distance,
  L2NormPenalty,
  ElementwiseSum,
  Graph,
} from "@gradgraph/autograd";

export function values(t: TensorData | undefined): number[] {
  if (t === undefined) throw new Error("tensor is undefined");
  return Array.from(t.data);
}

/** Run `fn` and return what it throws. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error("expected function to throw");
}

/**
 * A one-hidden-layer regression graph touching every variant:
 * loss = (v·tanh(W·x + b1) + c - target)^2 + 0.01·|W|^2
 */
export function buildNetwork(B: Backend) {
  const x = new Leaf("x", B.fromArray([0.5, -1.0, 2.0], [3]));
  const W = new Leaf("W", B.fromArray([0.1, -0.2, 0.3, 0.4, 0.5, -0.6], [2, 3]));
  const b1 = new Leaf("b1", B.fromArray([0.01, -0.02], [2]));
  const h = new Affine("h", W, x, b1);
  const a = new Tanh("a", h);
  const v = new Leaf("v", B.fromArray([0.7, -0.3], [2]));
  const c = new Leaf("c", B.scalar(0.1));
  const y = new VectorScalarAffine("y", a, v, c);
  const target = new Leaf("target", B.scalar(1.5));
  const err = new SquaredL2Distance("err", y, target);
  const reg = new L2NormPenalty("reg", 0.01, W);
  const loss = new ElementwiseSum("loss", err, reg);
  const graph = new Graph(loss, { backend: B });
  return { graph, x, W, b1, h, a, v, c, y, target, err, reg, loss };
}
