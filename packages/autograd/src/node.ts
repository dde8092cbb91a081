/**
 * Node contract for the computation graph.
 *
 * A node produces one tensor (`out`) from the outputs of a fixed, ordered
 * list of predecessors, and owns the gradient accumulator (`dOut`) that its
 * successors add into during the backward pass.
 */
import {
  type TensorData,
  type Backend,
  type Shape,
  GraphError,
  ShapeError,
  shapeEquals,
  formatShape,
} from "@gradgraph/core";
import type { AnyNode, NodeKind } from "./ops.js";

export abstract class Node {
  abstract readonly kind: NodeKind;
  readonly name: string;
  /** Output of the last forward call; undefined before the first one. */
  out: TensorData | undefined = undefined;
  /** d(graph output)/d(out), accumulated by successors during backward. */
  dOut: TensorData | undefined = undefined;
  private readonly predecessors: readonly AnyNode[];

  protected constructor(name: string, predecessors: readonly AnyNode[]) {
    this.name = name;
    this.predecessors = Object.freeze([...predecessors]);
  }

  getPredecessors(): readonly AnyNode[] {
    return this.predecessors;
  }

  /**
   * Compute `out` from the predecessors' current outputs and reset `dOut`
   * to zeros of the same shape.
   */
  forward(B: Backend): TensorData {
    const out = this.compute(B);
    this.out = out;
    this.dOut = B.zeros(out.shape);
    return out;
  }

  /**
   * Add this node's contribution to every predecessor's `dOut`, given that
   * `dOut` already holds the full upstream gradient.
   */
  backward(B: Backend): void {
    if (this.out === undefined || this.dOut === undefined) {
      throw new GraphError({
        kind: "backward-before-forward",
        node: this.name,
        message: `backward called on ${this} before forward`,
      });
    }
    this.propagate(B, this.dOut, this.out);
  }

  toString(): string {
    return `${this.kind}(${this.name})`;
  }

  protected abstract compute(B: Backend): TensorData;
  protected abstract propagate(B: Backend, dOut: TensorData, out: TensorData): void;

  /** A predecessor's output, which must already be computed this cycle. */
  protected valueOf(pred: Node): TensorData {
    if (pred.out === undefined) {
      throw new GraphError({
        kind: "missing-input",
        node: this.name,
        message: `${this} read ${pred} before it produced an output`,
      });
    }
    return pred.out;
  }

  /** pred.dOut += grad */
  protected accumulate(B: Backend, pred: Node, grad: TensorData): void {
    if (pred.dOut === undefined) {
      throw new GraphError({
        kind: "backward-before-forward",
        node: pred.name,
        message: `${this} propagated into ${pred}, which has not run forward`,
      });
    }
    this.expectShape(`gradient for ${pred.name}`, grad, pred.dOut.shape);
    B.addInplace(pred.dOut, grad);
  }

  protected expectShape(role: string, t: TensorData, expected: Shape): void {
    if (!shapeEquals(t.shape, expected)) {
      throw new ShapeError({
        node: this.name,
        expected,
        actual: t.shape,
        message: `${this}: ${role} expected shape ${formatShape(expected)} but got ${formatShape(t.shape)}`,
      });
    }
  }

  protected expectRank(role: string, t: TensorData, rank: number): void {
    if (t.shape.length !== rank) {
      throw new ShapeError({
        node: this.name,
        expected: new Array<number>(rank).fill(-1),
        actual: t.shape,
        message: `${this}: ${role} expected a rank-${rank} tensor but got ${formatShape(t.shape)}`,
      });
    }
  }
}
