/**
 * Graph driver.
 *
 * Collects every ancestor of a scalar output node, sorts them topologically,
 * and runs forward over that order and backward over its exact reverse.
 * Every node's `dOut` afterwards holds d(output)/d(out), summed over all paths.
 */
import { type TensorData, type Backend, GraphError, formatShape } from "@gradgraph/core";
import type { AnyNode, Leaf } from "./ops.js";

// ── Topological sort ───────────────────────────────────────────────────────

export interface DagNode<N> {
  readonly name: string;
  getPredecessors(): readonly N[];
}

interface Frame<N> {
  readonly node: N;
  readonly preds: readonly N[];
  next: number;
}

/**
 * Depth-first post-order over predecessors: every node appears after all of
 * its predecessors, the output last. Throws on a cycle.
 *
 * Runs on an explicit stack, so chain depth is bounded by memory only.
 */
export function topologicalSort<N extends DagNode<N>>(output: N): N[] {
  const done = new Set<N>();
  const active = new Set<N>();
  const order: N[] = [];
  const stack: Frame<N>[] = [];

  const enter = (n: N): void => {
    if (done.has(n)) return;
    if (active.has(n)) {
      throw new GraphError({
        kind: "cycle",
        node: n.name,
        message: `cycle in predecessor graph through "${n.name}"`,
      });
    }
    active.add(n);
    stack.push({ node: n, preds: n.getPredecessors(), next: 0 });
  };

  enter(output);
  while (stack.length > 0) {
    const top = stack[stack.length - 1];
    if (top.next < top.preds.length) {
      enter(top.preds[top.next++]);
      continue;
    }
    stack.pop();
    active.delete(top.node);
    done.add(top.node);
    order.push(top.node);
  }
  return order;
}

// ── Graph ──────────────────────────────────────────────────────────────────

export interface GraphOptions {
  readonly backend: Backend;
}

export interface RunResult {
  /** The scalar output value. */
  readonly value: number;
  /** Snapshot of every node's `dOut`, keyed by node name. */
  readonly gradients: ReadonlyMap<string, TensorData>;
}

type Phase = "idle" | "forward" | "backward";

export class Graph {
  readonly output: AnyNode;
  readonly backend: Backend;
  /** Default topological order, output last. */
  readonly order: readonly AnyNode[];
  private readonly byName = new Map<string, AnyNode>();
  private phase: Phase = "idle";

  constructor(output: AnyNode, options: GraphOptions) {
    this.output = output;
    this.backend = options.backend;
    this.order = Object.freeze(topologicalSort<AnyNode>(output));
    for (const n of this.order) {
      const other = this.byName.get(n.name);
      if (other !== undefined) {
        throw new GraphError({
          kind: "duplicate-name",
          node: n.name,
          message: `two nodes named "${n.name}": ${other} and ${n}`,
        });
      }
      this.byName.set(n.name, n);
    }
  }

  get size(): number {
    return this.order.length;
  }

  get nodes(): ReadonlySet<AnyNode> {
    return new Set(this.order);
  }

  get(name: string): AnyNode | undefined {
    return this.byName.get(name);
  }

  leaves(): Leaf[] {
    const out: Leaf[] = [];
    for (const n of this.order) {
      if (n.kind === "leaf") out.push(n);
    }
    return out;
  }

  /**
   * Run forward on every node once, in `order` (default: the graph's own
   * topological order). Returns the output node's value.
   */
  forward(order: readonly AnyNode[] = this.order): TensorData {
    this.checkOrder(order);
    this.phase = "idle";
    for (const n of order) n.forward(this.backend);
    this.phase = "forward";
    return this.value();
  }

  /**
   * Seed the output's `dOut` with 1 and run backward in the exact reverse of
   * `order`, which must be a valid forward order.
   */
  backward(order: readonly AnyNode[] = this.order): void {
    this.checkOrder(order);
    if (this.phase !== "forward") {
      throw new GraphError({
        kind: "backward-before-forward",
        node: this.output.name,
        message: this.phase === "idle"
          ? "backward called before forward"
          : "backward called twice for one forward pass",
      });
    }
    const out = this.value();
    if (out.shape.length !== 0) {
      throw new GraphError({
        kind: "non-scalar-output",
        node: this.output.name,
        message: `output ${this.output} has shape ${formatShape(out.shape)}; gradient seeding needs a 0-d tensor`,
      });
    }
    this.output.dOut = this.backend.ones(out.shape);
    for (let i = order.length - 1; i >= 0; i--) {
      order[i].backward(this.backend);
    }
    this.phase = "backward";
  }

  /** forward + backward, returning the output value and all gradients. */
  run(order: readonly AnyNode[] = this.order): RunResult {
    this.forward(order);
    this.backward(order);
    return { value: this.backend.item(this.value()), gradients: this.gradients() };
  }

  /** The output node's current value. */
  value(): TensorData {
    const out = this.output.out;
    if (out === undefined) {
      throw new GraphError({
        kind: "missing-input",
        node: this.output.name,
        message: `output ${this.output} has not been computed`,
      });
    }
    return out;
  }

  gradient(name: string): TensorData | undefined {
    return this.byName.get(name)?.dOut;
  }

  gradients(): Map<string, TensorData> {
    const grads = new Map<string, TensorData>();
    for (const n of this.order) {
      if (n.dOut !== undefined) grads.set(n.name, this.backend.clone(n.dOut));
    }
    return grads;
  }

  /** A caller-supplied order must be a permutation of the graph, predecessors first. */
  private checkOrder(order: readonly AnyNode[]): void {
    if (order === this.order) return;
    const position = new Map<AnyNode, number>();
    order.forEach((n, i) => position.set(n, i));
    if (order.length !== this.order.length || position.size !== order.length) {
      throw new GraphError({
        kind: "invalid-order",
        message: `order has ${order.length} entries (${position.size} distinct) for a graph of ${this.order.length} nodes`,
      });
    }
    for (const n of order) {
      const i = position.get(n);
      if (i === undefined || this.byName.get(n.name) !== n) {
        throw new GraphError({
          kind: "invalid-order",
          node: n.name,
          message: `${n} is not part of this graph`,
        });
      }
      for (const pred of n.getPredecessors()) {
        const j = position.get(pred);
        if (j === undefined || j >= i) {
          throw new GraphError({
            kind: "invalid-order",
            node: n.name,
            message: `${n} is ordered before its predecessor ${pred}`,
          });
        }
      }
    }
  }
}
