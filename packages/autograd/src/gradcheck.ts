/**
 * Finite-difference gradient check.
 *
 * For each checked node and each entry of its `out`, perturbs the entry by
 * ±eps, recomputes only the nodes after it in topological order, and compares
 * the central difference of the output against the analytic `dOut`.
 */
import { type GraphConfig, defaultGraphConfig, GraphError } from "@gradgraph/core";
import type { Graph } from "./graph.js";
import type { AnyNode } from "./ops.js";

export interface GradCheckOptions {
  readonly eps?: number;
  readonly atol?: number;
  readonly rtol?: number;
  /** Names of nodes to check. Default: every node except the output. */
  readonly nodes?: readonly string[];
}

export interface GradCheckEntry {
  readonly node: string;
  readonly index: number;
  readonly analytic: number;
  readonly numeric: number;
  readonly error: number;
  readonly ok: boolean;
}

export interface GradCheckReport {
  readonly ok: boolean;
  readonly maxError: number;
  readonly entries: readonly GradCheckEntry[];
}

export type GradCheckConfig = Pick<GraphConfig, "gradCheckEps" | "gradCheckAtol" | "gradCheckRtol">;

/** Explicit options win over `config` (e.g. the result of `loadConfig`). */
export function gradCheck(
  graph: Graph,
  options: GradCheckOptions = {},
  config: GradCheckConfig = defaultGraphConfig,
): GradCheckReport {
  const eps = options.eps ?? config.gradCheckEps;
  const atol = options.atol ?? config.gradCheckAtol;
  const rtol = options.rtol ?? config.gradCheckRtol;
  const B = graph.backend;

  const targets: AnyNode[] = [];
  if (options.nodes) {
    for (const name of options.nodes) {
      const n = graph.get(name);
      if (n === undefined) {
        throw new GraphError({ kind: "unknown-node", node: name, message: `no node named "${name}" in graph` });
      }
      targets.push(n);
    }
  } else {
    for (const n of graph.order) {
      if (n !== graph.output) targets.push(n);
    }
  }

  const { gradients } = graph.run();
  const entries: GradCheckEntry[] = [];

  for (const target of targets) {
    const original = target.out;
    const analytic = gradients.get(target.name);
    if (original === undefined || analytic === undefined) continue;
    const downstream = graph.order.slice(graph.order.indexOf(target) + 1);

    const outputAt = (index: number, delta: number): number => {
      const perturbed = B.clone(original);
      perturbed.data[index] += delta;
      target.out = perturbed;
      for (const n of downstream) n.forward(B);
      return B.item(graph.value());
    };

    for (let i = 0; i < original.data.length; i++) {
      const numeric = (outputAt(i, eps) - outputAt(i, -eps)) / (2 * eps);
      const a = analytic.data[i];
      const error = Math.abs(a - numeric);
      entries.push({
        node: target.name,
        index: i,
        analytic: a,
        numeric,
        error,
        ok: error <= atol + rtol * Math.abs(numeric),
      });
    }
    target.out = original;
    for (const n of downstream) n.forward(B);
  }

  // leave every node's out/dOut as a clean cycle would
  graph.run();

  let maxError = 0;
  for (const e of entries) maxError = Math.max(maxError, e.error);
  return { ok: entries.every((e) => e.ok), maxError, entries };
}
