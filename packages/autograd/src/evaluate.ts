/**
 * Effect entry point: one forward/backward cycle with errors in the typed
 * channel and debug logging per pass.
 */
import { Effect } from "effect";
import { type TensorData, GraphError, ShapeError, BackendError, formatShape } from "@gradgraph/core";
import { withSpan } from "@gradgraph/effect-runtime";
import type { Graph } from "./graph.js";
import { type AnyNode, describeNode } from "./ops.js";

export interface Evaluation {
  readonly value: number;
  readonly gradients: ReadonlyMap<string, TensorData>;
}

export type EvaluationError = GraphError | ShapeError | BackendError;

function classify(cause: unknown): EvaluationError {
  if (cause instanceof GraphError || cause instanceof ShapeError || cause instanceof BackendError) {
    return cause;
  }
  return new BackendError({ message: String(cause), cause });
}

export function evaluate(
  graph: Graph,
  order?: readonly AnyNode[],
): Effect.Effect<Evaluation, EvaluationError> {
  const program = Effect.gen(function* () {
    yield* Effect.logDebug(`forward: ${graph.size} nodes`);
    for (const n of order ?? graph.order) {
      yield* Effect.logDebug(`  ${describeNode(n)}`);
    }
    const out = yield* Effect.try({ try: () => graph.forward(order), catch: classify });
    yield* Effect.logDebug(`forward done: ${graph.output.name} ${formatShape(out.shape)}`);

    yield* Effect.try({ try: () => graph.backward(order), catch: classify });
    const value = graph.backend.item(out);
    yield* Effect.logDebug(`backward done: ${graph.output.name} = ${value}`);

    return { value, gradients: graph.gradients() } satisfies Evaluation;
  });
  return withSpan("graph.evaluate", program, { nodes: graph.size });
}
