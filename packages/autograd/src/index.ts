export { Node } from "./node.js";
export {
  type NodeKind,
  type AnyNode,
  Leaf,
  VectorScalarAffine,
  SquaredL2Distance,
  L2NormPenalty,
  ElementwiseSum,
  Affine,
  Tanh,
  describeNode,
} from "./ops.js";
export { type DagNode, type GraphOptions, type RunResult, Graph, topologicalSort } from "./graph.js";
export { type Evaluation, type EvaluationError, evaluate } from "./evaluate.js";
export {
  type GradCheckOptions,
  type GradCheckConfig,
  type GradCheckEntry,
  type GradCheckReport,
  gradCheck,
} from "./gradcheck.js";
