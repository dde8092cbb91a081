/**
 * @gradgraph/core -- shared types, errors and ports.
 */

export {
  type Dtype,
  type NumericArray,
  type Shape,
  type LogLevelName,
  type GraphConfig,
  allocArray,
  isDtype,
  shapeSize,
  shapeEquals,
  formatShape,
  defaultGraphConfig,
} from "./types.js";

export {
  type GraphErrorKind,
  GraphError,
  ShapeError,
  BackendError,
  ConfigError,
} from "./errors.js";

export { type TensorData, type Backend, BackendService } from "./interfaces.js";

export { Registry } from "./registry.js";
