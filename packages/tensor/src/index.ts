/**
 * @gradgraph/tensor -- Tensor backends for the gradgraph system.
 */

export { CpuRefBackend } from "./cpu_ref.js";

export type {
  Backend,
  TensorData,
} from "@gradgraph/core";

export type { Dtype, Shape } from "@gradgraph/core";

// ── Backend registry ──────────────────────────────────────────────────────

import { Registry } from "@gradgraph/core";
import type { Backend, Dtype } from "@gradgraph/core";
import { CpuRefBackend } from "./cpu_ref.js";

export const backendRegistry = new Registry<Backend, Dtype>("backend");
backendRegistry.register("cpu_ref", (dtype) => new CpuRefBackend(dtype));
