export { type Result, ok, err } from "./result.js";
export {
  type MetricKind,
  type MetricSpec,
  type MetricSetDocument,
  METRIC_KINDS,
  isMetricKind,
} from "./metric.js";
export {
  type SchemaViolation,
  type SemanticField,
  type GenerationError,
  type InputError,
  type SchemaError,
  type SemanticError,
  type InternalError,
  formatGenerationError,
} from "./errors.js";
export { type GenerateConfig } from "./config.js";
