export {
  type EmissionVariant,
  GENERATED_BANNER,
  RUNTIME_MODULE,
  variantOf,
  emitMetric,
  emitSource,
} from "./emitter.js";
export { canonicalize } from "./canonicalize.js";
