export { toIdentifier, isIdentifier, isNamespaceName } from "./normalize.js";
export {
  type LabelField,
  type MetricIdentifiers,
  REGISTER_FUNCTION,
  RUNTIME_CLASSES,
  RUNTIME_REGISTRY,
  RUNTIME_IMPORTS,
  accessorVerb,
  deriveMetricIdentifiers,
  topLevelNames,
} from "./identifiers.js";
