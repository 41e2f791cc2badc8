export {
  type RawMetric,
  type RawMetricDocument,
  rawMetricSchema,
  rawDocumentSchema,
  formatPath,
  decodeDocument,
  validateDocument,
  checkDocument,
} from "./validator.js";
