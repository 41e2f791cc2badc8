export { buildMetricSet } from "./builder.js";
