/**
 * Metric set model.
 *
 * A MetricSetDocument is built once per generation pass from a validated
 * configuration document and is never mutated afterwards.
 */

export const METRIC_KINDS = ["counter", "gauge", "histogram"] as const;

export type MetricKind = (typeof METRIC_KINDS)[number];

export function isMetricKind(value: unknown): value is MetricKind {
  return typeof value === "string" && (METRIC_KINDS as readonly string[]).includes(value);
}

/**
 * One declared metric.
 */
export interface MetricSpec {
  /** Exported wire name, e.g. "http_requests_total". */
  readonly name: string;
  readonly kind: MetricKind;
  /** Label keys in declared order. The order fixes the label-tuple field order. */
  readonly labels: readonly string[];
  /** Free-text description. Empty when the document omits it. */
  readonly help: string;
  /** Upper bounds, strictly increasing. Empty unless kind is "histogram". */
  readonly buckets: readonly number[];
}

/**
 * The whole generation unit.
 */
export interface MetricSetDocument {
  /** Namespace the generated declarations live under. */
  readonly packageName: string;
  /** Metrics in document order; emission follows this order. */
  readonly metrics: readonly MetricSpec[];
}
