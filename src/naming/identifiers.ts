/**
 * Identifiers derived from a single metric.
 *
 * Both the model builder (collision checks) and the emitter (rendering)
 * go through deriveMetricIdentifiers so they can never disagree.
 */

import type { MetricKind, MetricSpec } from "../types/metric.js";
import { METRIC_KINDS } from "../types/metric.js";
import { toIdentifier } from "./normalize.js";

/**
 * The top-level function name reserved by the emitter.
 */
export const REGISTER_FUNCTION = "registerMetrics";

/** prom-client class constructed for each kind. */
export const RUNTIME_CLASSES: { readonly [K in MetricKind]: string } = {
  counter: "Counter",
  gauge: "Gauge",
  histogram: "Histogram",
};

export const RUNTIME_REGISTRY = "Registry";

/**
 * Names the generated module imports from prom-client. A metric value or a
 * namespace with one of these names would shadow the import.
 */
export const RUNTIME_IMPORTS: ReadonlySet<string> = new Set([
  ...METRIC_KINDS.map((kind) => RUNTIME_CLASSES[kind]),
  RUNTIME_REGISTRY,
]);

const ACCESSOR_VERBS: { readonly [K in MetricKind]: string } = {
  counter: "Inc",
  gauge: "Set",
  histogram: "Observe",
};

export interface LabelField {
  /** Raw label key as exported, e.g. "status_code". */
  readonly label: string;
  /** Field of the label-tuple type, e.g. "StatusCode". */
  readonly field: string;
}

export interface MetricIdentifiers {
  /** The exported metric object, e.g. "HttpRequestsTotal". */
  readonly value: string;
  /** The label-tuple type; only emitted when the metric has labels. */
  readonly labelsType: string;
  /** The accessor function, e.g. "IncHttpRequestsTotal". */
  readonly accessor: string;
  /** One entry per label, in declared order. */
  readonly fields: readonly LabelField[];
}

export function accessorVerb(kind: MetricKind): string {
  return ACCESSOR_VERBS[kind];
}

export function deriveMetricIdentifiers(
  metric: Pick<MetricSpec, "name" | "kind" | "labels">,
): MetricIdentifiers {
  const value = toIdentifier(metric.name);
  return {
    value,
    labelsType: `${value}Labels`,
    accessor: `${accessorVerb(metric.kind)}${value}`,
    fields: metric.labels.map((label) => ({ label, field: toIdentifier(label) })),
  };
}

/**
 * Top-level names a metric contributes to the generated namespace.
 */
export function topLevelNames(ids: MetricIdentifiers): readonly string[] {
  return ids.fields.length > 0
    ? [ids.value, ids.labelsType, ids.accessor]
    : [ids.value, ids.accessor];
}
