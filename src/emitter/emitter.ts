/**
 * Code emitter — renders a MetricSetDocument as a TypeScript module
 * built on prom-client.
 *
 * Layout of the emitted unit:
 *   1. do-not-edit banner
 *   2. prom-client import (only the classes in use)
 *   3. `export namespace <packageName> { ... }` holding, per metric in
 *      document order, its label-tuple type, metric object and accessor
 *   4. a single `registerMetrics(registry)` at the end of the namespace
 *
 * Metrics are constructed with `registers: []`; nothing is registered until
 * the host calls registerMetrics.
 *
 * The output is raw text. Indentation and spacing are settled by the
 * canonicalizer.
 */

import type { MetricKind, MetricSetDocument, MetricSpec } from "../types/metric.js";
import { METRIC_KINDS, isMetricKind } from "../types/metric.js";
import type { MetricIdentifiers } from "../naming/identifiers.js";
import {
  REGISTER_FUNCTION,
  RUNTIME_CLASSES,
  RUNTIME_REGISTRY,
  deriveMetricIdentifiers,
} from "../naming/identifiers.js";

export const GENERATED_BANNER = "// Code generated by metricgen; DO NOT EDIT.";

export const RUNTIME_MODULE = "prom-client";

type LabelPresence = "labeled" | "unlabeled";

/**
 * One row of the kind x label-presence decision table.
 */
export type EmissionVariant = `${MetricKind}:${LabelPresence}`;

interface PlannedMetric {
  readonly spec: MetricSpec;
  readonly ids: MetricIdentifiers;
}

type VariantEmitter = (metric: PlannedMetric) => readonly string[];

// ---------------------------------------------------------------------------
// Fragments
// ---------------------------------------------------------------------------

function helpText(spec: MetricSpec): string {
  // prom-client refuses an empty help string.
  return spec.help.length > 0 ? spec.help : spec.name;
}

function docComment(spec: MetricSpec): readonly string[] {
  const text = spec.help.replace(/\s+/g, " ").trim().replace(/\*\//g, "*\\/");
  return text.length > 0 ? [`/** ${text} */`] : [];
}

function labelsInterface({ ids }: PlannedMetric): readonly string[] {
  return [
    `export interface ${ids.labelsType} {`,
    ...ids.fields.map(({ field }) => `  readonly ${field}: string;`),
    "}",
  ];
}

function metricDeclaration({ spec, ids }: PlannedMetric): readonly string[] {
  const options = [
    `  name: ${JSON.stringify(spec.name)},`,
    `  help: ${JSON.stringify(helpText(spec))},`,
  ];
  if (spec.labels.length > 0) {
    const names = spec.labels.map((label) => JSON.stringify(label)).join(", ");
    options.push(`  labelNames: [${names}] as const,`);
  }
  if (spec.kind === "histogram") {
    options.push(`  buckets: [${spec.buckets.map((b) => String(b)).join(", ")}],`);
  }
  options.push("  registers: []");
  return [
    `export const ${ids.value} = new ${RUNTIME_CLASSES[spec.kind]}({`,
    ...options,
    "});",
  ];
}

/**
 * `{ method: labels.Method, status: labels.Status }`
 */
function labelValues({ ids }: PlannedMetric): string {
  const entries = ids.fields.map(({ label, field }) => `${label}: labels.${field}`);
  return `{ ${entries.join(", ")} }`;
}

function accessor(
  metric: PlannedMetric,
  params: string,
  body: string,
): readonly string[] {
  return [
    ...docComment(metric.spec),
    `export function ${metric.ids.accessor}(${params}): void {`,
    `  ${body};`,
    "}",
  ];
}

function labeledParams(metric: PlannedMetric, withValue: boolean): string {
  const labels = `labels: ${metric.ids.labelsType}`;
  return withValue ? `${labels}, value: number` : labels;
}

// ---------------------------------------------------------------------------
// Decision table
// ---------------------------------------------------------------------------

const VARIANT_EMITTERS: { readonly [V in EmissionVariant]: VariantEmitter } = {
  "counter:unlabeled": (m) => [
    ...metricDeclaration(m),
    ...accessor(m, "", `${m.ids.value}.inc()`),
  ],
  "counter:labeled": (m) => [
    ...labelsInterface(m),
    ...metricDeclaration(m),
    ...accessor(m, labeledParams(m, false), `${m.ids.value}.inc(${labelValues(m)})`),
  ],
  "gauge:unlabeled": (m) => [
    ...metricDeclaration(m),
    ...accessor(m, "value: number", `${m.ids.value}.set(value)`),
  ],
  "gauge:labeled": (m) => [
    ...labelsInterface(m),
    ...metricDeclaration(m),
    ...accessor(m, labeledParams(m, true), `${m.ids.value}.set(${labelValues(m)}, value)`),
  ],
  "histogram:unlabeled": (m) => [
    ...metricDeclaration(m),
    ...accessor(m, "value: number", `${m.ids.value}.observe(value)`),
  ],
  "histogram:labeled": (m) => [
    ...labelsInterface(m),
    ...metricDeclaration(m),
    ...accessor(m, labeledParams(m, true), `${m.ids.value}.observe(${labelValues(m)}, value)`),
  ],
};

/**
 * Resolve the decision-table row for a metric.
 * Throws for a kind outside the closed set: the model builder must have
 * rejected it, so reaching this point is a programmer error.
 */
export function variantOf(spec: MetricSpec): EmissionVariant {
  const kind: unknown = spec.kind;
  if (!isMetricKind(kind)) {
    throw new Error(`Unrecognized metric kind ${JSON.stringify(kind)} for "${spec.name}"`);
  }
  return `${kind}:${spec.labels.length > 0 ? "labeled" : "unlabeled"}`;
}

/**
 * Render the declarations and accessor for a single metric.
 */
export function emitMetric(spec: MetricSpec): readonly string[] {
  const planned: PlannedMetric = { spec, ids: deriveMetricIdentifiers(spec) };
  return VARIANT_EMITTERS[variantOf(spec)](planned);
}

function importLine(doc: MetricSetDocument): string {
  const used = new Set(doc.metrics.map((m) => m.kind));
  const specifiers = METRIC_KINDS
    .filter((kind) => used.has(kind))
    .map((kind) => RUNTIME_CLASSES[kind]);
  specifiers.push(`type ${RUNTIME_REGISTRY}`);
  return `import { ${specifiers.join(", ")} } from ${JSON.stringify(RUNTIME_MODULE)};`;
}

function registrationBlock(doc: MetricSetDocument): readonly string[] {
  return [
    "/** Registers every metric declared above with `registry`, in declaration order. */",
    `export function ${REGISTER_FUNCTION}(registry: ${RUNTIME_REGISTRY}): ${RUNTIME_REGISTRY} {`,
    ...doc.metrics.map((m) => `  registry.registerMetric(${deriveMetricIdentifiers(m).value});`),
    "  return registry;",
    "}",
  ];
}

function indent(lines: readonly string[]): string[] {
  return lines.map((line) => (line.length > 0 ? `  ${line}` : line));
}

/**
 * Render the whole generated module for a metric set.
 */
export function emitSource(doc: MetricSetDocument): string {
  const body: string[] = [];
  for (const metric of doc.metrics) {
    body.push(...emitMetric(metric), "");
  }
  body.push(...registrationBlock(doc));

  const lines = [
    GENERATED_BANNER,
    "",
    importLine(doc),
    "",
    `export namespace ${doc.packageName} {`,
    ...indent(body),
    "}",
  ];
  return lines.join("\n") + "\n";
}
