/**
 * Config model builder.
 *
 * Turns a schema-valid document into an immutable MetricSetDocument,
 * enforcing the semantic rules the schema cannot express. Fails on the
 * first offending metric, in document order.
 */

import type { RawMetric, RawMetricDocument } from "../schema/validator.js";
import type { MetricSetDocument, MetricSpec } from "../types/metric.js";
import type { SemanticError, SemanticField } from "../types/errors.js";
import type { Result } from "../types/result.js";
import { ok, err } from "../types/result.js";
import {
  REGISTER_FUNCTION,
  RUNTIME_IMPORTS,
  deriveMetricIdentifiers,
  topLevelNames,
} from "../naming/identifiers.js";
import { isIdentifier, isNamespaceName } from "../naming/normalize.js";

const METRIC_NAME_PATTERN = /^[a-z_][a-z0-9_]*$/;
const LABEL_NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/** Label prom-client reserves for histogram bucket bounds. */
const HISTOGRAM_RESERVED_LABEL = "le";

function semantic(
  field: SemanticField,
  message: string,
  metricName?: string,
): SemanticError {
  return { kind: "semantic", field, message, metricName };
}

function checkName(name: string): string | undefined {
  if (!METRIC_NAME_PATTERN.test(name)) {
    return "name must be lowercase letters, digits and underscores, not starting with a digit";
  }
  if (name.startsWith("__")) {
    return "names starting with \"__\" are reserved";
  }
  return undefined;
}

function checkLabels(metric: RawMetric, labels: readonly string[]): string | undefined {
  const seen = new Set<string>();
  for (const label of labels) {
    if (!LABEL_NAME_PATTERN.test(label)) {
      return `label "${label}" must be letters, digits and underscores, not starting with a digit`;
    }
    if (label.startsWith("__")) {
      return `label "${label}" is reserved (starts with "__")`;
    }
    if (metric.type === "histogram" && label === HISTOGRAM_RESERVED_LABEL) {
      return `label "${HISTOGRAM_RESERVED_LABEL}" is reserved for histogram buckets`;
    }
    if (seen.has(label)) {
      return `duplicate label "${label}"`;
    }
    seen.add(label);
  }
  return undefined;
}

function checkBuckets(metric: RawMetric, buckets: readonly number[]): string | undefined {
  if (metric.type !== "histogram") {
    return buckets.length > 0
      ? `buckets are only allowed on histograms, not on a ${metric.type}`
      : undefined;
  }
  if (buckets.length === 0) {
    return "histograms require a non-empty buckets list";
  }
  for (let i = 0; i < buckets.length; i++) {
    const bound = buckets[i]!;
    if (!Number.isFinite(bound)) {
      return `bucket ${bound} is not a finite number`;
    }
    if (i > 0 && bound <= buckets[i - 1]!) {
      return `buckets must be strictly increasing (${buckets[i - 1]} is followed by ${bound})`;
    }
  }
  return undefined;
}

/**
 * Build a MetricSetDocument from a validated document and a namespace tag.
 *
 * Checks, per metric and in this order: name pattern, name uniqueness,
 * labels, buckets, derived identifiers. Identifier checks cover both the
 * label fields inside one metric and the top-level names shared by the
 * whole generated namespace.
 */
export function buildMetricSet(
  raw: RawMetricDocument,
  packageName: string,
): Result<MetricSetDocument, SemanticError> {
  if (!isNamespaceName(packageName)) {
    return err(semantic(
      "packageName",
      `"${packageName}" is not a valid namespace identifier`,
    ));
  }
  if (RUNTIME_IMPORTS.has(packageName)) {
    return err(semantic(
      "packageName",
      `"${packageName}" would shadow the prom-client import of the same name`,
    ));
  }

  const metrics: MetricSpec[] = [];
  const names = new Set<string>();
  // Top-level identifier -> metric that claimed it.
  const claimed = new Map<string, string>([[REGISTER_FUNCTION, "(generated)"]]);

  for (const entry of raw.metrics) {
    const { name } = entry;
    const labels = entry.labels ?? [];
    const buckets = entry.buckets ?? [];

    const nameProblem = checkName(name);
    if (nameProblem !== undefined) {
      return err(semantic("name", nameProblem, name));
    }
    if (names.has(name)) {
      return err(semantic("name", `duplicate metric name "${name}"`, name));
    }
    names.add(name);

    const labelProblem = checkLabels(entry, labels);
    if (labelProblem !== undefined) {
      return err(semantic("labels", labelProblem, name));
    }

    const bucketProblem = checkBuckets(entry, buckets);
    if (bucketProblem !== undefined) {
      return err(semantic("buckets", bucketProblem, name));
    }

    const ids = deriveMetricIdentifiers({ name, kind: entry.type, labels });
    if (!isIdentifier(ids.value)) {
      return err(semantic(
        "name",
        `"${name}" does not normalize to a valid identifier (got "${ids.value}")`,
        name,
      ));
    }

    const fieldOwners = new Map<string, string>();
    for (const { label, field } of ids.fields) {
      if (!isIdentifier(field)) {
        return err(semantic(
          "labels",
          `label "${label}" does not normalize to a valid identifier (got "${field}")`,
          name,
        ));
      }
      const owner = fieldOwners.get(field);
      if (owner !== undefined) {
        return err(semantic(
          "labels",
          `labels "${owner}" and "${label}" both normalize to "${field}"`,
          name,
        ));
      }
      fieldOwners.set(field, label);
    }

    for (const identifier of topLevelNames(ids)) {
      if (RUNTIME_IMPORTS.has(identifier)) {
        return err(semantic(
          "name",
          `derived identifier "${identifier}" would shadow the prom-client import of the same name`,
          name,
        ));
      }
      const owner = claimed.get(identifier);
      if (owner !== undefined) {
        return err(semantic(
          "name",
          `derived identifier "${identifier}" collides with one generated for "${owner}"`,
          name,
        ));
      }
      claimed.set(identifier, name);
    }

    metrics.push({
      name,
      kind: entry.type,
      labels: [...labels],
      help: entry.help ?? "",
      buckets: entry.type === "histogram" ? [...buckets] : [],
    });
  }

  return ok({ packageName, metrics });
}
