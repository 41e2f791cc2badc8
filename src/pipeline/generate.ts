/**
 * Generation pipeline.
 *
 *   raw bytes -> schema validation -> model builder -> emitter -> canonicalizer
 *
 * All-or-nothing: the first failing stage ends the run and nothing is
 * produced. Writing the result somewhere is left to the caller.
 */

import type { GenerationError } from "../types/errors.js";
import type { Result } from "../types/result.js";
import { ok, err } from "../types/result.js";
import { checkDocument } from "../schema/validator.js";
import { buildMetricSet } from "../model/builder.js";
import { emitSource } from "../emitter/emitter.js";
import { canonicalize } from "../emitter/canonicalize.js";

export interface GeneratedSource {
  /** Canonical TypeScript module text. */
  readonly source: string;
  /** Number of metrics declared in the module. */
  readonly metricCount: number;
}

/**
 * Compile a metrics configuration document into a TypeScript module.
 */
export function generate(
  raw: string | Uint8Array,
  packageName: string,
): Result<GeneratedSource, GenerationError> {
  const checked = checkDocument(raw);
  if (!checked.ok) {
    if ("kind" in checked.error) {
      return err(checked.error);
    }
    return err({
      kind: "schema",
      message: "Config validation failed:",
      violations: checked.error,
    });
  }

  const built = buildMetricSet(checked.value, packageName);
  if (!built.ok) {
    return built;
  }

  const formatted = canonicalize(emitSource(built.value));
  if (!formatted.ok) {
    return formatted;
  }

  return ok({ source: formatted.value, metricCount: built.value.metrics.length });
}
