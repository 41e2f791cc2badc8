/**
 * Schema validator for metrics configuration documents.
 *
 * Structural checks only: required fields, field types and the closed set
 * of metric kinds. Uniqueness, naming rules and bucket ordering belong to
 * the model builder.
 *
 * Every violation is reported in one pass so the operator can fix the
 * whole document at once.
 */

import { z } from "zod";
import { METRIC_KINDS } from "../types/metric.js";
import type { InputError, SchemaViolation } from "../types/errors.js";
import type { Result } from "../types/result.js";
import { ok, err } from "../types/result.js";

export const rawMetricSchema = z
  .object({
    name: z.string(),
    type: z.enum(METRIC_KINDS),
    labels: z.array(z.string()).optional(),
    help: z.string().optional(),
    buckets: z.array(z.number()).optional(),
  })
  .strict();

export const rawDocumentSchema = z
  .object({
    $schema: z.string().optional(),
    metrics: z.array(rawMetricSchema),
  })
  .strict();

export type RawMetric = z.infer<typeof rawMetricSchema>;
export type RawMetricDocument = z.infer<typeof rawDocumentSchema>;

/**
 * Renders a zod issue path as "metrics[0].labels[2]".
 */
export function formatPath(path: readonly (string | number)[]): string {
  if (path.length === 0) {
    return "(root)";
  }
  let out = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else {
      out += out.length === 0 ? segment : `.${segment}`;
    }
  }
  return out;
}

function describeIssue(issue: z.ZodIssue): string {
  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      return issue.received === "undefined"
        ? "is required"
        : `expected ${issue.expected}, received ${issue.received}`;
    case z.ZodIssueCode.invalid_enum_value:
      return `must be one of ${issue.options.join(", ")} (got ${JSON.stringify(issue.received)})`;
    case z.ZodIssueCode.unrecognized_keys:
      return `unknown field(s): ${issue.keys.join(", ")}`;
    default:
      return issue.message;
  }
}

/**
 * Decode raw configuration bytes into a JSON value.
 */
export function decodeDocument(raw: string | Uint8Array): Result<unknown, InputError> {
  const text = typeof raw === "string" ? raw : new TextDecoder("utf-8").decode(raw);
  try {
    const value: unknown = JSON.parse(text);
    return ok(value);
  } catch (cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    return err({ kind: "input", message: `Malformed JSON in config: ${message}` });
  }
}

/**
 * Check a decoded value against the document schema.
 * Returns every violation, in document order, when the value does not conform.
 */
export function validateDocument(
  value: unknown,
): Result<RawMetricDocument, readonly SchemaViolation[]> {
  const parsed = rawDocumentSchema.safeParse(value);
  if (parsed.success) {
    return ok(parsed.data);
  }
  return err(
    parsed.error.issues.map((issue) => ({
      path: formatPath(issue.path),
      message: describeIssue(issue),
    })),
  );
}

/**
 * Decode and validate in one step.
 */
export function checkDocument(
  raw: string | Uint8Array,
): Result<RawMetricDocument, InputError | readonly SchemaViolation[]> {
  const decoded = decodeDocument(raw);
  if (!decoded.ok) {
    return decoded;
  }
  return validateDocument(decoded.value);
}
