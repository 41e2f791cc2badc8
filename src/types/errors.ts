/**
 * Errors produced by the generation pipeline.
 *
 * Every stage fails fast; the first failing stage decides the error kind.
 */

/**
 * A single structural problem in the configuration document.
 */
export interface SchemaViolation {
  /** Location inside the document, e.g. "metrics[0].type" or "(root)". */
  readonly path: string;
  readonly message: string;
}

/**
 * Fields a semantic error can point at.
 */
export type SemanticField = "name" | "labels" | "buckets" | "packageName";

export type GenerationError =
  | { readonly kind: "input"; readonly message: string }
  | {
      readonly kind: "schema";
      readonly message: string;
      readonly violations: readonly SchemaViolation[];
    }
  | {
      readonly kind: "semantic";
      readonly message: string;
      readonly metricName?: string | undefined;
      readonly field: SemanticField;
    }
  | {
      readonly kind: "internal";
      readonly message: string;
      readonly line?: number | undefined;
      readonly column?: number | undefined;
      readonly excerpt?: string | undefined;
    };

export type InputError = Extract<GenerationError, { kind: "input" }>;
export type SchemaError = Extract<GenerationError, { kind: "schema" }>;
export type SemanticError = Extract<GenerationError, { kind: "semantic" }>;
export type InternalError = Extract<GenerationError, { kind: "internal" }>;

/**
 * Renders an error as operator-facing text (possibly multi-line).
 */
export function formatGenerationError(error: GenerationError): string {
  switch (error.kind) {
    case "input":
      return error.message;
    case "schema":
      return [
        error.message,
        ...error.violations.map((v) => `- ${v.path}: ${v.message}`),
      ].join("\n");
    case "semantic":
      return error.metricName !== undefined
        ? `Invalid metric "${error.metricName}" (${error.field}): ${error.message}`
        : `Invalid ${error.field}: ${error.message}`;
    case "internal": {
      const lines: string[] = [];
      const location = error.line !== undefined
        ? ` at line ${error.line}, column ${error.column ?? 1}`
        : "";
      lines.push(`Internal generation error${location}: ${error.message}`);
      if (error.excerpt !== undefined) {
        lines.push(`  ${error.excerpt}`);
      }
      return lines.join("\n");
    }
  }
}
