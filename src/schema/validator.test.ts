/**
 * Tests for the schema validator.
 *
 * Structural checks only; every violation is expected in a single pass.
 */

import { describe, it, expect } from "vitest";
import {
  checkDocument,
  decodeDocument,
  formatPath,
  validateDocument,
} from "./validator.js";

describe("formatPath", () => {
  it("renders the root", () => {
    expect(formatPath([])).toBe("(root)");
  });

  it("renders keys and indices", () => {
    expect(formatPath(["metrics", 0, "labels", 2])).toBe("metrics[0].labels[2]");
  });
});

describe("decodeDocument", () => {
  it("parses JSON text", () => {
    const result = decodeDocument('{"metrics":[]}');
    expect(result).toEqual({ ok: true, value: { metrics: [] } });
  });

  it("decodes UTF-8 bytes", () => {
    const bytes = new TextEncoder().encode('{"metrics":[]}');
    expect(decodeDocument(bytes)).toEqual({ ok: true, value: { metrics: [] } });
  });

  it("returns an input error for malformed JSON", () => {
    const result = decodeDocument('{"metrics": [');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("input");
    expect(result.error.message).toContain("Malformed JSON in config");
  });
});

describe("validateDocument", () => {
  it("accepts a complete document", () => {
    const doc = {
      metrics: [
        { name: "http_requests_total", type: "counter", labels: ["method"], help: "count" },
        { name: "latency_seconds", type: "histogram", buckets: [0.1, 1] },
      ],
    };
    const result = validateDocument(doc);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.metrics).toHaveLength(2);
    expect(result.value.metrics[1]!.buckets).toEqual([0.1, 1]);
  });

  it("accepts an empty metrics list", () => {
    expect(validateDocument({ metrics: [] }).ok).toBe(true);
  });

  it("tolerates a $schema key at the root", () => {
    expect(validateDocument({ $schema: "./metrics.schema.json", metrics: [] }).ok).toBe(true);
  });

  it("rejects an unknown kind and names the field", () => {
    const result = validateDocument({ metrics: [{ name: "x", type: "summary" }] });
    expect(result).toEqual({
      ok: false,
      error: [
        {
          path: "metrics[0].type",
          message: 'must be one of counter, gauge, histogram (got "summary")',
        },
      ],
    });
  });

  it("reports a missing required field", () => {
    const result = validateDocument({ metrics: [{ type: "counter" }] });
    expect(result).toEqual({
      ok: false,
      error: [{ path: "metrics[0].name", message: "is required" }],
    });
  });

  it("reports a missing metrics list", () => {
    const result = validateDocument({});
    expect(result).toEqual({
      ok: false,
      error: [{ path: "metrics", message: "is required" }],
    });
  });

  it("reports a non-object root", () => {
    const result = validateDocument([]);
    expect(result).toEqual({
      ok: false,
      error: [{ path: "(root)", message: "expected object, received array" }],
    });
  });

  it("reports wrongly typed optional fields", () => {
    const result = validateDocument({
      metrics: [{ name: "x", type: "counter", labels: ["a", 1] }],
    });
    expect(result).toEqual({
      ok: false,
      error: [{ path: "metrics[0].labels[1]", message: "expected string, received number" }],
    });
  });

  it("rejects unknown fields on a metric", () => {
    const result = validateDocument({
      metrics: [{ name: "x", type: "histogram", bucket: [1] }],
    });
    expect(result).toEqual({
      ok: false,
      error: [{ path: "metrics[0]", message: "unknown field(s): bucket" }],
    });
  });

  it("collects every violation in document order", () => {
    const result = validateDocument({
      metrics: [
        { name: "a", type: "summary" },
        { name: 5, type: "gauge" },
      ],
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.map((v) => v.path)).toEqual([
      "metrics[0].type",
      "metrics[1].name",
    ]);
    expect(result.error[1]!.message).toBe("expected string, received number");
  });

  it("does not check uniqueness or bucket order", () => {
    const result = validateDocument({
      metrics: [
        { name: "dup", type: "histogram", buckets: [5, 1] },
        { name: "dup", type: "counter", buckets: [1] },
      ],
    });
    expect(result.ok).toBe(true);
  });
});

describe("checkDocument", () => {
  it("returns the input error for malformed JSON", () => {
    const result = checkDocument("not json");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect("kind" in result.error && result.error.kind).toBe("input");
  });

  it("returns violations for a structurally invalid document", () => {
    const result = checkDocument('{"metrics":[{"name":"x","type":"summary"}]}');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toEqual([
      {
        path: "metrics[0].type",
        message: 'must be one of counter, gauge, histogram (got "summary")',
      },
    ]);
  });
});
