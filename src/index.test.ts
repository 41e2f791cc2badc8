import { describe, it, expect } from "vitest";
import {
  checkDocument,
  buildMetricSet,
  emitSource,
  canonicalize,
  generate,
  toIdentifier,
  formatGenerationError,
} from "./index.js";

describe("library entry point", () => {
  it("composes the stages into the same output as generate()", () => {
    const raw = '{"metrics":[{"name":"jobs_total","type":"counter","labels":["queue"]}]}';

    const checked = checkDocument(raw);
    expect(checked.ok).toBe(true);
    if (!checked.ok) return;
    const built = buildMetricSet(checked.value, "metrics");
    expect(built.ok).toBe(true);
    if (!built.ok) return;
    const canonical = canonicalize(emitSource(built.value));
    const generated = generate(raw, "metrics");

    expect(canonical.ok).toBe(true);
    expect(generated.ok).toBe(true);
    if (!canonical.ok || !generated.ok) return;
    expect(generated.value.source).toBe(canonical.value);
    expect(generated.value.metricCount).toBe(1);
  });

  it("re-exports the naming and error helpers", () => {
    expect(toIdentifier("queue_name")).toBe("QueueName");
    expect(formatGenerationError({ kind: "input", message: "empty" })).toBe("empty");
  });
});
