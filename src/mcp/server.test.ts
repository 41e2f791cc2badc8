/**
 * Tests for the MCP server module.
 *
 * The "generate_metrics" tool compiles a metrics document passed inline.
 * Its logic lives in handleGenerateCall so it can be exercised without a
 * transport.
 */

import { describe, it, expect } from "vitest";
import { createMcpServer, handleGenerateCall } from "./server.js";
import { GENERATED_BANNER } from "../emitter/emitter.js";

describe("createMcpServer", () => {
  it("creates a server instance", () => {
    const server = createMcpServer();
    expect(server).toBeDefined();
    expect(server.server).toBeDefined();
  });
});

describe("handleGenerateCall", () => {
  it("returns the generated module as text", () => {
    const result = handleGenerateCall({
      config: JSON.stringify({
        metrics: [{ name: "queue_depth", type: "gauge", labels: ["queue"] }],
      }),
      packageName: "metrics",
    });

    expect(result.isError).toBeUndefined();
    expect(result.content).toHaveLength(1);
    const text = result.content[0]!.text;
    expect(text.split("\n")[0]).toBe(GENERATED_BANNER);
    expect(text).toContain("export namespace metrics {");
    expect(text).toContain("SetQueueDepth");
  });

  it("returns every schema violation as an error result", () => {
    const result = handleGenerateCall({
      config: '{"metrics":[{"name":"a","type":"summary"},{"type":"counter"}]}',
      packageName: "metrics",
    });

    expect(result.isError).toBe(true);
    const lines = result.content[0]!.text.split("\n");
    expect(lines[0]).toBe("Config validation failed:");
    expect(lines.filter((line) => line.startsWith("- "))).toHaveLength(2);
    expect(lines[1]).toContain("- metrics[0].type:");
    expect(lines[2]).toBe("- metrics[1].name: is required");
  });

  it("reports malformed JSON as an error result", () => {
    const result = handleGenerateCall({ config: "{", packageName: "metrics" });

    expect(result.isError).toBe(true);
    expect(result.content[0]!.text).toMatch(/^Malformed JSON in config: /);
  });

  it("rejects an invalid namespace", () => {
    const result = handleGenerateCall({
      config: '{"metrics":[]}',
      packageName: "class",
    });

    expect(result.isError).toBe(true);
    expect(result.content[0]!.text).toBe(
      'Invalid packageName: "class" is not a valid namespace identifier',
    );
  });
});
