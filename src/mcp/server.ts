/**
 * MCP server for metricgen.
 *
 * Exposes the generation pipeline to AI agents via the Model Context
 * Protocol (stdio transport). The server registers a "generate_metrics"
 * tool that compiles a metrics document passed inline and returns the
 * generated module as text.
 *
 * Dependencies: Types, Pipeline (same level as CLI).
 */

import { z } from "zod";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { formatGenerationError } from "../types/errors.js";
import { generate } from "../pipeline/generate.js";
import { VERSION } from "../version.js";

/**
 * The shape returned by the generate tool handler.
 */
export interface GenerateToolResult {
  readonly content: { type: "text"; text: string }[];
  readonly isError?: boolean;
}

/**
 * Arguments accepted by the generate tool.
 */
interface GenerateArgs {
  readonly config: string;
  readonly packageName: string;
}

/**
 * Core logic for the generate tool call, extracted for testability.
 */
export function handleGenerateCall(args: GenerateArgs): GenerateToolResult {
  const result = generate(args.config, args.packageName);

  if (!result.ok) {
    return {
      content: [{ type: "text", text: formatGenerationError(result.error) }],
      isError: true,
    };
  }

  return {
    content: [{ type: "text", text: result.value.source }],
  };
}

/**
 * Create a configured McpServer instance with the "generate_metrics" tool registered.
 *
 * The caller is responsible for connecting the server to a transport
 * (e.g., StdioServerTransport) and starting it.
 */
export function createMcpServer(): McpServer {
  const server = new McpServer({
    name: "metricgen",
    version: VERSION,
  });

  server.registerTool(
    "generate_metrics",
    {
      title: "Generate Metrics Module",
      description:
        "Compile a JSON metrics document ({ metrics: [{ name, type, labels?, help?, buckets? }] }) " +
        "into a TypeScript module with typed prom-client accessors. " +
        "Returns the generated source, or every problem found in the document.",
      inputSchema: {
        config: z
          .string()
          .describe("The metrics document as JSON text"),
        packageName: z
          .string()
          .describe("Namespace wrapping the generated declarations, e.g. \"metrics\""),
      },
    },
    async (args) => {
      const result = handleGenerateCall({
        config: args.config,
        packageName: args.packageName,
      });
      return result.isError === true
        ? { content: result.content, isError: true }
        : { content: result.content };
    },
  );

  return server;
}
