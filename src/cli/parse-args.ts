/**
 * CLI argument parser.
 *
 * Translates a process.argv-style string array into a GenerateConfig
 * or a structured error. Uses only Node.js built-ins, no external
 * argument-parsing libraries.
 *
 * Dependencies: Types layer only.
 */

import type { GenerateConfig } from "../types/config.js";
import { VERSION } from "../version.js";

/**
 * Non-config results from parsing: help request, version request, MCP mode, or error.
 */
export interface ParseError {
  readonly kind: "error" | "help" | "version" | "mcp";
  readonly message: string;
}

export type ParseResult =
  | { readonly ok: true; readonly value: GenerateConfig }
  | { readonly ok: false; readonly error: ParseError };

const VALUE_FLAGS: ReadonlySet<string> = new Set([
  "--config",
  "--output",
  "--package",
]);

/**
 * Maps short flag aliases to their long equivalents.
 */
const SHORT_TO_LONG: ReadonlyMap<string, string> = new Map([
  ["-c", "--config"],
  ["-o", "--output"],
  ["-p", "--package"],
  ["-h", "--help"],
  ["-V", "--version"],
]);

export const USAGE = "Usage: metricgen -c <config.json> -o <output.ts> -p <namespace>";

/**
 * Parse a CLI argument array into a GenerateConfig.
 *
 * All of --config, --output and --package are required; when any is
 * missing the error names every missing flag.
 */
export function parseArgs(argv: readonly string[]): ParseResult {
  // Expand short flags to their long equivalents before parsing.
  const expandedArgv = argv.map((arg) => SHORT_TO_LONG.get(arg) ?? arg);

  // --help and --version short-circuit.
  if (expandedArgv.includes("--help")) {
    return {
      ok: false,
      error: { kind: "help", message: helpText() },
    };
  }

  if (expandedArgv.includes("--version")) {
    return {
      ok: false,
      error: { kind: "version", message: `metricgen ${VERSION}` },
    };
  }

  if (expandedArgv.includes("--mcp")) {
    return {
      ok: false,
      error: { kind: "mcp", message: "Starting MCP server" },
    };
  }

  const values = new Map<string, string>();

  let i = 0;
  while (i < expandedArgv.length) {
    const arg = expandedArgv[i]!;
    const originalArg = argv[i]!;

    if (VALUE_FLAGS.has(arg)) {
      const value = expandedArgv[i + 1];
      if (value === undefined || value.startsWith("-")) {
        return {
          ok: false,
          error: { kind: "error", message: `${originalArg} requires a value` },
        };
      }
      values.set(arg, value);
      i += 2;
      continue;
    }

    if (arg.startsWith("-")) {
      return {
        ok: false,
        error: { kind: "error", message: `Unknown flag "${originalArg}"` },
      };
    }

    return {
      ok: false,
      error: { kind: "error", message: `Unexpected argument "${originalArg}"\n${USAGE}` },
    };
  }

  const configPath = values.get("--config");
  const outputPath = values.get("--output");
  const packageName = values.get("--package");

  if (configPath === undefined || outputPath === undefined || packageName === undefined) {
    const missing = [...VALUE_FLAGS].filter((flag) => !values.has(flag));
    return {
      ok: false,
      error: {
        kind: "error",
        message: `Missing required option(s): ${missing.join(", ")}\n${USAGE}`,
      },
    };
  }

  const config: GenerateConfig = { configPath, outputPath, packageName };

  return { ok: true, value: config };
}

function helpText(): string {
  return [
    USAGE,
    "",
    "Generate a typed prom-client metrics module from a JSON metrics document.",
    "",
    "Options:",
    "  -c, --config <path>     Metrics configuration document (required)",
    "  -o, --output <path>     Destination of the generated module (required)",
    "  -p, --package <name>    Namespace for the generated declarations (required)",
    "      --mcp               Start as MCP server (stdio transport)",
    "  -h, --help              Show this help message",
    "  -V, --version           Show version number",
  ].join("\n");
}
