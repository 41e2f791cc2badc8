/**
 * CLI runner — the top-level entry point that wires everything together.
 *
 * Responsibilities:
 *   1. Parse arguments into a GenerateConfig
 *   2. Read the configuration document
 *   3. Run the generation pipeline
 *   4. Write the generated module, or report why nothing was written
 *
 * Dependencies: All layers (Types, Schema, Model, Emitter, Pipeline).
 */

import { formatGenerationError } from "../types/errors.js";
import { generate } from "../pipeline/generate.js";
import { parseArgs } from "./parse-args.js";

/**
 * Injectable dependencies for testability.
 * Production code provides real I/O; tests provide mocks.
 */
export interface CliDeps {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly readFn: (path: string) => Promise<Uint8Array>;
  readonly writeFn: (path: string, content: string) => Promise<void>;
  readonly startMcpServer?: () => Promise<void>;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Run the CLI with the given argument array and dependencies.
 * Returns a process exit code (0 = success, 1 = error).
 */
export async function run(
  argv: readonly string[],
  deps: CliDeps,
): Promise<number> {
  const parseResult = parseArgs(argv);

  if (!parseResult.ok) {
    const { kind, message } = parseResult.error;
    if (kind === "help" || kind === "version") {
      deps.stdout(message);
      return 0;
    }
    if (kind === "mcp") {
      if (deps.startMcpServer === undefined) {
        deps.stderr("MCP server is not available");
        return 1;
      }
      await deps.startMcpServer();
      return 0;
    }
    // Parsing error.
    deps.stderr(message);
    return 1;
  }

  const config = parseResult.value;

  let content: Uint8Array;
  try {
    content = await deps.readFn(config.configPath);
  } catch (cause: unknown) {
    deps.stderr(`Failed to read config file "${config.configPath}": ${describeCause(cause)}`);
    return 1;
  }

  const generated = generate(content, config.packageName);
  if (!generated.ok) {
    deps.stderr(formatGenerationError(generated.error));
    return 1;
  }

  try {
    await deps.writeFn(config.outputPath, generated.value.source);
  } catch (cause: unknown) {
    deps.stderr(`Failed to write output file "${config.outputPath}": ${describeCause(cause)}`);
    return 1;
  }

  deps.stdout(`Generated ${generated.value.metricCount} metric(s) into ${config.outputPath}`);
  return 0;
}
