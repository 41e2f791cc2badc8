/**
 * Runner for metricgen-build-info: writes the generator's build identity
 * module (latest git tag and commit) to the path given with --output.
 */

import type { BuildIdentity } from "../buildinfo/build-info.js";
import { renderBuildInfo } from "../buildinfo/build-info.js";
import { formatGenerationError } from "../types/errors.js";

export interface BuildInfoDeps {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly resolveIdentity: () => Promise<BuildIdentity>;
  readonly writeFn: (path: string, content: string) => Promise<void>;
}

const BUILD_INFO_USAGE = "Usage: metricgen-build-info -o <output.ts>";

/**
 * Returns a process exit code (0 = success, 1 = error).
 */
export async function runBuildInfo(
  argv: readonly string[],
  deps: BuildInfoDeps,
): Promise<number> {
  if (argv.includes("--help") || argv.includes("-h")) {
    deps.stdout(BUILD_INFO_USAGE);
    return 0;
  }

  const flag = argv[0];
  const outputPath = argv[1];
  if (
    argv.length !== 2 ||
    (flag !== "-o" && flag !== "--output") ||
    outputPath === undefined ||
    outputPath.startsWith("-")
  ) {
    deps.stderr(BUILD_INFO_USAGE);
    return 1;
  }

  const identity = await deps.resolveIdentity();
  const rendered = renderBuildInfo(identity);
  if (!rendered.ok) {
    deps.stderr(formatGenerationError(rendered.error));
    return 1;
  }

  try {
    await deps.writeFn(outputPath, rendered.value);
  } catch (cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    deps.stderr(`Failed to write output file "${outputPath}": ${message}`);
    return 1;
  }

  deps.stdout(`Build info ${identity.version} (${identity.commit}) written to ${outputPath}`);
  return 0;
}
