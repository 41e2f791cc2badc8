/**
 * Build identity artifact.
 *
 * Records the generator's own source-control identity (latest tag and
 * commit hash) as two string constants in a generated module. Like the
 * metrics module, it is written once and must not be edited by hand.
 */

import type { InternalError } from "../types/errors.js";
import type { Result } from "../types/result.js";
import { canonicalize } from "../emitter/canonicalize.js";

export const BUILD_INFO_BANNER = "// Code generated by metricgen-build-info; DO NOT EDIT.";

/** Value recorded when git cannot answer. */
export const UNKNOWN = "unknown";

export interface BuildIdentity {
  /** Latest reachable tag, e.g. "v1.4.0". */
  readonly version: string;
  /** Full commit hash of HEAD. */
  readonly commit: string;
}

// ---------------------------------------------------------------------------
// Exec function type, injectable for testing
// ---------------------------------------------------------------------------

export type GitExecResult =
  | { readonly ok: true; readonly stdout: string }
  | { readonly ok: false; readonly error: string };

export type GitExecFn = (args: readonly string[]) => Promise<GitExecResult>;

async function defaultExecFn(args: readonly string[]): Promise<GitExecResult> {
  const { execFile } = await import("node:child_process");
  const { promisify } = await import("node:util");
  const execFileAsync = promisify(execFile);

  try {
    const { stdout } = await execFileAsync("git", [...args]);
    return { ok: true, stdout };
  } catch (cause: unknown) {
    const message =
      cause instanceof Error ? cause.message : String(cause);
    return { ok: false, error: message };
  }
}

async function query(exec: GitExecFn, args: readonly string[]): Promise<string> {
  const result = await exec(args);
  if (!result.ok) {
    return UNKNOWN;
  }
  const value = result.stdout.trim();
  return value.length > 0 ? value : UNKNOWN;
}

/**
 * Ask git for the latest tag and the current commit.
 * Either field falls back to "unknown" on its own.
 */
export async function resolveBuildIdentity(execFn?: GitExecFn): Promise<BuildIdentity> {
  const exec = execFn ?? defaultExecFn;
  const version = await query(exec, ["describe", "--tags", "--abbrev=0"]);
  const commit = await query(exec, ["rev-parse", "HEAD"]);
  return { version, commit };
}

/**
 * Render the build identity module.
 */
export function renderBuildInfo(identity: BuildIdentity): Result<string, InternalError> {
  const text = [
    BUILD_INFO_BANNER,
    "",
    `export const BUILD_VERSION = ${JSON.stringify(identity.version)};`,
    `export const BUILD_COMMIT = ${JSON.stringify(identity.commit)};`,
    "",
  ].join("\n");
  return canonicalize(text, "build-info.ts");
}
