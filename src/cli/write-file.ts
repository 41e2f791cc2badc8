/**
 * Atomic file write used for every generated artifact.
 *
 * Content goes to a temporary sibling first and is renamed over the
 * destination only once fully written, so a failed run never leaves a
 * half-written file behind. Parent directories are created as needed.
 */

import * as node_fs from "node:fs/promises";
import * as node_path from "node:path";

export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const dir = node_path.dirname(path);
  await node_fs.mkdir(dir, { recursive: true });

  const tmpPath = node_path.join(
    dir,
    `.${node_path.basename(path)}.${process.pid}.tmp`,
  );
  try {
    await node_fs.writeFile(tmpPath, content, "utf-8");
    await node_fs.rename(tmpPath, path);
  } catch (cause: unknown) {
    await node_fs.rm(tmpPath, { force: true });
    throw cause;
  }
}
