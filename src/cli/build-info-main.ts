#!/usr/bin/env node

/**
 * metricgen-build-info entry point.
 */

import * as node_process from "node:process";
import { resolveBuildIdentity } from "../buildinfo/build-info.js";
import { runBuildInfo } from "./build-info.js";
import { describeFatal } from "./fatal.js";
import { writeFileAtomic } from "./write-file.js";

void runBuildInfo(node_process.argv.slice(2), {
  stdout: (text: string) => node_process.stdout.write(text + "\n"),
  stderr: (text: string) => node_process.stderr.write(text + "\n"),
  resolveIdentity: () => resolveBuildIdentity(),
  writeFn: writeFileAtomic,
}).then(
  (code) => {
    // eslint-disable-next-line no-process-exit
    node_process.exit(code);
  },
  (cause: unknown) => {
    node_process.stderr.write(`metricgen-build-info: ${describeFatal(cause)}\n`);
    // eslint-disable-next-line no-process-exit
    node_process.exit(1);
  },
);
