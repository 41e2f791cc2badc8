#!/usr/bin/env node

/**
 * metricgen CLI entry point.
 *
 * This file is the bin target. It wires together real dependencies
 * (process I/O, filesystem, MCP transport) and delegates to the runner.
 */

import * as node_fs from "node:fs/promises";
import * as node_process from "node:process";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createMcpServer } from "../mcp/server.js";
import { describeFatal } from "./fatal.js";
import { run } from "./run.js";
import type { CliDeps } from "./run.js";
import { writeFileAtomic } from "./write-file.js";

const deps: CliDeps = {
  stdout: (text: string) => node_process.stdout.write(text + "\n"),
  stderr: (text: string) => node_process.stderr.write(text + "\n"),
  readFn: (path: string) => node_fs.readFile(path),
  writeFn: writeFileAtomic,
  startMcpServer: async () => {
    const server = createMcpServer();
    const closed = new Promise<void>((resolve) => {
      server.server.onclose = () => resolve();
    });
    await server.connect(new StdioServerTransport());
    await closed;
  },
};

// Strip the first two entries (node binary, script path).
const argv = node_process.argv.slice(2);

void run(argv, deps).then(
  (code) => {
    // eslint-disable-next-line no-process-exit
    node_process.exit(code);
  },
  (cause: unknown) => {
    node_process.stderr.write(`metricgen: ${describeFatal(cause)}\n`);
    // eslint-disable-next-line no-process-exit
    node_process.exit(1);
  },
);
