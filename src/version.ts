/**
 * Centralized version constant for metricgen.
 *
 * Read from package.json so the CLI banner, --version and the MCP server
 * all report the same value.
 */

import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

export const VERSION: string = pkg.version;
