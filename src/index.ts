#!/usr/bin/env node

import { createRequire } from "node:module";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { ConfigError, loadConfig, parseCliFlags, type CliFlags } from "./config.js";
import { LOG_PREFIX, SERVER_NAME } from "./constants.js";
import { createServer } from "./server.js";
import type { SiteConfig } from "./types.js";

const require = createRequire(import.meta.url);
const { version } = require("../package.json") as { version: string };

function exitWithConfigError(error: unknown): never {
  if (error instanceof ConfigError) {
    console.error(`Configuration error: ${error.message}`);
    process.exit(1);
  }
  throw error;
}

function parseFlagsOrExit(): CliFlags {
  try {
    return parseCliFlags(process.argv.slice(2));
  } catch (error) {
    return exitWithConfigError(error);
  }
}

function loadConfigOrExit(flags: CliFlags): SiteConfig {
  try {
    return loadConfig(flags);
  } catch (error) {
    return exitWithConfigError(error);
  }
}

const flags = parseFlagsOrExit();

if (flags.version) {
  console.log(version);
  process.exit(0);
}

if (flags.help) {
  console.log(`${SERVER_NAME} v${version}

MCP server exposing a static site's image functions: dimension lookup and
resize requests for images referenced by logical paths.
Runs on stdio transport and is meant to be launched by an MCP client.

Usage:
  ${SERVER_NAME} [--root <dir>] [--base-url <url>]

Options:
  --root <dir>        Site root containing content/ and static/ (env: SITE_ROOT, default: cwd)
  --base-url <url>    Base URL used for processed image URLs (env: SITE_BASE_URL, default: /)
  --version, -v       Print version and exit
  --help, -h          Print this help and exit`);
  process.exit(0);
}

const config = loadConfigOrExit(flags);

const server = createServer(config, version);

async function runStdio(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`${SERVER_NAME} running on stdio (site root: ${config.rootDir})`);
}

async function shutdown(): Promise<void> {
  await server.close();
  process.exit(0);
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

runStdio().catch((error: unknown) => {
  console.error(`${LOG_PREFIX} Server error:`, error);
  process.exit(1);
});
