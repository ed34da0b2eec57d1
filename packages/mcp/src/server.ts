// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { createRequire } from "node:module";

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { registerAllTools } from "./tools/index.js";

const require = createRequire(import.meta.url);
const { name, version } = require("../package.json") as { name: string; version: string };

const INSTRUCTIONS =
  "Provisions Outlook profiles for Microsoft 365 mailboxes from a CSV file with a UPN column. " +
  "Call find-client first: Outlook should be closed while profiles are written. " +
  "Use dryRun to preview the registry writes.";

/**
 * Create the MCP server with the provisioning tools registered.
 */
export function createServer(): McpServer {
  const server = new McpServer({ name, version }, { instructions: INSTRUCTIONS });
  registerAllTools(server);
  return server;
}
