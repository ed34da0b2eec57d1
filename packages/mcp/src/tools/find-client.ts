// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { findMailClient } from "@mailprov/core";

import { mcpCatchAll, mcpSuccess } from "../helpers.js";

/** Register the `find-client` MCP tool. */
export function registerFindClient(server: McpServer): void {
  server.tool(
    "find-client",
    "Detect running Outlook processes. Profiles should be provisioned while Outlook is closed.",
    {},
    async () => {
      try {
        const clients = await findMailClient();

        if (clients.length === 0) {
          return mcpSuccess("Outlook is not running");
        }

        return mcpSuccess(JSON.stringify(clients, null, 2));
      } catch (error) {
        return mcpCatchAll(error, "Failed to find Outlook");
      }
    },
  );
}
