// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { registerFindClient } from "./find-client.js";
import { registerProvisionProfiles } from "./provision-profiles.js";

export function registerAllTools(server: McpServer): void {
  registerProvisionProfiles(server);
  registerFindClient(server);
}

export { registerFindClient, registerProvisionProfiles };
