// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  DEFAULT_PROFILE_BASE_NAME,
  provisionProfiles,
  serializeProvisionOutput,
} from "@mailprov/core";
import { z } from "zod";

import { mcpCatchAll, mcpSuccess } from "../helpers.js";

/** Register the `provision-profiles` MCP tool. */
export function registerProvisionProfiles(server: McpServer): void {
  server.tool(
    "provision-profiles",
    "Create one Outlook profile per UPN in a CSV file. Existing profiles are skipped. Refuses to run while Outlook is running unless force is set.",
    {
      csvPath: z
        .string()
        .min(1)
        .describe("Path of a CSV file with a UPN column"),
      profileName: z
        .string()
        .trim()
        .min(1)
        .optional()
        .describe(
          `Base profile name; profiles are named '<base> - <UPN>' (default: ${DEFAULT_PROFILE_BASE_NAME})`,
        ),
      setDefault: z
        .boolean()
        .optional()
        .describe("Make the first created profile Outlook's default"),
      officeVersion: z
        .string()
        .optional()
        .describe("Office registry version (default: 16.0)"),
      dryRun: z
        .boolean()
        .optional()
        .describe("Return the planned registry writes without performing them"),
      rollbackOnFailure: z
        .boolean()
        .optional()
        .describe("Delete a partially written profile when one of its writes fails"),
      force: z
        .boolean()
        .optional()
        .describe("Provision even while Outlook is running"),
    },
    async ({
      csvPath,
      profileName,
      setDefault,
      officeVersion,
      dryRun,
      rollbackOnFailure,
      force,
    }) => {
      try {
        const output = await provisionProfiles({
          csvPath,
          profileName,
          setDefault,
          officeVersion,
          dryRun,
          rollbackOnFailure,
          requireClientStopped: force !== true,
        });

        return mcpSuccess(serializeProvisionOutput(output));
      } catch (error) {
        return mcpCatchAll(error, "Failed to provision profiles");
      }
    },
  );
}
