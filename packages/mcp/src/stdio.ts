// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { errorMessage } from "@mailprov/core";

import { createServer } from "./server.js";

const SHUTDOWN_SIGNALS = ["SIGINT", "SIGTERM"] as const;

/**
 * Serve the provisioning tools over stdio until SIGINT or SIGTERM.
 * Diagnostics go to stderr; stdout belongs to the protocol.
 */
export async function runStdioServer(): Promise<void> {
  const server = createServer();

  try {
    await server.connect(new StdioServerTransport());
  } catch (error: unknown) {
    process.stderr.write(`Failed to start MCP server: ${errorMessage(error)}\n`);
    process.exit(1);
  }

  process.stderr.write("mailprov MCP server running on stdio\n");

  async function shutdown(signal: NodeJS.Signals): Promise<void> {
    process.stderr.write(`Received ${signal}, shutting down\n`);
    try {
      await server.close();
    } catch (error: unknown) {
      process.stderr.write(`Error during shutdown: ${errorMessage(error)}\n`);
    } finally {
      process.exit(0);
    }
  }

  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, (received) => {
      void shutdown(received);
    });
  }
}
