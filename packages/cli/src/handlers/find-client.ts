// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { errorMessage, findMailClient } from "@mailprov/core";

/** Handle the `find-client` CLI command. */
export async function handleFindClient(options: {
  json?: boolean;
}): Promise<void> {
  try {
    const clients = await findMailClient();

    if (options.json) {
      process.stdout.write(JSON.stringify(clients, null, 2) + "\n");
      return;
    }

    if (clients.length === 0) {
      process.stdout.write("Outlook is not running\n");
      return;
    }

    for (const client of clients) {
      process.stdout.write(`PID ${String(client.pid)} (${client.name})\n`);
    }
  } catch (error) {
    const message = errorMessage(error);
    process.stderr.write(`${message}\n`);
    process.exitCode = 1;
  }
}
