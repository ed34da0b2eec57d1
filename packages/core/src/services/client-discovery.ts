// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import psList from "ps-list";

import { OUTLOOK_PROCESS_NAMES } from "../constants.js";

/**
 * A running mail client process.
 */
export interface DiscoveredClient {
  /** OS process ID. */
  pid: number;

  /** Process image name as reported by the OS. */
  name: string;
}

/**
 * Scan the system for running Outlook processes.
 *
 * Outlook rewrites its profiles on exit, so provisioning while it runs
 * can be undone when the user closes it.
 *
 * @returns The matching processes (may be empty). Failure to list
 *   processes is treated as "none running".
 */
export async function findMailClient(): Promise<DiscoveredClient[]> {
  try {
    const all = await psList();
    return all
      .filter((p) => OUTLOOK_PROCESS_NAMES.includes(p.name))
      .map((p) => ({ pid: p.pid, name: p.name }));
  } catch {
    return [];
  }
}
