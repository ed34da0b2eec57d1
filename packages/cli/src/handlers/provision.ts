// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import {
  errorMessage,
  findMailClient,
  formatData,
  type ProfileResult,
  provisionProfiles,
  type ProvisionProfilesOutput,
  serializeProvisionOutput,
  type StoreWrite,
} from "@mailprov/core";

import { confirm, isInteractive } from "../utils/index.js";

/** Options accepted by the `provision` command. */
export interface ProvisionOptions {
  profileName: string;
  setDefault?: boolean;
  officeVersion?: string;
  dryRun?: boolean;
  rollbackOnFailure?: boolean;
  yes?: boolean;
  json?: boolean;
}

/** Handle the `provision` CLI command. */
export async function handleProvision(
  csvPath: string,
  options: ProvisionOptions,
): Promise<void> {
  try {
    if (!options.dryRun && !(await confirmClientStopped(options.yes ?? false))) {
      process.exitCode = 1;
      return;
    }

    const output = await provisionProfiles({
      csvPath,
      profileName: options.profileName,
      setDefault: options.setDefault,
      officeVersion: options.officeVersion,
      dryRun: options.dryRun,
      rollbackOnFailure: options.rollbackOnFailure,
      onProfile: options.json ? undefined : printResult,
    });

    if (options.json) {
      process.stdout.write(serializeProvisionOutput(output) + "\n");
      return;
    }

    printSummary(output);
  } catch (error) {
    const message = errorMessage(error);
    process.stderr.write(`${message}\n`);
    process.exitCode = 1;
  }
}

/**
 * Warn when Outlook is running and ask whether to go on. Resolves to
 * `false` when the run must not proceed.
 */
async function confirmClientStopped(yes: boolean): Promise<boolean> {
  const clients = await findMailClient();
  if (clients.length === 0) {
    return true;
  }

  const pids = clients.map((c) => String(c.pid)).join(", ");
  process.stderr.write(
    `Outlook is running (PID ${pids}). New profiles may not show up until it is restarted.\n`,
  );
  if (yes) {
    return true;
  }
  if (!isInteractive()) {
    process.stderr.write(
      "Not asking for confirmation without a terminal. Re-run with --yes to proceed.\n",
    );
    return false;
  }
  if (await confirm("Continue?")) {
    return true;
  }
  process.stderr.write("Aborted.\n");
  return false;
}

function printResult(result: ProfileResult, index: number): void {
  const { outcome, profileName } = result;
  switch (outcome.status) {
    case "created":
      process.stdout.write(`Created profile: ${String(profileName)}\n`);
      return;
    case "skipped":
      process.stdout.write(
        `Profile already exists, skipping: ${String(profileName)}\n`,
      );
      return;
    case "failed":
      if (profileName === null) {
        process.stderr.write(`Skipping row ${String(index + 1)}: missing UPN\n`);
      } else {
        process.stderr.write(
          `Failed to create profile ${profileName}: ${outcome.reason}\n`,
        );
      }
  }
}

function formatWrite(write: StoreWrite): string {
  switch (write.op) {
    case "createNode":
      return `  create ${write.path}`;
    case "setAttribute":
      return `  set    ${write.path} ${write.name} = ${formatData(write.value)}`;
    case "deleteNode":
      return `  delete ${write.path}`;
  }
}

function printSummary(output: ProvisionProfilesOutput): void {
  if (output.writes !== undefined) {
    process.stdout.write(
      `\nDry run, ${String(output.writes.length)} registry writes planned:\n`,
    );
    for (const write of output.writes) {
      process.stdout.write(formatWrite(write) + "\n");
    }
  }

  process.stdout.write(
    `\nProfiles created: ${String(output.summary.created)}\n` +
      `Profiles failed: ${String(output.summary.failed)}\n`,
  );
}
