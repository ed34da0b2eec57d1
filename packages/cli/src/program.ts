// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { createRequire } from "node:module";

import { Command, InvalidArgumentError } from "commander";

import {
  DEFAULT_PROFILE_BASE_NAME,
  errorMessage,
  resolveOfficeVersion,
} from "@mailprov/core";

import { handleFindClient, handleProvision } from "./handlers/index.js";

const require = createRequire(import.meta.url);
const { version } = require("../package.json") as { version: string };

/** Parse an Office version such as `16.0`, throwing on invalid input. */
function parseOfficeVersion(value: string): string {
  try {
    return resolveOfficeVersion(value);
  } catch (error) {
    throw new InvalidArgumentError(errorMessage(error));
  }
}

/** Reject blank strings. */
function parseNonEmpty(value: string): string {
  const trimmed = value.trim();
  if (trimmed === "") {
    throw new InvalidArgumentError("Expected a non-empty value.");
  }
  return trimmed;
}

/**
 * Create the CLI program with all subcommands registered.
 */
export function createProgram(): Command {
  const program = new Command()
    .name("mailprov")
    .description("Provision Outlook profiles for Microsoft 365 mailboxes")
    .version(version);

  program
    .command("provision")
    .description("Create one Outlook profile per UPN listed in a CSV file")
    .argument("<csvPath>", "CSV file with a UPN column")
    .option(
      "--profile-name <name>",
      "Base profile name; each profile is named '<name> - <UPN>'",
      parseNonEmpty,
      DEFAULT_PROFILE_BASE_NAME,
    )
    .option("--set-default", "Make the first profile Outlook's default")
    .option(
      "--office-version <version>",
      "Office registry version (default: $MAILPROV_OFFICE_VERSION or 16.0)",
      parseOfficeVersion,
    )
    .option("--dry-run", "Show the registry writes without performing them")
    .option(
      "--rollback-on-failure",
      "Delete a partially written profile when one of its writes fails",
    )
    .option("-y, --yes", "Do not ask for confirmation when Outlook is running")
    .option("--json", "Output as JSON")
    .action(handleProvision);

  program
    .command("find-client")
    .description("Detect running Outlook processes")
    .option("--json", "Output as JSON")
    .action(handleFindClient);

  return program;
}
