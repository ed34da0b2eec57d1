// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { DEFAULT_OFFICE_VERSION, DEFAULT_PROFILE_BASE_NAME } from "../constants.js";
import { readIdentityRecords } from "../input/index.js";
import { BatchRunner, type ProvisioningListener } from "../services/batch-runner.js";
import { findMailClient } from "../services/client-discovery.js";
import { InvalidOfficeVersionError, MailClientRunningError } from "../services/errors.js";
import { ProfileWriter } from "../services/profile-writer.js";
import {
  type ConfigStore,
  MemoryStore,
  RegExeStore,
  type StoreWrite,
} from "../store/index.js";
import type { ProfileResult, RunSummary } from "../types/index.js";

/** Environment variable consulted when no Office version is given. */
export const OFFICE_VERSION_ENV = "MAILPROV_OFFICE_VERSION";

const OFFICE_VERSION_PATTERN = /^\d{1,2}\.\d$/;

/**
 * Input for the provision-profiles operation.
 */
export interface ProvisionProfilesInput {
  /** Path of the CSV file with a `UPN` column. */
  readonly csvPath: string;
  /** Base profile name (default `M365 Profile`). */
  readonly profileName?: string | undefined;
  /** Make the first provisioned profile Outlook's default. */
  readonly setDefault?: boolean | undefined;
  /** Office version hive to target (default `16.0`). */
  readonly officeVersion?: string | undefined;
  /** Plan the writes against an empty in-memory store instead of the registry. */
  readonly dryRun?: boolean | undefined;
  /** Delete partially written profiles. */
  readonly rollbackOnFailure?: boolean | undefined;
  /** Refuse to run while Outlook is running. */
  readonly requireClientStopped?: boolean | undefined;
  /** Store to write to (default: the registry). Ignored in dry-run. */
  readonly store?: ConfigStore | undefined;
  /** Called once per record as soon as its outcome is known. */
  readonly onProfile?: ProvisioningListener | undefined;
}

/**
 * Output from the provision-profiles operation.
 */
export interface ProvisionProfilesOutput {
  readonly summary: RunSummary;
  readonly results: ProfileResult[];
  readonly dryRun: boolean;
  /** Every write the run performed, in order. Only set in dry-run. */
  readonly writes?: StoreWrite[];
}

/**
 * Resolve the Office version from explicit input, the environment, or
 * the default.
 *
 * @throws {InvalidOfficeVersionError} if the version is not `NN.N`.
 */
export function resolveOfficeVersion(explicit?: string): string {
  const version =
    explicit ?? process.env[OFFICE_VERSION_ENV] ?? DEFAULT_OFFICE_VERSION;
  if (!OFFICE_VERSION_PATTERN.test(version)) {
    throw new InvalidOfficeVersionError(version);
  }
  return version;
}

/**
 * Provision one Outlook profile per row of a CSV file.
 *
 * Input errors (missing file, unreadable CSV) and configuration errors
 * are thrown before anything is written. Per-record failures never
 * throw: they are counted in the summary and reported in `results`.
 */
export async function provisionProfiles(
  input: ProvisionProfilesInput,
): Promise<ProvisionProfilesOutput> {
  const officeVersion = resolveOfficeVersion(input.officeVersion);
  const baseName = input.profileName ?? DEFAULT_PROFILE_BASE_NAME;
  const dryRun = input.dryRun ?? false;

  const records = await readIdentityRecords(input.csvPath);

  if (input.requireClientStopped && !dryRun) {
    const clients = await findMailClient();
    if (clients.length > 0) {
      throw new MailClientRunningError(clients.map((c) => c.pid));
    }
  }

  const planStore = dryRun ? new MemoryStore() : null;
  const store = planStore ?? input.store ?? new RegExeStore();

  const writer = new ProfileWriter(store, {
    officeVersion,
    rollbackOnFailure: input.rollbackOnFailure ?? false,
  });
  const runner = new BatchRunner(writer, input.onProfile);
  const { summary, results } = await runner.runDetailed(
    records,
    baseName,
    input.setDefault ?? false,
  );

  return {
    summary,
    results,
    dryRun,
    ...(planStore !== null && { writes: planStore.writes() }),
  };
}

/**
 * JSON-safe view of a {@link ProfileResult}: the failure cause is
 * dropped, the reason kept.
 */
export interface ProfileResultJson {
  upn: string;
  profileName: string | null;
  status: ProfileResult["outcome"]["status"];
  reason?: string;
}

/** Convert results for JSON output. */
export function toResultJson(result: ProfileResult): ProfileResultJson {
  return {
    upn: result.upn,
    profileName: result.profileName,
    status: result.outcome.status,
    ...(result.outcome.status === "failed" && { reason: result.outcome.reason }),
  };
}

/**
 * Serialize an operation output as pretty-printed JSON. Binary values
 * in dry-run writes are rendered as hex strings.
 */
export function serializeProvisionOutput(output: ProvisionProfilesOutput): string {
  return JSON.stringify(
    {
      summary: output.summary,
      dryRun: output.dryRun,
      results: output.results.map(toResultJson),
      ...(output.writes !== undefined && { writes: output.writes }),
    },
    (_key, value: unknown) =>
      value instanceof Uint8Array ? Buffer.from(value).toString("hex") : value,
    2,
  );
}
