// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { PROFILE_NAME_SEPARATOR } from "../constants.js";
import type {
  IdentityRecord,
  ProfileResult,
  RunSummary,
} from "../types/index.js";
import type { ProfileWriter } from "./profile-writer.js";

/**
 * Receives one call per processed record, in input order, as soon as
 * its outcome is known.
 */
export type ProvisioningListener = (result: ProfileResult, index: number) => void;

/** Summary of a batch plus the outcome of every record. */
export interface BatchResult {
  summary: RunSummary;
  results: ProfileResult[];
}

/**
 * Derive the profile name for a mailbox identity.
 */
export function profileNameFor(baseName: string, upn: string): string {
  return `${baseName}${PROFILE_NAME_SEPARATOR}${upn}`;
}

/**
 * Provisions one profile per identity record, strictly in sequence.
 */
export class BatchRunner {
  private readonly writer: ProfileWriter;
  private readonly listener: ProvisioningListener | undefined;

  constructor(writer: ProfileWriter, listener?: ProvisioningListener) {
    this.writer = writer;
    this.listener = listener;
  }

  /**
   * Provision every record and return the created/failed counters.
   *
   * Skipped (already existing) profiles count as failed. When
   * `setFirstAsDefault` is set, only the first record in input order
   * that yields a profile name is asked to become the default profile,
   * whether or not its creation succeeds. Rows without a UPN are
   * counted as failed and do not consume the default.
   */
  async run(
    records: readonly IdentityRecord[],
    baseName: string,
    setFirstAsDefault: boolean,
  ): Promise<RunSummary> {
    const { summary } = await this.runDetailed(records, baseName, setFirstAsDefault);
    return summary;
  }

  /**
   * Same as {@link run}, also returning the per-record results.
   */
  async runDetailed(
    records: readonly IdentityRecord[],
    baseName: string,
    setFirstAsDefault: boolean,
  ): Promise<BatchResult> {
    const summary: RunSummary = { created: 0, failed: 0 };
    const results: ProfileResult[] = [];
    let defaultPending = setFirstAsDefault;

    for (const [index, record] of records.entries()) {
      const upn = record.upn.trim();
      let result: ProfileResult;

      if (upn === "") {
        result = {
          upn,
          profileName: null,
          outcome: { status: "failed", reason: "Missing UPN" },
        };
      } else {
        const profileName = profileNameFor(baseName, upn);
        const outcome = await this.writer.createProfile(
          profileName,
          upn,
          defaultPending,
        );
        result = { upn, profileName, outcome };
        // One-shot: cleared after the first attempt whatever its outcome
        defaultPending = false;
      }

      if (result.outcome.status === "created") {
        summary.created++;
      } else {
        summary.failed++;
      }

      results.push(result);
      this.listener?.(result, index);
    }

    return { summary, results };
  }
}
