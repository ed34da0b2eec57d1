// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

/**
 * One row of the input CSV. Only the mailbox identity is read; other
 * columns are ignored.
 */
export interface IdentityRecord {
  /** User principal name (email-address-shaped). Empty when the cell is blank. */
  upn: string;
}

/**
 * Outcome of provisioning a single profile.
 *
 * - `created`: every record of the profile was written.
 * - `skipped`: a profile with the same name already exists; nothing was written.
 * - `failed`: a write failed; records written before the failure remain
 *   in place unless rollback was requested.
 */
export type ProfileOutcome =
  | { status: "created" }
  | { status: "skipped" }
  | { status: "failed"; reason: string; cause?: unknown };

/** Per-record result collected over a batch run. */
export interface ProfileResult {
  upn: string;
  /** Profile name derived from the UPN, `null` when the UPN was missing. */
  profileName: string | null;
  outcome: ProfileOutcome;
}

/** Counters accumulated over one batch run. */
export interface RunSummary {
  created: number;
  failed: number;
}
