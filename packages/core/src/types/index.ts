// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

export type {
  IdentityRecord,
  ProfileOutcome,
  ProfileResult,
  RunSummary,
} from "./provisioning.js";
