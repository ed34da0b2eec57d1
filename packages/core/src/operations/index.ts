// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

export {
  OFFICE_VERSION_ENV,
  type ProfileResultJson,
  provisionProfiles,
  type ProvisionProfilesInput,
  type ProvisionProfilesOutput,
  resolveOfficeVersion,
  serializeProvisionOutput,
  toResultJson,
} from "./provision-profiles.js";
