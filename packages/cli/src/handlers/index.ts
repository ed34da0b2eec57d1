// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

export { handleFindClient } from "./find-client.js";
export { handleProvision, type ProvisionOptions } from "./provision.js";
