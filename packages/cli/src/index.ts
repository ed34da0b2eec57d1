// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

export { createProgram } from "./program.js";
export {
  handleFindClient,
  handleProvision,
  type ProvisionOptions,
} from "./handlers/index.js";
