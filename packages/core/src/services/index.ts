// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

export {
  BatchRunner,
  type BatchResult,
  profileNameFor,
  type ProvisioningListener,
} from "./batch-runner.js";
export { findMailClient, type DiscoveredClient } from "./client-discovery.js";
export {
  InvalidOfficeVersionError,
  MailClientRunningError,
  ServiceError,
} from "./errors.js";
export { ProfileWriter, type ProfileWriterOptions } from "./profile-writer.js";
