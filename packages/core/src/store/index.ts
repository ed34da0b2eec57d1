// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

export {
  assertStorePath,
  binaryValue,
  type ConfigStore,
  dwordValue,
  formatStorePath,
  type StorePath,
  type StoreValue,
  type StoreWrite,
  stringValue,
} from "./types.js";
export { StoreError, StoreUnavailableError, StoreWriteError } from "./errors.js";
export { MemoryStore, type StoreSnapshot } from "./memory-store.js";
export { formatData, RegExeStore, type RegExeStoreOptions } from "./reg-exe-store.js";
