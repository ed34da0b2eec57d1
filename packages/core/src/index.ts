// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

// Types
export type {
  IdentityRecord,
  ProfileOutcome,
  ProfileResult,
  RunSummary,
} from "./types/index.js";

// Configuration store
export {
  assertStorePath,
  binaryValue,
  type ConfigStore,
  dwordValue,
  formatData,
  formatStorePath,
  MemoryStore,
  RegExeStore,
  type RegExeStoreOptions,
  StoreError,
  type StorePath,
  type StoreSnapshot,
  StoreUnavailableError,
  type StoreValue,
  type StoreWrite,
  StoreWriteError,
  stringValue,
} from "./store/index.js";

// Input
export {
  CsvReadError,
  InputError,
  InputNotFoundError,
  parseIdentityCsv,
  readIdentityRecords,
} from "./input/index.js";

// Services
export {
  BatchRunner,
  type BatchResult,
  type DiscoveredClient,
  findMailClient,
  InvalidOfficeVersionError,
  MailClientRunningError,
  ProfileWriter,
  type ProfileWriterOptions,
  profileNameFor,
  type ProvisioningListener,
  ServiceError,
} from "./services/index.js";

// Operations
export {
  OFFICE_VERSION_ENV,
  type ProfileResultJson,
  provisionProfiles,
  type ProvisionProfilesInput,
  type ProvisionProfilesOutput,
  resolveOfficeVersion,
  serializeProvisionOutput,
  toResultJson,
} from "./operations/index.js";

// Constants
export {
  ACCOUNT_CONTAINER_KEY,
  clientProfilesPath,
  DEFAULT_OFFICE_VERSION,
  DEFAULT_PROFILE_BASE_NAME,
  EXCHANGE_ONLINE_HOST,
  EXCHANGE_PROVIDER_UID,
  EXCHANGE_SERVICE_KEY,
  EXCHANGE_SERVICE_NAME,
  outlookSettingsPath,
  PROFILE_NAME_SEPARATOR,
  SUBSYSTEM_PROFILES_PATH,
  UPN_COLUMN,
} from "./constants.js";

// Utilities
export { errorMessage } from "./utils/index.js";
