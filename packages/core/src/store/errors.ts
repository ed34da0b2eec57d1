// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

/**
 * Base class for all configuration-store errors.
 */
export class StoreError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StoreError";
  }
}

/**
 * Thrown when a write to the store fails (permissions, invalid path,
 * store unavailable mid-run).
 */
export class StoreWriteError extends StoreError {
  /** Registry path of the failed write. */
  readonly path: string;

  constructor(path: string, detail: string, options?: ErrorOptions) {
    super(`Failed to write ${path}: ${detail}`, options);
    this.name = "StoreWriteError";
    this.path = path;
  }
}

/**
 * Thrown when the store cannot be used on this host at all, e.g. the
 * registry back end on a non-Windows platform.
 */
export class StoreUnavailableError extends StoreError {
  constructor(message?: string) {
    super(message ?? "The Windows registry is only available on Windows");
    this.name = "StoreUnavailableError";
  }
}
