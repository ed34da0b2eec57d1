// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

/**
 * Base class for all input-file errors. Input errors are fatal: they
 * abort a run before any profile is written.
 */
export class InputError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InputError";
  }
}

/**
 * Thrown when the input CSV path does not resolve to a file.
 */
export class InputNotFoundError extends InputError {
  readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    super(`Input file not found: ${path}`, options);
    this.name = "InputNotFoundError";
    this.path = path;
  }
}

/**
 * Thrown when the input cannot be read as CSV or lacks the identity
 * column.
 */
export class CsvReadError extends InputError {
  readonly path: string;

  constructor(path: string, detail: string, options?: ErrorOptions) {
    super(`Cannot read ${path} as CSV: ${detail}`, options);
    this.name = "CsvReadError";
    this.path = path;
  }
}
