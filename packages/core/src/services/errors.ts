// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

/**
 * Base class for all service-layer errors.
 */
export class ServiceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ServiceError";
  }
}

/**
 * Thrown when provisioning is refused because the mail client is
 * running.
 */
export class MailClientRunningError extends ServiceError {
  /** PIDs of the running client processes. */
  readonly pids: number[];

  constructor(pids: number[]) {
    super(
      `Outlook is running (PID ${pids.map(String).join(", ")}). Close it before provisioning profiles.`,
    );
    this.name = "MailClientRunningError";
    this.pids = pids;
  }
}

/**
 * Thrown when an Office version is not of the form `NN.N`.
 */
export class InvalidOfficeVersionError extends ServiceError {
  constructor(version: string) {
    super(`Invalid Office version "${version}" (expected e.g. 16.0)`);
    this.name = "InvalidOfficeVersionError";
  }
}
