// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

/**
 * Extract a human-readable message from an unknown caught value.
 *
 * Besides `Error` instances this accepts error-shaped objects (anything
 * with a string `message`), which is what some child-process and
 * stream callbacks hand back.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  return String(error);
}
