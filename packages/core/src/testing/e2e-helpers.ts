// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { describe } from "vitest";

/**
 * Wrapper around `describe.skipIf` that skips the suite unless the
 * real registry is reachable (Windows only).
 */
export function describeE2E(
  name: string,
  fn: () => void,
): ReturnType<typeof describe> {
  return describe.skipIf(process.platform !== "win32")(`${name} (e2e)`, fn);
}
