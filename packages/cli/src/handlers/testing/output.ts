// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { vi } from "vitest";

/**
 * Silence `process.stdout` / `process.stderr` and return the spies so
 * tests can read what a handler printed.
 */
export function spyOnOutput() {
  return {
    stdout: vi.spyOn(process.stdout, "write").mockReturnValue(true),
    stderr: vi.spyOn(process.stderr, "write").mockReturnValue(true),
  };
}

export type OutputSpies = ReturnType<typeof spyOnOutput>;

/** Concatenate everything written through a spied `write`. */
export function written(spy: {
  mock: { calls: ReadonlyArray<ReadonlyArray<unknown>> };
}): string {
  return spy.mock.calls.map((call) => String(call[0])).join("");
}
