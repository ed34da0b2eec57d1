// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { afterEach, describe, expect, it, vi } from "vitest";
import { findMailClient } from "./client-discovery.js";

vi.mock("ps-list", () => ({
  default: vi.fn(),
}));

import psList from "ps-list";

describe("findMailClient", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should return empty array when Outlook is not running", async () => {
    vi.mocked(psList).mockResolvedValue([
      { pid: 100, name: "explorer.exe", ppid: 1 },
      { pid: 200, name: "teams.exe", ppid: 1 },
    ]);

    expect(await findMailClient()).toEqual([]);
  });

  it("should return empty array when psList throws", async () => {
    vi.mocked(psList).mockRejectedValue(new Error("permission denied"));

    expect(await findMailClient()).toEqual([]);
  });

  it("should discover OUTLOOK.EXE", async () => {
    vi.mocked(psList).mockResolvedValue([
      { pid: 100, name: "explorer.exe", ppid: 1 },
      { pid: 4242, name: "OUTLOOK.EXE", ppid: 100 },
    ]);

    expect(await findMailClient()).toEqual([{ pid: 4242, name: "OUTLOOK.EXE" }]);
  });

  it("should discover lower-case outlook.exe", async () => {
    vi.mocked(psList).mockResolvedValue([
      { pid: 4242, name: "outlook.exe", ppid: 1 },
    ]);

    expect(await findMailClient()).toEqual([{ pid: 4242, name: "outlook.exe" }]);
  });

  it("should not match processes with similar but different names", async () => {
    vi.mocked(psList).mockResolvedValue([
      { pid: 100, name: "olk.exe", ppid: 1 },
      { pid: 200, name: "outlook-helper.exe", ppid: 1 },
    ]);

    expect(await findMailClient()).toEqual([]);
  });
});
