// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2026 Alexey Pelykh

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("@mailprov/core", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@mailprov/core")>();
  return {
    ...actual,
    findMailClient: vi.fn(),
  };
});

import { type DiscoveredClient, findMailClient } from "@mailprov/core";

import { registerFindClient } from "./find-client.js";
import { createMockServer } from "./testing/mock-server.js";

const mockedFindMailClient = vi.mocked(findMailClient);

describe("registerFindClient", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("registers a tool named find-client", () => {
    const { server } = createMockServer();
    registerFindClient(server);

    expect(server.tool).toHaveBeenCalledOnce();
    expect(server.tool).toHaveBeenCalledWith(
      "find-client",
      expect.any(String),
      expect.any(Object),
      expect.any(Function),
    );
  });

  it("returns processes as JSON when found", async () => {
    const { server, getHandler } = createMockServer();
    registerFindClient(server);

    const clients: DiscoveredClient[] = [{ pid: 1234, name: "OUTLOOK.EXE" }];
    mockedFindMailClient.mockResolvedValue(clients);

    const result = (await getHandler("find-client")({})) as {
      content: [{ text: string }];
    };

    expect(JSON.parse(result.content[0].text)).toEqual(clients);
  });

  it("returns friendly message when Outlook is not running", async () => {
    const { server, getHandler } = createMockServer();
    registerFindClient(server);

    mockedFindMailClient.mockResolvedValue([]);

    const result = await getHandler("find-client")({});

    expect(result).toEqual({
      content: [{ type: "text", text: "Outlook is not running" }],
    });
  });

  it("returns error on unexpected failure", async () => {
    const { server, getHandler } = createMockServer();
    registerFindClient(server);

    mockedFindMailClient.mockRejectedValue(new Error("scan failed"));

    const result = await getHandler("find-client")({});

    expect(result).toEqual({
      isError: true,
      content: [{ type: "text", text: "Failed to find Outlook: scan failed" }],
    });
  });
});
