// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { randomUUID } from "node:crypto";
import { afterAll, expect, it } from "vitest";

import { describeE2E } from "../testing/index.js";
import { RegExeStore } from "./reg-exe-store.js";
import { binaryValue, dwordValue, stringValue } from "./types.js";

describeE2E("RegExeStore", () => {
  const store = new RegExeStore();
  const root = ["Software", `mailprov-e2e-${randomUUID()}`];

  afterAll(async () => {
    if (await store.exists(root)) {
      await store.deleteNode(root);
    }
  });

  it("creates, writes and deletes a key tree", async () => {
    expect(await store.exists(root)).toBe(false);

    await store.createNode([...root, "Child"]);
    await store.setAttribute([...root, "Child"], "Name", stringValue("alice@example.com"));
    await store.setAttribute([...root, "Child"], "Count", dwordValue(2));
    await store.setAttribute([...root, "Child"], "Blob", binaryValue([0x18, 0x54]));

    expect(await store.exists([...root, "Child"])).toBe(true);

    await store.deleteNode(root);

    expect(await store.exists(root)).toBe(false);
  });
});
