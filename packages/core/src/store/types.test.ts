// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { describe, expect, it } from "vitest";

import {
  assertStorePath,
  binaryValue,
  dwordValue,
  formatStorePath,
  stringValue,
} from "./types.js";

describe("value constructors", () => {
  it("builds a string value", () => {
    expect(stringValue("x")).toEqual({ type: "string", data: "x" });
  });

  it("accepts the full DWORD range", () => {
    expect(dwordValue(0)).toEqual({ type: "dword", data: 0 });
    expect(dwordValue(0xffffffff)).toEqual({ type: "dword", data: 4294967295 });
  });

  it.each([-1, 0x100000000, 1.5, Number.NaN])(
    "rejects %s as a DWORD",
    (value) => {
      expect(() => dwordValue(value)).toThrow(RangeError);
    },
  );

  it("copies binary input into a Uint8Array", () => {
    const source = [0xde, 0xad];
    const value = binaryValue(source);
    source[0] = 0;

    expect(value).toEqual({ type: "binary", data: new Uint8Array([0xde, 0xad]) });
  });
});

describe("formatStorePath", () => {
  it("joins segments with backslashes", () => {
    expect(formatStorePath(["Software", "Microsoft", "Office"])).toBe(
      "Software\\Microsoft\\Office",
    );
  });
});

describe("assertStorePath", () => {
  it("accepts ordinary segments", () => {
    expect(() => assertStorePath(["Software", "M365 Profile - a@example.com"])).not.toThrow();
  });

  it("rejects an empty segment", () => {
    expect(() => assertStorePath(["A", ""])).toThrow("Empty key segment in A\\");
  });

  it("rejects a segment containing the separator", () => {
    expect(() => assertStorePath(["Profiles", "Base - CONTOSO\\alice"])).toThrow(
      'Key segment "Base - CONTOSO\\alice" contains a backslash in Profiles\\Base - CONTOSO\\alice',
    );
  });
});
