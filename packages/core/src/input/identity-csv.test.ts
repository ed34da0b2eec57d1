// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { CsvReadError, InputNotFoundError } from "./errors.js";
import { parseIdentityCsv, readIdentityRecords } from "./identity-csv.js";

describe("parseIdentityCsv", () => {
  it("reads the UPN column and ignores the others", () => {
    const csv = [
      "DisplayName,UPN,Department",
      "Alice,alice@example.com,Sales",
      "Bob,bob@example.com,Support",
    ].join("\n");

    expect(parseIdentityCsv(csv)).toEqual([
      { upn: "alice@example.com" },
      { upn: "bob@example.com" },
    ]);
  });

  it("matches the header case-insensitively", () => {
    expect(parseIdentityCsv("upn\nalice@example.com\n")).toEqual([
      { upn: "alice@example.com" },
    ]);
  });

  it("strips a UTF-8 byte order mark", () => {
    expect(parseIdentityCsv("\uFEFFUPN\r\nalice@example.com\r\n")).toEqual([
      { upn: "alice@example.com" },
    ]);
  });

  it("trims surrounding whitespace", () => {
    expect(parseIdentityCsv("UPN\n  alice@example.com  \n")).toEqual([
      { upn: "alice@example.com" },
    ]);
  });

  it("handles quoted fields", () => {
    const csv = 'Name,UPN\n"Smith, Alice","alice@example.com"\n';

    expect(parseIdentityCsv(csv)).toEqual([{ upn: "alice@example.com" }]);
  });

  it("keeps rows with a blank or missing identity as empty", () => {
    const csv = ["Name,UPN", "Alice,", "Bob", ",carol@example.com"].join("\n");

    expect(parseIdentityCsv(csv)).toEqual([
      { upn: "" },
      { upn: "" },
      { upn: "carol@example.com" },
    ]);
  });

  it("skips blank lines", () => {
    expect(parseIdentityCsv("UPN\n\nalice@example.com\n\n")).toEqual([
      { upn: "alice@example.com" },
    ]);
  });

  it("returns no records for a header-only file", () => {
    expect(parseIdentityCsv("UPN\n")).toEqual([]);
  });

  it("throws CsvReadError when the UPN column is missing", () => {
    expect(() => parseIdentityCsv("Email\nalice@example.com\n", "users.csv")).toThrow(
      'Cannot read users.csv as CSV: missing required column "UPN"',
    );
  });

  it("throws CsvReadError for empty input", () => {
    expect(() => parseIdentityCsv("")).toThrow(
      "Cannot read input as CSV: no header row",
    );
  });

  it("throws CsvReadError for malformed CSV", () => {
    expect(() => parseIdentityCsv('UPN\n"alice@example.com\n')).toThrow(
      CsvReadError,
    );
  });
});

describe("readIdentityRecords", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "mailprov-csv-"));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads records from a file", async () => {
    const path = join(dir, "users.csv");
    writeFileSync(path, "UPN\nalice@example.com\nbob@example.com\n");

    await expect(readIdentityRecords(path)).resolves.toEqual([
      { upn: "alice@example.com" },
      { upn: "bob@example.com" },
    ]);
  });

  it("throws InputNotFoundError for a missing file", async () => {
    const path = join(dir, "missing.csv");

    const error = await readIdentityRecords(path).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InputNotFoundError);
    expect((error as InputNotFoundError).message).toBe(
      `Input file not found: ${path}`,
    );
  });

  it("throws CsvReadError when the path is a directory", async () => {
    await expect(readIdentityRecords(dir)).rejects.toBeInstanceOf(CsvReadError);
  });

  it("names the file in parse errors", async () => {
    const path = join(dir, "no-upn.csv");
    writeFileSync(path, "Email\nalice@example.com\n");

    await expect(readIdentityRecords(path)).rejects.toThrow(
      `Cannot read ${path} as CSV: missing required column "UPN"`,
    );
  });
});
