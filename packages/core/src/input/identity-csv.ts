// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { readFile } from "node:fs/promises";

import { parse } from "csv-parse/sync";

import { UPN_COLUMN } from "../constants.js";
import type { IdentityRecord } from "../types/index.js";
import { errorMessage } from "../utils/error-message.js";
import { CsvReadError, InputNotFoundError } from "./errors.js";

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every(
      (row) =>
        Array.isArray(row) && row.every((cell) => typeof cell === "string"),
    )
  );
}

/**
 * Parse CSV text into identity records.
 *
 * The first row is the header. The identity column is located by name,
 * ignoring case; every other column is ignored. Rows with a blank or
 * missing identity cell are kept with an empty `upn` so the caller can
 * count them as failures.
 *
 * @param source - Name used in error messages (usually the file path).
 * @throws {CsvReadError} if the text is not valid CSV or has no
 *   identity column.
 */
export function parseIdentityCsv(
  content: string,
  source = "input",
): IdentityRecord[] {
  let rows: unknown;
  try {
    rows = parse(content, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new CsvReadError(source, errorMessage(error), { cause: error });
  }

  if (!isStringMatrix(rows)) {
    throw new CsvReadError(source, "unexpected parser output");
  }

  const [header, ...body] = rows;
  if (header === undefined) {
    throw new CsvReadError(source, "no header row");
  }

  const column = header.findIndex(
    (name) => name.toLowerCase() === UPN_COLUMN.toLowerCase(),
  );
  if (column === -1) {
    throw new CsvReadError(source, `missing required column "${UPN_COLUMN}"`);
  }

  return body.map((row) => ({ upn: row[column] ?? "" }));
}

/**
 * Read identity records from a CSV file.
 *
 * @throws {InputNotFoundError} if `path` does not exist.
 * @throws {CsvReadError} if the file cannot be read or parsed.
 */
export async function readIdentityRecords(
  path: string,
): Promise<IdentityRecord[]> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    const code =
      error instanceof Error && "code" in error ? error.code : undefined;
    if (code === "ENOENT" || code === "ENOTDIR") {
      throw new InputNotFoundError(path, { cause: error });
    }
    throw new CsvReadError(path, errorMessage(error), { cause: error });
  }
  return parseIdentityCsv(content, path);
}
