// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

export { CsvReadError, InputError, InputNotFoundError } from "./errors.js";
export { parseIdentityCsv, readIdentityRecords } from "./identity-csv.js";
