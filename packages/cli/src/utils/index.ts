// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

export { confirm, isInteractive, promptInput } from "./prompt.js";
