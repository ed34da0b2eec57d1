// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import {
  errorMessage,
  InputError,
  InvalidOfficeVersionError,
  MailClientRunningError,
} from "@mailprov/core";

type TextContent = { type: "text"; text: string };
type McpResult = { isError?: boolean; content: TextContent[] };

function textContent(text: string): TextContent[] {
  return [{ type: "text" as const, text }];
}

/** Error result carrying a single text block. */
export function mcpError(text: string): McpResult {
  return { isError: true, content: textContent(text) };
}

/** Successful result carrying plain text or a JSON document. */
export function mcpSuccess(text: string): McpResult {
  return { content: textContent(text) };
}

/**
 * Errors that stop a provisioning run before the first registry write
 * are reported with their own message; an Outlook process gets a hint
 * about the `force` argument.
 *
 * Returns `undefined` for anything else.
 */
export function mapErrorToMcpResponse(error: unknown): McpResult | undefined {
  if (error instanceof MailClientRunningError) {
    return mcpError(`${error.message} Pass force: true to provision anyway.`);
  }
  if (error instanceof InputError || error instanceof InvalidOfficeVersionError) {
    return mcpError(error.message);
  }
  return undefined;
}

/**
 * Turn any caught value into an error result, using `prefix` for
 * errors {@link mapErrorToMcpResponse} does not recognise.
 */
export function mcpCatchAll(error: unknown, prefix: string): McpResult {
  return mapErrorToMcpResponse(error) ?? mcpError(`${prefix}: ${errorMessage(error)}`);
}
