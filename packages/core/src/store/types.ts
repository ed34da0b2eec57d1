// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

/**
 * Location of a node in the configuration store, as key segments
 * relative to the current-user hive
 * (e.g. `["Software", "Microsoft", "Office"]`).
 */
export type StorePath = readonly string[];

/** A typed attribute value. */
export type StoreValue =
  | { type: "string"; data: string }
  | { type: "dword"; data: number }
  | { type: "binary"; data: Uint8Array };

/**
 * Hierarchical key/value store that holds mail client profiles
 * (the Windows registry in production).
 *
 * The store offers no transactions: a sequence of calls that builds
 * one profile can be interrupted midway and leave a partial subtree
 * behind. Callers that need cleanup must use {@link deleteNode}
 * explicitly.
 */
export interface ConfigStore {
  /** Whether a node exists at `path`. */
  exists(path: StorePath): Promise<boolean>;

  /** Create the node at `path`, including missing ancestors. */
  createNode(path: StorePath): Promise<void>;

  /** Set a named attribute on the node at `path`, creating the node if needed. */
  setAttribute(path: StorePath, name: string, value: StoreValue): Promise<void>;

  /**
   * Delete the node at `path` and everything below it. Optional;
   * stores that cannot delete leave it undefined.
   */
  deleteNode?(path: StorePath): Promise<void>;
}

/** A single mutation applied to a store, in application order. */
export type StoreWrite =
  | { op: "createNode"; path: string }
  | { op: "setAttribute"; path: string; name: string; value: StoreValue }
  | { op: "deleteNode"; path: string };

/** Join path segments with the registry separator. */
export function formatStorePath(path: StorePath): string {
  return path.join("\\");
}

/**
 * Check that every segment names exactly one key: not empty and free of
 * the separator, which the registry would read as nesting.
 *
 * @throws {RangeError} on the first offending segment.
 */
export function assertStorePath(path: StorePath): void {
  for (const segment of path) {
    if (segment === "") {
      throw new RangeError(`Empty key segment in ${formatStorePath(path)}`);
    }
    if (segment.includes("\\")) {
      throw new RangeError(
        `Key segment "${segment}" contains a backslash in ${formatStorePath(path)}`,
      );
    }
  }
}

/** Construct a string value. */
export function stringValue(data: string): StoreValue {
  return { type: "string", data };
}

/**
 * Construct a DWORD value.
 *
 * @throws {RangeError} if `data` is not an unsigned 32-bit integer.
 */
export function dwordValue(data: number): StoreValue {
  if (!Number.isInteger(data) || data < 0 || data > 0xffffffff) {
    throw new RangeError(`DWORD value out of range: ${String(data)}`);
  }
  return { type: "dword", data };
}

/**
 * Construct a binary value. Bytes are copied so later mutation of the
 * source does not leak into the store.
 */
export function binaryValue(data: ArrayLike<number>): StoreValue {
  return { type: "binary", data: Uint8Array.from(data) };
}
