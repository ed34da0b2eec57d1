// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { execFile } from "node:child_process";

import { StoreError, StoreUnavailableError, StoreWriteError } from "./errors.js";
import {
  assertStorePath,
  type ConfigStore,
  formatStorePath,
  type StorePath,
  type StoreValue,
} from "./types.js";

/** Hive every path is resolved against. */
const HIVE = "HKCU";

/** `reg query` exits with this code when the key does not exist. */
const KEY_NOT_FOUND_EXIT_CODE = 1;

/** Upper bound for a single `reg.exe` invocation (ms). */
const DEFAULT_COMMAND_TIMEOUT = 15_000;

const REG_TYPES: Record<StoreValue["type"], string> = {
  string: "REG_SZ",
  dword: "REG_DWORD",
  binary: "REG_BINARY",
};

export interface RegExeStoreOptions {
  /** Path to `reg.exe` (default: resolved from `PATH`). */
  regPath?: string;
  /** Per-command timeout in ms (default 15000). */
  timeout?: number;
  /** Platform override, for tests. */
  platform?: NodeJS.Platform;
}

interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * {@link ConfigStore} backed by the Windows registry under
 * `HKEY_CURRENT_USER`, driven through `reg.exe`.
 *
 * Every call spawns one `reg.exe` process and resolves once it exits,
 * so writes issued with `await` in sequence reach the registry in
 * order.
 */
export class RegExeStore implements ConfigStore {
  private readonly regPath: string;
  private readonly timeout: number;
  private readonly platform: NodeJS.Platform;

  constructor(options?: RegExeStoreOptions) {
    this.regPath = options?.regPath ?? "reg.exe";
    this.timeout = options?.timeout ?? DEFAULT_COMMAND_TIMEOUT;
    this.platform = options?.platform ?? process.platform;
  }

  async exists(path: StorePath): Promise<boolean> {
    const key = toKey(path);
    const result = await this.run(["query", key]);
    if (result.exitCode === 0) {
      return true;
    }
    if (result.exitCode === KEY_NOT_FOUND_EXIT_CODE) {
      return false;
    }
    throw new StoreError(
      `reg query ${key} exited with code ${String(result.exitCode)}: ${result.stderr.trim()}`,
    );
  }

  async createNode(path: StorePath): Promise<void> {
    const key = toKey(path);
    await this.write(key, ["add", key, "/f"]);
  }

  async setAttribute(
    path: StorePath,
    name: string,
    value: StoreValue,
  ): Promise<void> {
    const key = toKey(path);
    await this.write(`${key}\\${name}`, [
      "add",
      key,
      "/v",
      name,
      "/t",
      REG_TYPES[value.type],
      "/d",
      formatData(value),
      "/f",
    ]);
  }

  async deleteNode(path: StorePath): Promise<void> {
    const key = toKey(path);
    await this.write(key, ["delete", key, "/f"]);
  }

  private async write(target: string, args: string[]): Promise<void> {
    const result = await this.run(args);
    if (result.exitCode !== 0) {
      const detail =
        result.stderr.trim() ||
        `reg ${args[0] ?? ""} exited with code ${String(result.exitCode)}`;
      throw new StoreWriteError(target, detail);
    }
  }

  private run(args: string[]): Promise<CommandResult> {
    if (this.platform !== "win32") {
      return Promise.reject(new StoreUnavailableError());
    }

    return new Promise<CommandResult>((resolve, reject) => {
      execFile(
        this.regPath,
        args,
        { timeout: this.timeout, windowsHide: true },
        (error, stdout, stderr) => {
          if (error === null) {
            resolve({ exitCode: 0, stdout, stderr });
            return;
          }
          // A numeric code is the process exit status; anything else
          // (ENOENT, timeout kill) means reg.exe never completed.
          if (typeof error.code === "number") {
            resolve({ exitCode: error.code, stdout, stderr });
            return;
          }
          reject(
            new StoreError(`Failed to run ${this.regPath}: ${error.message}`, {
              cause: error,
            }),
          );
        },
      );
    });
  }
}

function toKey(path: StorePath): string {
  if (path.length === 0) {
    throw new RangeError("Registry path must not be empty");
  }
  assertStorePath(path);
  return `${HIVE}\\${formatStorePath(path)}`;
}

/** Render a value the way `reg add /d` expects it. */
export function formatData(value: StoreValue): string {
  switch (value.type) {
    case "string":
      return value.data;
    case "dword":
      return String(value.data);
    case "binary":
      return Array.from(value.data, (byte) =>
        byte.toString(16).padStart(2, "0"),
      )
        .join("")
        .toUpperCase();
  }
}
