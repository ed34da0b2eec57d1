// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { StoreWriteError } from "../store/errors.js";
import { MemoryStore } from "../store/memory-store.js";
import {
  formatStorePath,
  type StorePath,
  type StoreValue,
} from "../store/types.js";

/**
 * Describes a mutation about to be applied to a {@link FailingStore}.
 * `name` is set for attribute writes only.
 */
export interface PendingWrite {
  op: "createNode" | "setAttribute" | "deleteNode";
  path: string;
  name?: string;
}

/**
 * {@link MemoryStore} that rejects selected mutations with
 * {@link StoreWriteError}, leaving earlier writes applied.
 */
export class FailingStore extends MemoryStore {
  private readonly shouldFail: (write: PendingWrite) => boolean;

  constructor(shouldFail: (write: PendingWrite) => boolean) {
    super();
    this.shouldFail = shouldFail;
  }

  override async createNode(path: StorePath): Promise<void> {
    this.check({ op: "createNode", path: formatStorePath(path) });
    await super.createNode(path);
  }

  override async setAttribute(
    path: StorePath,
    name: string,
    value: StoreValue,
  ): Promise<void> {
    this.check({ op: "setAttribute", path: formatStorePath(path), name });
    await super.setAttribute(path, name, value);
  }

  override async deleteNode(path: StorePath): Promise<void> {
    this.check({ op: "deleteNode", path: formatStorePath(path) });
    await super.deleteNode(path);
  }

  private check(write: PendingWrite): void {
    if (this.shouldFail(write)) {
      const target =
        write.name !== undefined ? `${write.path}\\${write.name}` : write.path;
      throw new StoreWriteError(target, "Access is denied.");
    }
  }
}
