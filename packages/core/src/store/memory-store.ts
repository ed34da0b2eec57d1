// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import {
  assertStorePath,
  type ConfigStore,
  formatStorePath,
  type StorePath,
  type StoreValue,
  type StoreWrite,
} from "./types.js";

interface MemoryNode {
  name: string;
  attributes: Map<string, StoreValue>;
  children: Map<string, MemoryNode>;
}

/**
 * Flattened view of a {@link MemoryStore}: every node's full path
 * mapped to its attributes.
 */
export type StoreSnapshot = Record<string, Record<string, StoreValue>>;

function createNode(name: string): MemoryNode {
  return { name, attributes: new Map(), children: new Map() };
}

/** Registry keys and value names compare case-insensitively. */
function fold(segment: string): string {
  return segment.toLowerCase();
}

function cloneValue(value: StoreValue): StoreValue {
  return value.type === "binary"
    ? { type: "binary", data: Uint8Array.from(value.data) }
    : { ...value };
}

/**
 * In-memory {@link ConfigStore}.
 *
 * Backs `--dry-run` and the test suites. Every mutation is recorded in
 * order so callers can show or assert the exact sequence of writes a
 * run would perform against the registry.
 */
export class MemoryStore implements ConfigStore {
  private readonly root = createNode("");
  private readonly log: StoreWrite[] = [];

  async exists(path: StorePath): Promise<boolean> {
    assertStorePath(path);
    return this.find(path) !== null;
  }

  async createNode(path: StorePath): Promise<void> {
    this.ensure(path);
    this.log.push({ op: "createNode", path: formatStorePath(path) });
  }

  async setAttribute(
    path: StorePath,
    name: string,
    value: StoreValue,
  ): Promise<void> {
    const node = this.ensure(path);
    // Replace under the folded name but keep the caller's spelling
    const existing = [...node.attributes.keys()].find(
      (key) => fold(key) === fold(name),
    );
    if (existing !== undefined) {
      node.attributes.delete(existing);
    }
    node.attributes.set(name, cloneValue(value));
    this.log.push({
      op: "setAttribute",
      path: formatStorePath(path),
      name,
      value: cloneValue(value),
    });
  }

  async deleteNode(path: StorePath): Promise<void> {
    if (path.length === 0) {
      throw new RangeError("Cannot delete the store root");
    }
    assertStorePath(path);
    const parent = this.find(path.slice(0, -1));
    const leaf = path[path.length - 1] as string;
    if (parent === null || !parent.children.delete(fold(leaf))) {
      return;
    }
    this.log.push({ op: "deleteNode", path: formatStorePath(path) });
  }

  /** Read an attribute, or `undefined` if the node or attribute is absent. */
  get(path: StorePath, name: string): StoreValue | undefined {
    const node = this.find(path);
    if (node === null) {
      return undefined;
    }
    for (const [key, value] of node.attributes) {
      if (fold(key) === fold(name)) {
        return cloneValue(value);
      }
    }
    return undefined;
  }

  /** Mutations applied so far, oldest first. */
  writes(): StoreWrite[] {
    return this.log.map((write) =>
      write.op === "setAttribute"
        ? { ...write, value: cloneValue(write.value) }
        : { ...write },
    );
  }

  /** Flattened copy of the whole tree (the root node is omitted). */
  snapshot(): StoreSnapshot {
    const result: StoreSnapshot = {};
    const visit = (node: MemoryNode, segments: string[]) => {
      for (const child of node.children.values()) {
        const childSegments = [...segments, child.name];
        const attributes: Record<string, StoreValue> = {};
        for (const [key, value] of child.attributes) {
          attributes[key] = cloneValue(value);
        }
        result[formatStorePath(childSegments)] = attributes;
        visit(child, childSegments);
      }
    };
    visit(this.root, []);
    return result;
  }

  private find(path: StorePath): MemoryNode | null {
    let node = this.root;
    for (const segment of path) {
      const next = node.children.get(fold(segment));
      if (!next) {
        return null;
      }
      node = next;
    }
    return node;
  }

  private ensure(path: StorePath): MemoryNode {
    assertStorePath(path);
    let node = this.root;
    for (const segment of path) {
      let next = node.children.get(fold(segment));
      if (!next) {
        next = createNode(segment);
        node.children.set(fold(segment), next);
      }
      node = next;
    }
    return node;
  }
}
