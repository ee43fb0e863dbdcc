// src/core/naming/trie.ts
// Prefix tree keyed by label paths. Backs both the loaded-module table and the system-call table.

import type { Label } from "./label";
import { compareLabels } from "./label";
import { type Address, toAddress } from "./address";

type TrieNode<T> = {
  value?: T;
  has: boolean;
  children: Map<Label, TrieNode<T>>;
};

function emptyNode<T>(): TrieNode<T> {
  return { has: false, children: new Map() };
}

export class LabelTrie<T> {
  private root: TrieNode<T> = emptyNode();
  private count = 0;

  get size(): number {
    return this.count;
  }

  get(path: Address): T | undefined {
    const node = this.find(path);
    return node?.has ? node.value : undefined;
  }

  has(path: Address): boolean {
    return this.find(path)?.has ?? false;
  }

  set(path: Address, value: T): void {
    let node = this.root;
    for (const l of path) {
      let next = node.children.get(l);
      if (!next) {
        next = emptyNode();
        node.children.set(l, next);
      }
      node = next;
    }
    if (!node.has) this.count++;
    node.has = true;
    node.value = value;
  }

  /** Remove the entry at exactly `path`, keeping anything stored beneath it. */
  delete(path: Address): boolean {
    const node = this.find(path);
    if (!node?.has) return false;
    node.has = false;
    node.value = undefined;
    this.count--;
    this.prune(path);
    return true;
  }

  /** Remove the entry at `path` and every entry beneath it. Returns how many were removed. */
  deleteBranch(path: Address): number {
    const parentPath = path.slice(0, -1);
    const last = path[path.length - 1];
    const parent = this.findLabels(parentPath);
    const branch = parent?.children.get(last);
    if (!parent || !branch) return 0;
    const removed = countEntries(branch);
    parent.children.delete(last);
    this.count -= removed;
    this.prune(parentPath);
    return removed;
  }

  /** All entries in label order, optionally restricted to those under `prefix`. */
  entries(prefix?: Address): Array<[Address, T]> {
    const start = prefix ? this.find(prefix) : this.root;
    const out: Array<[Address, T]> = [];
    if (start) collect(start, prefix ? [...prefix] : [], out);
    return out;
  }

  keys(prefix?: Address): Address[] {
    return this.entries(prefix).map(([k]) => k);
  }

  values(prefix?: Address): T[] {
    return this.entries(prefix).map(([, v]) => v);
  }

  private find(path: Address): TrieNode<T> | undefined {
    return this.findLabels(path);
  }

  private findLabels(path: readonly Label[]): TrieNode<T> | undefined {
    let node: TrieNode<T> | undefined = this.root;
    for (const l of path) {
      node = node.children.get(l);
      if (!node) return undefined;
    }
    return node;
  }

  // Drop empty interior nodes left behind along `path`.
  private prune(path: readonly Label[]): void {
    for (let depth = path.length; depth > 0; depth--) {
      const parent = this.findLabels(path.slice(0, depth - 1));
      const key = path[depth - 1];
      const child = parent?.children.get(key);
      if (!parent || !child || child.has || child.children.size > 0) return;
      parent.children.delete(key);
    }
  }
}

function countEntries<T>(node: TrieNode<T>): number {
  let n = node.has ? 1 : 0;
  for (const child of node.children.values()) n += countEntries(child);
  return n;
}

function collect<T>(node: TrieNode<T>, path: Label[], out: Array<[Address, T]>): void {
  const here = toAddress(path);
  if (node.has && here && node.value !== undefined) out.push([here, node.value]);
  const keys = [...node.children.keys()].sort(compareLabels);
  for (const k of keys) {
    const child = node.children.get(k);
    if (child) collect(child, [...path, k], out);
  }
}
