// src/core/naming/address.ts
// Addresses: non-empty dot-separated label paths naming modules, system calls and data types.

import { type Label, NameParseError, compareLabels, isLabel } from "./label";

export type Address = readonly [Label, ...Label[]];

/**
 * Parse dotted text such as `"io.print"` into an Address.
 */
export function parseAddress(text: string): Address {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new NameParseError("Address", text, "empty address");
  }
  const segment = (part: string): Label => {
    if (!isLabel(part)) {
      throw new NameParseError(
        "Address",
        text,
        part.length === 0 ? "empty address segment" : `invalid address segment ${JSON.stringify(part)}`
      );
    }
    return part;
  };
  const [first = "", ...rest] = trimmed.split(".");
  return [segment(first), ...rest.map(segment)];
}

export function tryParseAddress(text: string): Address | undefined {
  try {
    return parseAddress(text);
  } catch (e) {
    if (e instanceof NameParseError) return undefined;
    throw e;
  }
}

/** Shorthand for building addresses in host code and tests. */
export const address = parseAddress;

/** Narrow a label list to an Address; undefined when empty. */
export function toAddress(labels: readonly Label[]): Address | undefined {
  const [head, ...rest] = labels;
  return head === undefined ? undefined : [head, ...rest];
}

export function appendLabel(a: Address, l: Label): Address {
  return [...a, l];
}

export function concatAddress(a: Address, b: Address): Address {
  return [...a, ...b];
}

export function showAddress(a: Address): string {
  return a.join(".");
}

export function addressEquals(a: Address, b: Address): boolean {
  return a.length === b.length && a.every((l, i) => l === b[i]);
}

/** Lexicographic by label, shorter prefix first. */
export function compareAddresses(a: Address, b: Address): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const c = compareLabels(a[i], b[i]);
    if (c !== 0) return c;
  }
  return a.length - b.length;
}

export function isPrefixOf(prefix: Address, a: Address): boolean {
  return prefix.length <= a.length && prefix.every((l, i) => l === a[i]);
}
