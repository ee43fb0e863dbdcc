// src/core/values/values.ts
// Runtime values: the closed set of data the VM computes with.

import type { Label } from "../naming/label";
import { compareLabels } from "../naming/label";
import type { Address } from "../naming/address";
import { addressEquals, compareAddresses, showAddress } from "../naming/address";
import type { Block, Command, Expr, Lookup } from "../program/instructions";

export type Value =
  | { tag: "Null" }
  | { tag: "True" }
  | { tag: "Int"; n: bigint }
  | { tag: "Float"; f: number }
  | { tag: "Str"; s: string }
  | { tag: "Ptr"; addr: Address }
  | { tag: "List"; items: readonly Value[] }
  | { tag: "Data"; type: Address; fields: ReadonlyMap<Label, Value> }
  | { tag: "Func"; params: readonly Label[]; body: Block };

export type ValueTag = Value["tag"];

export const VNull: Value = { tag: "Null" };
export const VTrue: Value = { tag: "True" };

/** Wrap to the signed 64-bit range. */
export function wrapInt(n: bigint): bigint {
  return BigInt.asIntN(64, n);
}

export function mkInt(n: bigint | number): Value {
  return { tag: "Int", n: wrapInt(typeof n === "number" ? BigInt(Math.trunc(n)) : n) };
}

export function mkFloat(f: number): Value {
  return { tag: "Float", f };
}

export function mkStr(s: string): Value {
  return { tag: "Str", s };
}

export function mkPtr(addr: Address): Value {
  return { tag: "Ptr", addr };
}

export function mkList(items: readonly Value[]): Value {
  return { tag: "List", items: Object.freeze([...items]) };
}

export function mkData(type: Address, fields: Iterable<readonly [Label, Value]> = []): Value {
  return { tag: "Data", type, fields: new Map(fields) };
}

export function mkFunc(params: readonly Label[], body: Block): Value {
  return { tag: "Func", params: [...params], body };
}

export function mkBool(b: boolean): Value {
  return b ? VTrue : VNull;
}

/** Null is false; True is true; anything else is not a boolean. */
export function asBool(v: Value): boolean | undefined {
  if (v.tag === "Null") return false;
  if (v.tag === "True") return true;
  return undefined;
}

export function isTruthy(v: Value): boolean {
  return v.tag !== "Null";
}

// ─────────────────────────────────────────────────────────────────
// Ordering and equality
// ─────────────────────────────────────────────────────────────────

const TAG_RANK: Record<ValueTag, number> = {
  Null: 0,
  True: 1,
  Int: 2,
  Float: 3,
  Str: 4,
  Ptr: 5,
  List: 6,
  Data: 7,
  Func: 8,
};

function order(lt: boolean, gt: boolean): number {
  return lt ? -1 : gt ? 1 : 0;
}

function sortedFields(fields: ReadonlyMap<Label, Value>): Array<[Label, Value]> {
  return [...fields.entries()].sort(([a], [b]) => compareLabels(a, b));
}

function compareLists(a: readonly Value[], b: readonly Value[]): number {
  if (a.length !== b.length) return a.length - b.length;
  for (let i = 0; i < a.length; i++) {
    const c = compareValues(a[i], b[i]);
    if (c !== 0) return c;
  }
  return 0;
}

function compareLabelLists(a: readonly Label[], b: readonly Label[]): number {
  if (a.length !== b.length) return a.length - b.length;
  for (let i = 0; i < a.length; i++) {
    const c = compareLabels(a[i], b[i]);
    if (c !== 0) return c;
  }
  return 0;
}

/**
 * Total order over values: by constructor first, then payload.
 */
export function compareValues(a: Value, b: Value): number {
  const rank = TAG_RANK[a.tag] - TAG_RANK[b.tag];
  if (rank !== 0) return rank;
  switch (a.tag) {
    case "Null":
    case "True":
      return 0;
    case "Int":
      return b.tag === "Int" ? order(a.n < b.n, a.n > b.n) : 0;
    case "Float":
      return b.tag === "Float" ? order(a.f < b.f, a.f > b.f) : 0;
    case "Str":
      return b.tag === "Str" ? order(a.s < b.s, a.s > b.s) : 0;
    case "Ptr":
      return b.tag === "Ptr" ? compareAddresses(a.addr, b.addr) : 0;
    case "List":
      return b.tag === "List" ? compareLists(a.items, b.items) : 0;
    case "Data": {
      if (b.tag !== "Data") return 0;
      const t = compareAddresses(a.type, b.type);
      if (t !== 0) return t;
      const fa = sortedFields(a.fields);
      const fb = sortedFields(b.fields);
      if (fa.length !== fb.length) return fa.length - fb.length;
      for (let i = 0; i < fa.length; i++) {
        const k = compareLabels(fa[i][0], fb[i][0]);
        if (k !== 0) return k;
        const v = compareValues(fa[i][1], fb[i][1]);
        if (v !== 0) return v;
      }
      return 0;
    }
    case "Func": {
      if (b.tag !== "Func") return 0;
      const p = compareLabelLists(a.params, b.params);
      if (p !== 0) return p;
      if (a.body === b.body) return 0;
      const ka = blockKey(a.body);
      const kb = blockKey(b.body);
      return order(ka < kb, ka > kb);
    }
  }
}

/** Structural equality. Functions compare by parameters and block contents. */
export function valuesEqual(a: Value, b: Value): boolean {
  if (a.tag !== b.tag) return false;
  switch (a.tag) {
    case "Null":
    case "True":
      return true;
    case "Int":
      return b.tag === "Int" && a.n === b.n;
    case "Float":
      return b.tag === "Float" && a.f === b.f;
    case "Str":
      return b.tag === "Str" && a.s === b.s;
    case "Ptr":
      return b.tag === "Ptr" && addressEquals(a.addr, b.addr);
    case "List":
      return (
        b.tag === "List" &&
        a.items.length === b.items.length &&
        a.items.every((x, i) => valuesEqual(x, b.items[i]))
      );
    case "Data": {
      if (b.tag !== "Data" || !addressEquals(a.type, b.type) || a.fields.size !== b.fields.size) {
        return false;
      }
      for (const [k, v] of a.fields) {
        const other = b.fields.get(k);
        if (!other || !valuesEqual(v, other)) return false;
      }
      return true;
    }
    case "Func":
      return (
        b.tag === "Func" &&
        compareLabelLists(a.params, b.params) === 0 &&
        (a.body === b.body || blockKey(a.body) === blockKey(b.body))
      );
  }
}

/**
 * Canonical text key for a value, usable as a Map key. Equal values share a key.
 */
export function valueKey(v: Value): string {
  switch (v.tag) {
    case "Null":
      return "N";
    case "True":
      return "T";
    case "Int":
      return `I${v.n}`;
    case "Float":
      return `F${v.f}`;
    case "Str":
      return `S${JSON.stringify(v.s)}`;
    case "Ptr":
      return `P${showAddress(v.addr)}`;
    case "List":
      return `L[${v.items.map(valueKey).join(",")}]`;
    case "Data":
      return `D${showAddress(v.type)}{${sortedFields(v.fields)
        .map(([k, x]) => `${k}=${valueKey(x)}`)
        .join(",")}}`;
    case "Func":
      return `U(${v.params.join(",")})[${blockKey(v.body)}]`;
  }
}

// ─────────────────────────────────────────────────────────────────
// Block keys (function bodies compare by their instructions)
// ─────────────────────────────────────────────────────────────────

const blockKeys = new WeakMap<Block, string>();

function lookupKey(l: Lookup): string {
  switch (l.op) {
    case "Result":
      return "R";
    case "Const":
      return `K${valueKey(l.value)}`;
    case "Var":
      return `V${l.name}`;
    case "Deref":
      return `D${l.name}`;
    case "Lookup":
      return `M${showAddress(l.module)}:${l.name}`;
  }
}

function argsKey(args: readonly Expr[]): string {
  return args.map((a) => ` ${exprKey(a)}`).join("");
}

function exprKey(e: Expr): string {
  switch (e.op) {
    case "Take":
      return `(${lookupKey(e.src)})`;
    case "Not":
    case "Size":
      return `(${e.op} ${exprKey(e.arg)})`;
    case "If":
    case "IfNot":
      return `(${e.op} ${exprKey(e.test)} ${exprKey(e.then)} ${exprKey(e.else)})`;
    case "Sys":
      return `(Sys ${showAddress(e.address)}${argsKey(e.args)})`;
    case "Forward":
      return `(Forward ${showAddress(e.address)})`;
    case "Call":
      return `(Call ${showAddress(e.module)} ${lookupKey(e.target)}${argsKey(e.args)})`;
    case "Local":
    case "Goto":
      return `(${e.op} ${lookupKey(e.target)}${argsKey(e.args)})`;
    default:
      return `(${e.op} ${exprKey(e.left)} ${exprKey(e.right)})`;
  }
}

function commandKey(c: Command): string {
  switch (c.op) {
    case "Load":
    case "Push":
    case "Return":
    case "Throw":
      return `${c.op} ${lookupKey(c.src)}`;
    case "Store":
      return `Store ${c.name}`;
    case "Update":
      return `Update ${lookupKey(c.src)} ${c.name}`;
    case "SetJump":
    case "Jump":
      return `${c.op} ${c.label}`;
    case "Peek":
    case "Pop":
    case "ClearForward":
    case "ClearReverse":
      return c.op;
    case "Eval":
      return `Eval ${exprKey(c.expr)}`;
    case "Do":
      return `${c.cond.op} ${lookupKey(c.cond.test)} {${commandKey(c.cond.then)}}`;
  }
}

/** Canonical text of a block's instructions; equal blocks share a key. */
function blockKey(b: Block): string {
  const cached = blockKeys.get(b);
  if (cached !== undefined) return cached;
  const key = b.map(commandKey).join("; ");
  blockKeys.set(b, key);
  return key;
}
