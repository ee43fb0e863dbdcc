// src/core/program/instructions.ts
// Instruction set: lookups, commands, conditions and expressions, plus builders.
//
// Programs are data. Host code assembles them with the builders below; there is no
// source-text syntax.

import type { Label } from "../naming/label";
import type { Address } from "../naming/address";
import type { Value } from "../values/values";

// ─────────────────────────────────────────────────────────────────
// Instruction shapes
// ─────────────────────────────────────────────────────────────────

/** Where a value comes from. */
export type Lookup =
  | { op: "Result" }
  | { op: "Const"; value: Value }
  | { op: "Var"; name: Label }
  | { op: "Deref"; name: Label }
  | { op: "Lookup"; module: Address; name: Label };

export type Command =
  | { op: "Load"; src: Lookup }
  | { op: "Store"; name: Label }
  | { op: "Update"; src: Lookup; name: Label }
  | { op: "SetJump"; label: Label }
  | { op: "Jump"; label: Label }
  | { op: "Push"; src: Lookup }
  | { op: "Peek" }
  | { op: "Pop" }
  | { op: "ClearForward" }
  | { op: "ClearReverse" }
  | { op: "Eval"; expr: Expr }
  | { op: "Do"; cond: Condition }
  | { op: "Return"; src: Lookup }
  | { op: "Throw"; src: Lookup };

export type Condition =
  | { op: "When"; test: Lookup; then: Command }
  | { op: "Unless"; test: Lookup; then: Command };

export type ArithOp = "Add" | "Sub" | "Mul" | "Div" | "Mod";
export type CompareOp = "Gt" | "Ge" | "Lt" | "Le";
export type EqualityOp = "Eq" | "Ne";
export type BitwiseOp = "And" | "Or" | "Xor" | "ShiftR" | "ShiftL";
export type BinaryOp = ArithOp | CompareOp | EqualityOp | BitwiseOp | "Append" | "Index";
export type UnaryOp = "Not" | "Size";

export type Expr =
  | { op: "Take"; src: Lookup }
  | { op: UnaryOp; arg: Expr }
  | { op: BinaryOp; left: Expr; right: Expr }
  | { op: "If" | "IfNot"; test: Expr; then: Expr; else: Expr }
  | { op: "Sys"; address: Address; args: readonly Expr[] }
  | { op: "Forward"; address: Address }
  | { op: "Call"; module: Address; target: Lookup; args: readonly Expr[] }
  | { op: "Local"; target: Lookup; args: readonly Expr[] }
  | { op: "Goto"; target: Lookup; args: readonly Expr[] };

/** An immutable, indexable sequence of commands. */
export type Block = readonly Command[];

export function block(...commands: Command[]): Block {
  return Object.freeze(commands);
}

export const emptyBlock: Block = block();

// ─────────────────────────────────────────────────────────────────
// Builders
// ─────────────────────────────────────────────────────────────────

export const L = {
  result: (): Lookup => ({ op: "Result" }),
  konst: (value: Value): Lookup => ({ op: "Const", value }),
  v: (name: Label): Lookup => ({ op: "Var", name }),
  deref: (name: Label): Lookup => ({ op: "Deref", name }),
  lookup: (module: Address, name: Label): Lookup => ({ op: "Lookup", module, name }),
};

export const C = {
  load: (src: Lookup): Command => ({ op: "Load", src }),
  store: (name: Label): Command => ({ op: "Store", name }),
  update: (src: Lookup, name: Label): Command => ({ op: "Update", src, name }),
  setJump: (label: Label): Command => ({ op: "SetJump", label }),
  jump: (label: Label): Command => ({ op: "Jump", label }),
  push: (src: Lookup): Command => ({ op: "Push", src }),
  peek: (): Command => ({ op: "Peek" }),
  pop: (): Command => ({ op: "Pop" }),
  clearForward: (): Command => ({ op: "ClearForward" }),
  clearReverse: (): Command => ({ op: "ClearReverse" }),
  eval: (expr: Expr): Command => ({ op: "Eval", expr }),
  when: (test: Lookup, then: Command): Command => ({ op: "Do", cond: { op: "When", test, then } }),
  unless: (test: Lookup, then: Command): Command => ({ op: "Do", cond: { op: "Unless", test, then } }),
  ret: (src: Lookup): Command => ({ op: "Return", src }),
  throw: (src: Lookup): Command => ({ op: "Throw", src }),
};

export const E = {
  take: (src: Lookup): Expr => ({ op: "Take", src }),
  unary: (op: UnaryOp, arg: Expr): Expr => ({ op, arg }),
  binary: (op: BinaryOp, left: Expr, right: Expr): Expr => ({ op, left, right }),
  not: (arg: Expr): Expr => ({ op: "Not", arg }),
  size: (arg: Expr): Expr => ({ op: "Size", arg }),
  if: (test: Expr, then: Expr, otherwise: Expr): Expr => ({ op: "If", test, then, else: otherwise }),
  ifNot: (test: Expr, then: Expr, otherwise: Expr): Expr => ({ op: "IfNot", test, then, else: otherwise }),
  sys: (address: Address, ...args: Expr[]): Expr => ({ op: "Sys", address, args }),
  forward: (address: Address): Expr => ({ op: "Forward", address }),
  call: (module: Address, target: Lookup, ...args: Expr[]): Expr => ({ op: "Call", module, target, args }),
  local: (target: Lookup, ...args: Expr[]): Expr => ({ op: "Local", target, args }),
  goto: (target: Lookup, ...args: Expr[]): Expr => ({ op: "Goto", target, args }),
};
