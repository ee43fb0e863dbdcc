// src/core/program/format.ts
// Display forms for instructions; used in error records and state dumps.

import { showAddress } from "../naming/address";
import { showValue } from "../values/format";
import type { Command, Expr, Lookup } from "./instructions";

export function showLookup(l: Lookup): string {
  switch (l.op) {
    case "Result":
      return "RESULT";
    case "Const":
      return `CONST ${showValue(l.value)}`;
    case "Var":
      return `VAR ${l.name}`;
    case "Deref":
      return `DEREF ${l.name}`;
    case "Lookup":
      return `LOOKUP ${showAddress(l.module)} ${l.name}`;
  }
}

function showArgs(args: readonly Expr[]): string {
  return `(${args.map(showExpr).join(", ")})`;
}

export function showExpr(e: Expr): string {
  switch (e.op) {
    case "Take":
      return showLookup(e.src);
    case "Not":
    case "Size":
      return `${e.op.toUpperCase()} (${showExpr(e.arg)})`;
    case "If":
    case "IfNot":
      return `${e.op.toUpperCase()} (${showExpr(e.test)}) (${showExpr(e.then)}) (${showExpr(e.else)})`;
    case "Sys":
      return `SYS ${showAddress(e.address)}${showArgs(e.args)}`;
    case "Forward":
      return `FORWARD ${showAddress(e.address)}`;
    case "Call":
      return `CALL ${showAddress(e.module)} (${showLookup(e.target)})${showArgs(e.args)}`;
    case "Local":
      return `LOCAL (${showLookup(e.target)})${showArgs(e.args)}`;
    case "Goto":
      return `GOTO (${showLookup(e.target)})${showArgs(e.args)}`;
    default:
      return `${e.op.toUpperCase()} (${showExpr(e.left)}) (${showExpr(e.right)})`;
  }
}

export function showCommand(c: Command): string {
  switch (c.op) {
    case "Load":
      return `LOAD ${showLookup(c.src)}`;
    case "Store":
      return `STORE ${c.name}`;
    case "Update":
      return `UPDATE ${showLookup(c.src)} ${c.name}`;
    case "SetJump":
      return `SETJUMP ${c.label}`;
    case "Jump":
      return `JUMP ${c.label}`;
    case "Push":
      return `PUSH ${showLookup(c.src)}`;
    case "Peek":
      return "PEEK";
    case "Pop":
      return "POP";
    case "ClearForward":
      return "CLRFWD";
    case "ClearReverse":
      return "CLRREV";
    case "Eval":
      return `EVAL ${showExpr(c.expr)}`;
    case "Do":
      return `${c.cond.op.toUpperCase()} (${showLookup(c.cond.test)}) ${showCommand(c.cond.then)}`;
    case "Return":
      return `RETURN ${showLookup(c.src)}`;
    case "Throw":
      return `THROW ${showLookup(c.src)}`;
  }
}
