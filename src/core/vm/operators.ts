// src/core/vm/operators.ts
// Primitive operator semantics. Each function answers undefined for operand shapes it does
// not cover, leaving the caller to delegate or report a bad instruction.

import { isLabel } from "../naming/label";
import type { Value } from "../values/values";
import { VNull, VTrue, mkBool, mkFloat, mkInt, mkList, mkPtr, mkStr, wrapInt } from "../values/values";
import type { ArithOp, BinaryOp, BitwiseOp, CompareOp, EqualityOp, UnaryOp } from "../program/instructions";
import { vmError } from "./errors";

export type PrimitiveBinaryOp = Exclude<BinaryOp, EqualityOp>;

// ─────────────────────────────────────────────────────────────────
// Integer helpers (signed 64-bit)
// ─────────────────────────────────────────────────────────────────

function divisionByZero(): never {
  throw vmError("BadInstruction", "division by zero");
}

/** Floor division. */
export function intDiv(a: bigint, b: bigint): bigint {
  if (b === 0n) divisionByZero();
  let q = a / b;
  if (a % b !== 0n && (a < 0n) !== (b < 0n)) q -= 1n;
  return wrapInt(q);
}

/** Remainder with the sign of the divisor. */
export function intMod(a: bigint, b: bigint): bigint {
  if (b === 0n) divisionByZero();
  let r = a % b;
  if (r !== 0n && (r < 0n) !== (b < 0n)) r += b;
  return wrapInt(r);
}

export function shiftLeft(a: bigint, by: bigint): bigint {
  if (by < 0n) return shiftRight(a, -by);
  if (by >= 64n) return 0n;
  return wrapInt(a << by);
}

/** Arithmetic right shift. */
export function shiftRight(a: bigint, by: bigint): bigint {
  if (by < 0n) return shiftLeft(a, -by);
  if (by >= 64n) return a < 0n ? -1n : 0n;
  return wrapInt(a >> by);
}

function floatMod(a: number, b: number): number {
  return a - b * Math.floor(a / b);
}

// ─────────────────────────────────────────────────────────────────
// Unary
// ─────────────────────────────────────────────────────────────────

export function applyUnary(op: UnaryOp, v: Value): Value | undefined {
  switch (op) {
    case "Not":
      switch (v.tag) {
        case "Null":
          return VTrue;
        case "True":
          return VNull;
        case "Int":
          return mkInt(~v.n);
        default:
          return undefined;
      }
    case "Size":
      switch (v.tag) {
        case "Null":
        case "True":
          return v;
        case "Int":
          return mkInt(v.n < 0n ? -v.n : v.n);
        case "Float":
          return mkFloat(Math.abs(v.f));
        case "Str":
          return mkInt([...v.s].length);
        case "List":
          return mkInt(v.items.length);
        default:
          return undefined;
      }
  }
}

// ─────────────────────────────────────────────────────────────────
// Binary
// ─────────────────────────────────────────────────────────────────

function arith(op: ArithOp, a: Value, b: Value): Value | undefined {
  if (a.tag === "Int" && b.tag === "Int") {
    switch (op) {
      case "Add":
        return mkInt(a.n + b.n);
      case "Sub":
        return mkInt(a.n - b.n);
      case "Mul":
        return mkInt(a.n * b.n);
      case "Div":
        return mkInt(intDiv(a.n, b.n));
      case "Mod":
        return mkInt(intMod(a.n, b.n));
    }
  }
  if (a.tag === "Float" && b.tag === "Float") {
    switch (op) {
      case "Add":
        return mkFloat(a.f + b.f);
      case "Sub":
        return mkFloat(a.f - b.f);
      case "Mul":
        return mkFloat(a.f * b.f);
      case "Div":
        return mkFloat(a.f / b.f);
      case "Mod":
        return mkFloat(floatMod(a.f, b.f));
    }
  }
  return undefined;
}

function relate(op: CompareOp, lt: boolean, eq: boolean, gt: boolean): Value {
  switch (op) {
    case "Gt":
      return mkBool(gt);
    case "Ge":
      return mkBool(gt || eq);
    case "Lt":
      return mkBool(lt);
    case "Le":
      return mkBool(lt || eq);
  }
}

function compare(op: CompareOp, a: Value, b: Value): Value | undefined {
  if (a.tag === "Int" && b.tag === "Int") return relate(op, a.n < b.n, a.n === b.n, a.n > b.n);
  if (a.tag === "Float" && b.tag === "Float") return relate(op, a.f < b.f, a.f === b.f, a.f > b.f);
  return undefined;
}

function bitwise(op: BitwiseOp, a: Value, b: Value): Value | undefined {
  if (a.tag !== "Int" || b.tag !== "Int") return undefined;
  switch (op) {
    case "And":
      return mkInt(a.n & b.n);
    case "Or":
      return mkInt(a.n | b.n);
    case "Xor":
      return mkInt(a.n ^ b.n);
    case "ShiftL":
      return mkInt(shiftLeft(a.n, b.n));
    case "ShiftR":
      return mkInt(shiftRight(a.n, b.n));
  }
}

function append(a: Value, b: Value): Value | undefined {
  if (a.tag === "Str" && b.tag === "Str") return mkStr(a.s + b.s);
  if (a.tag === "List" && b.tag === "List") return mkList([...a.items, ...b.items]);
  return undefined;
}

function index(a: Value, b: Value): Value | undefined {
  if (a.tag === "Int" && b.tag === "List") {
    const i = a.n;
    return i >= 0n && i < BigInt(b.items.length) ? b.items[Number(i)] : VNull;
  }
  if (a.tag === "Str" && b.tag === "Data") {
    return isLabel(a.s) ? b.fields.get(a.s) ?? VNull : VNull;
  }
  if (a.tag === "True" && b.tag === "Data") {
    return mkPtr(b.type);
  }
  return undefined;
}

export function applyBinary(op: PrimitiveBinaryOp, a: Value, b: Value): Value | undefined {
  switch (op) {
    case "Add":
    case "Sub":
    case "Mul":
    case "Div":
    case "Mod":
      return arith(op, a, b);
    case "Gt":
    case "Ge":
    case "Lt":
    case "Le":
      return compare(op, a, b);
    case "And":
    case "Or":
    case "Xor":
    case "ShiftR":
    case "ShiftL":
      return bitwise(op, a, b);
    case "Append":
      return append(a, b);
    case "Index":
      return index(a, b);
  }
}
