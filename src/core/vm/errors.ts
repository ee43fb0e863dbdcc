// src/core/vm/errors.ts
// VM error values. Every error is a Data value tagged with its kind and carrying a `problem`.

import type { Label } from "../naming/label";
import { label } from "../naming/label";
import type { Value } from "../values/values";
import { mkData, mkStr } from "../values/values";
import { type VMSignal, errorSignal } from "./signal";

export type ErrorKind =
  | "UndefinedVariable"
  | "UndefinedModuleVariable"
  | "UndefinedModule"
  | "UndefinedSystemCall"
  | "UndefinedJumpTarget"
  | "StackUnderflow"
  | "NotEnoughArguments"
  | "NoCurrentModule"
  | "BadInstruction"
  | "ModuleAlreadyActive"
  | "SystemCall"
  | "StepLimitExceeded"
  | "CallDepthExceeded";

const ERROR_KINDS: ReadonlySet<string> = new Set<ErrorKind>([
  "UndefinedVariable",
  "UndefinedModuleVariable",
  "UndefinedModule",
  "UndefinedSystemCall",
  "UndefinedJumpTarget",
  "StackUnderflow",
  "NotEnoughArguments",
  "NoCurrentModule",
  "BadInstruction",
  "ModuleAlreadyActive",
  "SystemCall",
  "StepLimitExceeded",
  "CallDepthExceeded",
]);

function isErrorKind(s: string): s is ErrorKind {
  return ERROR_KINDS.has(s);
}

export type ErrorFields = Record<string, Value>;

export function errorValue(kind: ErrorKind, problem: string, fields: ErrorFields = {}): Value {
  const entries: Array<[Label, Value]> = [[label("problem"), mkStr(problem)]];
  for (const [k, v] of Object.entries(fields)) entries.push([label(k), v]);
  return mkData([label(kind)], entries);
}

export function vmError(kind: ErrorKind, problem: string, fields: ErrorFields = {}): VMSignal {
  return errorSignal(errorValue(kind, problem, fields));
}

/** The kind of a VM error value, or undefined for user-thrown values. */
export function errorKindOf(v: Value): ErrorKind | undefined {
  if (v.tag !== "Data" || v.type.length !== 1) return undefined;
  const tag = v.type[0];
  return isErrorKind(tag) ? tag : undefined;
}

export function errorField(v: Value, field: string): Value | undefined {
  if (v.tag !== "Data") return undefined;
  for (const [k, x] of v.fields) {
    if (k === field) return x;
  }
  return undefined;
}

export function errorProblem(v: Value): string | undefined {
  const p = errorField(v, "problem");
  return p?.tag === "Str" ? p.s : undefined;
}
