// src/core/vm/calls.ts
// Call protocol: local and cross-module calls, gotos, and system calls.

import type { Label } from "../naming/label";
import type { Address } from "../naming/address";
import { showAddress } from "../naming/address";
import type { Value } from "../values/values";
import { mkInt, mkStr } from "../values/values";
import type { Expr, Lookup } from "../program/instructions";
import { showLookup } from "../program/format";
import type { SystemCall } from "../modules/module";
import type { VMState } from "./state";
import { enterBlock, nextTraceId, restoreFrame, saveFrame } from "./state";
import { vmError } from "./errors";
import { isError, isReturn } from "./signal";
import { evalLookup, lookupModule } from "./lookup";
import { evalArgs } from "./expressions";
import { runBlock } from "./run";

/** How a call ended: via Return (caller frame restored) or by running off its block. */
export type CallResult =
  | { tag: "Returned"; value: Value }
  | { tag: "FellThrough"; value: Value };

// ─────────────────────────────────────────────────────────────────
// Argument binding
// ─────────────────────────────────────────────────────────────────

type Binding = { registers: Map<Label, Value>; rest: Value[] };

/**
 * Pair parameters with `values` from the front. Unconsumed values are returned as the
 * callee's stack, first value at the bottom.
 */
export function bindArguments(params: readonly Label[], values: readonly Value[]): Binding {
  if (values.length < params.length) {
    throw vmError("NotEnoughArguments", "function called with fewer arguments than parameters", {
      expected: mkInt(params.length),
      actual: mkInt(values.length),
    });
  }
  const registers = new Map<Label, Value>();
  params.forEach((p, i) => registers.set(p, values[i]));
  return { registers, rest: values.slice(params.length) };
}

function notAFunction(target: string, value: Value): never {
  throw vmError("BadInstruction", "call target is not a function", {
    target: mkStr(target),
    value,
  });
}

// ─────────────────────────────────────────────────────────────────
// Function invocation
// ─────────────────────────────────────────────────────────────────

/**
 * Invoke a Func value. The callee sees the caller's stack followed by `args` as its
 * argument list. A Return inside the callee restores the caller's frame; running off
 * the end of the callee's block does not.
 */
export function invokeFunc(vm: VMState, fn: Value, args: readonly Value[], target = "<value>"): CallResult {
  if (fn.tag !== "Func") notAFunction(target, fn);
  if (fn.body.length === 0) {
    return { tag: "Returned", value: vm.lastResult };
  }
  if (vm.callDepth >= vm.config.maxCallDepth) {
    throw vmError("CallDepthExceeded", "maximum call depth reached", {
      limit: mkInt(vm.config.maxCallDepth),
    });
  }

  const { registers, rest } = bindArguments(fn.params, [...vm.stack, ...args]);
  const saved = saveFrame(vm);
  vm.registers = registers;
  vm.stack = rest;
  enterBlock(vm, fn.body);

  vm.callDepth += 1;
  try {
    return { tag: "FellThrough", value: runBlock(vm) };
  } catch (e) {
    if (isReturn(e)) {
      restoreFrame(vm, saved);
      return { tag: "Returned", value: e.value };
    }
    throw e;
  } finally {
    vm.callDepth -= 1;
  }
}

/** Same-module call. The result is pushed onto whatever stack is current afterwards. */
export function callLocal(vm: VMState, target: Lookup, argExprs: readonly Expr[]): Value {
  const fn = evalLookup(vm, target);
  const args = evalArgs(vm, argExprs);
  const id = vm.trace ? nextTraceId(vm, "call") : "";
  const result = traced(vm, () => invokeFunc(vm, fn, args, showLookup(target)), (outcome) => {
    vm.trace?.emit({ tag: "E_Call", id, params: paramCount(fn), argc: args.length, outcome });
  });
  vm.stack.push(result.value);
  return result.value;
}

/**
 * Cross-module call. The target module becomes current for the duration of the call,
 * and the caller's module comes back only if the callee ended with Return.
 */
export function callModule(vm: VMState, module: Address, target: Lookup, argExprs: readonly Expr[]): Value {
  const loaded = lookupModule(vm, module);
  const args = evalArgs(vm, argExprs);
  const callerModule = vm.currentModule;
  vm.currentModule = loaded.module;
  const fn = evalLookup(vm, target);
  const id = vm.trace ? nextTraceId(vm, "call") : "";
  const result = traced(vm, () => invokeFunc(vm, fn, args, `${showAddress(module)}: ${showLookup(target)}`), (outcome) => {
    vm.trace?.emit({ tag: "E_Call", id, module: showAddress(module), params: paramCount(fn), argc: args.length, outcome });
  });
  if (result.tag === "Returned") {
    vm.currentModule = callerModule;
  }
  return result.value;
}

/**
 * Tail transfer: discard the current frame and continue in the target function's block.
 */
export function gotoFunction(vm: VMState, target: Lookup, argExprs: readonly Expr[]): Value {
  const fn = evalLookup(vm, target);
  const args = evalArgs(vm, argExprs);
  if (fn.tag !== "Func") notAFunction(showLookup(target), fn);
  if (fn.body.length === 0) return vm.lastResult;

  const { registers, rest } = bindArguments(fn.params, args);
  vm.registers = registers;
  vm.stack = rest;
  enterBlock(vm, fn.body);
  vm.trace?.emit({ tag: "E_Goto", id: nextTraceId(vm, "goto"), params: fn.params.length, argc: args.length });
  return vm.lastResult;
}

function paramCount(fn: Value): number {
  return fn.tag === "Func" ? fn.params.length : 0;
}

function traced(
  vm: VMState,
  run: () => CallResult,
  report: (outcome: "return" | "fallthrough" | "error") => void
): CallResult {
  if (!vm.trace) return run();
  try {
    const result = run();
    report(result.tag === "Returned" ? "return" : "fallthrough");
    return result;
  } catch (e) {
    report("error");
    throw e;
  }
}

// ─────────────────────────────────────────────────────────────────
// System calls
// ─────────────────────────────────────────────────────────────────

export function resolveSystemCall(vm: VMState, address: Address): SystemCall {
  const fn = vm.systemCalls.get(address);
  if (!fn) {
    throw vmError("UndefinedSystemCall", "no system call is installed at this address", {
      address: mkStr(showAddress(address)),
    });
  }
  return fn;
}

/**
 * Run the native `fn` installed at `address` with `args` as its stack (first argument
 * at the bottom). The caller's stack is restored however the native exits.
 */
export function systemCall(vm: VMState, address: Address, fn: SystemCall, args: readonly Value[]): Value {
  const start = Date.now();
  const saved = vm.stack;
  vm.stack = [...args];
  let outcome: "return" | "error" = "error";
  try {
    const value = runNative(vm, fn, address);
    outcome = "return";
    vm.lastResult = value;
    return value;
  } finally {
    vm.stack = saved;
    vm.trace?.emit({
      tag: "E_SystemCall",
      id: nextTraceId(vm, "syscall"),
      address: showAddress(address),
      argc: args.length,
      outcome,
      durationMs: Date.now() - start,
    });
  }
}

function runNative(vm: VMState, fn: SystemCall, address: Address): Value {
  try {
    return fn(vm);
  } catch (e) {
    if (isReturn(e)) return e.value;
    const at = mkStr(showAddress(address));
    if (isError(e)) {
      throw vmError("SystemCall", "system call raised an error", { address: at, exception: e.value });
    }
    const message = e instanceof Error ? e.message : String(e);
    throw vmError("SystemCall", message, { address: at, exception: mkStr(message) });
  }
}
