// src/core/vm/natives.ts
// Helpers for system-call authors.

import type { Value } from "../values/values";
import { mkStr } from "../values/values";
import type { VMState } from "./state";
import { restoreFrame, saveFrame } from "./state";
import { vmError } from "./errors";
import { invokeFunc } from "./calls";

/** The native's arguments in call order (bottom of the stack first). */
export function stackArguments(vm: VMState): Value[] {
  return [...vm.stack];
}

/** Pop the top of the stack, i.e. the last remaining argument. */
export function popArgument(vm: VMState, what = "argument"): Value {
  const v = vm.stack.pop();
  if (v === undefined) {
    throw vmError("StackUnderflow", `missing ${what}`, { instruction: mkStr("native") });
  }
  return v;
}

/**
 * Call a Func value from native code with exactly `args` and return its result. The
 * native's frame is put back whether the callee returned or ran off its block.
 */
export function callFunction(vm: VMState, fn: Value, args: readonly Value[]): Value {
  const saved = saveFrame(vm);
  vm.stack = [];
  try {
    return invokeFunc(vm, fn, args).value;
  } finally {
    restoreFrame(vm, saved);
  }
}
