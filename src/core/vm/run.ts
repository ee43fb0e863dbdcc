// src/core/vm/run.ts
// The interpreter loop and command execution.

import type { Value } from "../values/values";
import { mkInt, mkList, mkStr, isTruthy } from "../values/values";
import type { Block, Command, Condition } from "../program/instructions";
import { showCommand } from "../program/format";
import type { VMState } from "./state";
import { enterBlock } from "./state";
import { vmError } from "./errors";
import { errorSignal, isReturn, returnSignal } from "./signal";
import { evalLookup } from "./lookup";
import { evalExpr } from "./expressions";

// ─────────────────────────────────────────────────────────────────
// Step accounting
// ─────────────────────────────────────────────────────────────────

/** Start a fresh step budget for one host operation. */
export function resetStepBudget(vm: VMState): void {
  const max = vm.config.maxEvalSteps;
  vm.stepBudgetEnd = max > 0 ? vm.evalCounter + max : Number.POSITIVE_INFINITY;
}

export function tick(vm: VMState): void {
  vm.evalCounter += 1;
  if (vm.evalCounter > vm.stepBudgetEnd) {
    throw vmError("StepLimitExceeded", "evaluation step limit reached", {
      limit: mkInt(vm.config.maxEvalSteps),
    });
  }
}

// ─────────────────────────────────────────────────────────────────
// Block loop
// ─────────────────────────────────────────────────────────────────

/**
 * Run the current block until the program counter leaves it, then yield `lastResult`.
 * Bounds are re-read every iteration: a goto or an unrestored call may swap the block.
 */
export function runBlock(vm: VMState): Value {
  for (;;) {
    const block = vm.currentBlock;
    const pc = vm.programCounter;
    if (block === undefined || pc < 0 || pc >= block.length) {
      return vm.lastResult;
    }
    execCommand(vm, block[pc]);
  }
}

/** Enter `block` at its first instruction and run it. */
export function runFrom(vm: VMState, block: Block): Value {
  enterBlock(vm, block);
  return runBlock(vm);
}

/** Host boundary: a Return escaping `run` ends evaluation with the returned value. */
export function atTopLevel(vm: VMState, run: () => Value): Value {
  try {
    return run();
  } catch (e) {
    if (!isReturn(e)) throw e;
    vm.lastResult = e.value;
    return e.value;
  }
}

/** Execute one command: count the step, advance the program counter, then act. */
export function execCommand(vm: VMState, cmd: Command): void {
  tick(vm);
  vm.programCounter += 1;
  performCommand(vm, cmd);
}

function underflow(cmd: Command): never {
  throw vmError("StackUnderflow", "the stack is empty", { instruction: mkStr(showCommand(cmd)) });
}

function performCommand(vm: VMState, cmd: Command): void {
  switch (cmd.op) {
    case "Load":
      vm.lastResult = evalLookup(vm, cmd.src);
      return;

    case "Store":
      vm.registers.set(cmd.name, vm.lastResult);
      return;

    case "Update": {
      const mod = vm.currentModule;
      if (!mod) {
        throw vmError("NoCurrentModule", "update with no current module", {
          variableName: mkStr(cmd.name),
        });
      }
      const old = mod.privateDefs.get(cmd.name);
      if (old === undefined) {
        throw vmError("UndefinedVariable", "update of a private variable that does not exist", {
          variableName: mkStr(cmd.name),
        });
      }
      mod.privateDefs.set(cmd.name, evalLookup(vm, cmd.src));
      vm.lastResult = old;
      return;
    }

    case "SetJump":
      return;

    case "Jump": {
      const target = vm.jumpTable.get(cmd.label);
      const size = vm.currentBlock?.length ?? 0;
      if (target === undefined || target < 0 || target >= size) {
        throw vmError("UndefinedJumpTarget", "no such jump label in the current block", {
          label: mkStr(cmd.label),
        });
      }
      vm.programCounter = target;
      return;
    }

    case "Push":
      vm.stack.push(evalLookup(vm, cmd.src));
      return;

    case "Peek": {
      const top = vm.stack[vm.stack.length - 1];
      if (top === undefined) underflow(cmd);
      vm.lastResult = top;
      return;
    }

    case "Pop": {
      const top = vm.stack.pop();
      if (top === undefined) underflow(cmd);
      vm.lastResult = top;
      return;
    }

    case "ClearForward":
      vm.lastResult = mkList(vm.stack);
      vm.stack = [];
      return;

    case "ClearReverse":
      vm.lastResult = mkList([...vm.stack].reverse());
      vm.stack = [];
      return;

    case "Eval":
      vm.lastResult = evalExpr(vm, cmd.expr);
      return;

    case "Do":
      performCondition(vm, cmd.cond);
      return;

    case "Return":
      throw returnSignal(evalLookup(vm, cmd.src));

    case "Throw":
      throw errorSignal(evalLookup(vm, cmd.src));
  }
}

function performCondition(vm: VMState, cond: Condition): void {
  tick(vm);
  const test = isTruthy(evalLookup(vm, cond.test));
  const fire = cond.op === "When" ? test : !test;
  if (fire) {
    // The guarded command shares the Do's program-counter step.
    performCommand(vm, cond.then);
  }
}
