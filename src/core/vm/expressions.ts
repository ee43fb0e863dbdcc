// src/core/vm/expressions.ts
// Expression evaluation, including operator delegation to builtin modules.

import { showAddress } from "../naming/address";
import type { Value } from "../values/values";
import { asBool, mkBool, mkList, mkStr, valuesEqual } from "../values/values";
import type { Expr } from "../program/instructions";
import { showExpr } from "../program/format";
import type { VMState } from "./state";
import { vmError } from "./errors";
import { evalLookup } from "./lookup";
import { applyBinary, applyUnary } from "./operators";
import { callLocal, callModule, gotoFunction, resolveSystemCall, systemCall } from "./calls";
import { tick } from "./run";

export function evalExpr(vm: VMState, e: Expr): Value {
  tick(vm);
  switch (e.op) {
    case "Take":
      return evalLookup(vm, e.src);

    case "Not":
    case "Size": {
      const v = evalExpr(vm, e.arg);
      return applyUnary(e.op, v) ?? delegateOperator(vm, e, [v]);
    }

    case "Eq":
    case "Ne": {
      const a = evalExpr(vm, e.left);
      const b = evalExpr(vm, e.right);
      const same = valuesEqual(a, b);
      return mkBool(e.op === "Eq" ? same : !same);
    }

    case "If":
    case "IfNot": {
      const test = evalExpr(vm, e.test);
      const b = asBool(test);
      if (b === undefined) {
        throw vmError("BadInstruction", "conditional does not evaluate to a boolean value", {
          instruction: mkStr(showExpr(e)),
          value: test,
        });
      }
      const takeThen = e.op === "If" ? b : !b;
      return evalExpr(vm, takeThen ? e.then : e.else);
    }

    case "Sys": {
      // Resolve before the arguments run.
      const fn = resolveSystemCall(vm, e.address);
      return systemCall(vm, e.address, fn, evalArgs(vm, e.args));
    }

    case "Forward":
      return systemCall(vm, e.address, resolveSystemCall(vm, e.address), [...vm.stack]);

    case "Call":
      return callModule(vm, e.module, e.target, e.args);

    case "Local":
      return callLocal(vm, e.target, e.args);

    case "Goto":
      return gotoFunction(vm, e.target, e.args);

    default: {
      const a = evalExpr(vm, e.left);
      const b = evalExpr(vm, e.right);
      return applyBinary(e.op, a, b) ?? delegateOperator(vm, e, [a, b]);
    }
  }
}

export function evalArgs(vm: VMState, args: readonly Expr[]): Value[] {
  return args.map((a) => evalExpr(vm, a));
}

/**
 * Hand an operator with unsupported primitive operands to the builtin module named by
 * the first Data operand's type.
 */
function delegateOperator(vm: VMState, e: Expr, operands: readonly Value[]): Value {
  const data = operands.find((v) => v.tag === "Data");
  if (data?.tag !== "Data") {
    throw badOperands(e, operands);
  }
  const loaded = vm.loadedModules.get(data.type);
  if (!loaded) {
    throw vmError("UndefinedModule", "no module is loaded for this data type", {
      address: mkStr(showAddress(data.type)),
      instruction: mkStr(showExpr(e)),
    });
  }
  if (loaded.kind !== "Builtin" || !loaded.evaluator) {
    throw vmError("BadInstruction", "data type does not define operators", {
      dataType: mkStr(showAddress(data.type)),
      instruction: mkStr(showExpr(e)),
    });
  }
  return loaded.evaluator(e, operands, vm);
}

function badOperands(e: Expr, operands: readonly Value[]) {
  return vmError("BadInstruction", "operator does not apply to these operands", {
    instruction: mkStr(showExpr(e)),
    operands: mkList(operands),
  });
}
