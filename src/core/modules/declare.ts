// src/core/modules/declare.ts
// Declaring builtin modules and bare system calls, and installing them into a VM.

import type { Label } from "../naming/label";
import { parseLabel } from "../naming/label";
import type { Address } from "../naming/address";
import { appendLabel, parseAddress, showAddress } from "../naming/address";
import type { Value } from "../values/values";
import { mkFunc, mkStr } from "../values/values";
import type { Block } from "../program/instructions";
import { C, E, L, block } from "../program/instructions";
import type { VMState } from "../vm/state";
import { vmError } from "../vm/errors";
import type { OperatorEvaluator, Rule, SystemCall } from "./module";
import { createModule, rule } from "./module";

/** A deferred change to a VM: installs modules and/or system calls when applied. */
export type RuntimeDeclaration = (vm: VMState) => void;

function toAddress(name: string | Address): Address {
  return typeof name === "string" ? parseAddress(name) : name;
}

export class ModuleBuilder {
  readonly methods = new Map<Label, SystemCall>();
  readonly rules: Rule[] = [];
  readonly data = new Map<Label, Value>();

  /** A native method, callable directly as a system call or through the public Func. */
  method(name: string, fn: SystemCall): this {
    this.methods.set(parseLabel(name), fn);
    return this;
  }

  rule(pattern: string | readonly string[], action: Block): this {
    this.rules.push(rule(pattern, action));
    return this;
  }

  /** Private module state, visible to Deref and Update while the module is current. */
  define(name: string, value: Value): this {
    this.data.set(parseLabel(name), value);
    return this;
  }
}

/**
 * The public Func synthesized for a native method: forward the current stack to the
 * system call and return its result.
 */
export function methodWrapper(at: Address): Value {
  return mkFunc([], block(C.eval(E.forward(at)), C.ret(L.result())));
}

export function declareModule(
  name: string | Address,
  build: (m: ModuleBuilder) => void,
  evaluator?: OperatorEvaluator
): RuntimeDeclaration {
  const addr = toAddress(name);
  const builder = new ModuleBuilder();
  build(builder);

  return (vm) => {
    if (vm.loadedModules.has(addr)) {
      throw vmError("ModuleAlreadyActive", "a module is already loaded at this address", {
        address: mkStr(showAddress(addr)),
      });
    }
    const publicDefs = new Map<Label, Value>();
    for (const [method, fn] of builder.methods) {
      const at = appendLabel(addr, method);
      vm.systemCalls.set(at, fn);
      publicDefs.set(method, methodWrapper(at));
    }
    const module = createModule({ privateDefs: builder.data, publicDefs, rules: builder.rules });
    vm.loadedModules.set(addr, { kind: "Builtin", module, evaluator });
  };
}

export function declareSystemCall(name: string | Address, fn: SystemCall): RuntimeDeclaration {
  const addr = toAddress(name);
  return (vm) => {
    vm.systemCalls.set(addr, fn);
  };
}

export function combineDeclarations(...decls: RuntimeDeclaration[]): RuntimeDeclaration {
  return (vm) => {
    for (const d of decls) d(vm);
  };
}
