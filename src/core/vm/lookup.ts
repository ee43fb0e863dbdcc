// src/core/vm/lookup.ts
// Resolving Lookups against registers, the current module and loaded modules.

import type { Address } from "../naming/address";
import { showAddress } from "../naming/address";
import type { Value } from "../values/values";
import { mkStr } from "../values/values";
import type { Lookup } from "../program/instructions";
import type { LoadedModule } from "../modules/module";
import type { VMState } from "./state";
import { vmError } from "./errors";

export function lookupModule(vm: VMState, addr: Address): LoadedModule {
  const mod = vm.loadedModules.get(addr);
  if (!mod) {
    throw vmError("UndefinedModule", "no module is loaded at this address", {
      address: mkStr(showAddress(addr)),
    });
  }
  return mod;
}

export function evalLookup(vm: VMState, l: Lookup): Value {
  switch (l.op) {
    case "Result":
      return vm.lastResult;

    case "Const":
      return l.value;

    case "Var": {
      const v = vm.registers.get(l.name);
      if (v === undefined) {
        throw vmError("UndefinedVariable", "variable is not defined in the current frame", {
          variableName: mkStr(l.name),
        });
      }
      return v;
    }

    case "Deref": {
      // No current module falls through to UndefinedModuleVariable.
      const mod = vm.currentModule;
      const v = mod?.privateDefs.get(l.name) ?? mod?.publicDefs.get(l.name);
      if (v === undefined) {
        throw vmError("UndefinedModuleVariable", "variable is not defined in the current module", {
          variableName: mkStr(l.name),
        });
      }
      return v;
    }

    case "Lookup": {
      const { module } = lookupModule(vm, l.module);
      const v = module.publicDefs.get(l.name);
      if (v === undefined) {
        throw vmError("UndefinedModuleVariable", "module does not export this variable", {
          inModule: mkStr(showAddress(l.module)),
          variableName: mkStr(l.name),
        });
      }
      return v;
    }
  }
}
