// src/core/vm/rules.ts
// Rule dispatch: match query tokens against module rule patterns and run the actions.

import type { Value } from "../values/values";
import { mkStr } from "../values/values";
import type { Module, Rule } from "../modules/module";
import { matchPattern } from "../modules/module";
import type { VMState } from "./state";
import { nextTraceId } from "./state";
import { type VMSignal, isError, isReturn } from "./signal";
import { runFrom } from "./run";

/**
 * Run one rule action with the unmatched tokens on the stack, arranged so that
 * successive pops yield them head to tail. The caller's stack comes back afterwards.
 */
export function runRule(vm: VMState, r: Rule, remainder: readonly string[]): Value {
  const saved = vm.stack;
  vm.stack = remainder.map(mkStr).reverse();
  try {
    return runFrom(vm, r.action);
  } catch (e) {
    if (!isReturn(e)) throw e;
    vm.lastResult = e.value;
    return e.value;
  } finally {
    vm.stack = saved;
  }
}

/**
 * Make `mod` current and run every rule whose pattern prefixes `tokens`, in declaration
 * order. Returns how many rules matched.
 */
export function evalRulesInModule(vm: VMState, mod: Module, tokens: readonly string[]): number {
  vm.currentModule = mod;
  let matched = 0;
  for (const r of mod.rules) {
    const remainder = matchPattern(r.pattern, tokens);
    if (remainder === undefined) continue;
    matched += 1;
    vm.trace?.emit({
      tag: "E_RuleMatch",
      id: nextTraceId(vm, "rule"),
      pattern: r.pattern.join(" "),
      remainder: remainder.length,
    });
    runRule(vm, r, remainder);
  }
  return matched;
}

/**
 * Dispatch a query to each module in turn. An Error in one module ends that module's
 * dispatch only; the remaining modules still run, and the first Error is raised once
 * they have. Returns the total number of matched rules.
 */
export function evalQuery(vm: VMState, tokens: readonly string[], modules: readonly Module[]): number {
  let matched = 0;
  let firstError: VMSignal | undefined;
  for (const mod of modules) {
    try {
      matched += evalRulesInModule(vm, mod, tokens);
    } catch (e) {
      if (!isError(e)) throw e;
      if (!firstError) firstError = e;
    }
  }
  if (firstError) throw firstError;
  return matched;
}
