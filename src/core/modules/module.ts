// src/core/modules/module.ts
// Modules: named bundles of private state, public definitions and token-pattern rules.

import type { Label } from "../naming/label";
import { parseLabel } from "../naming/label";
import type { Address } from "../naming/address";
import type { Value } from "../values/values";
import type { Block, Expr } from "../program/instructions";
import type { VMState } from "../vm/state";

/** A token pattern and the block to run when it prefixes a query. */
export type Rule = {
  readonly pattern: readonly string[];
  readonly action: Block;
};

export type Module = {
  readonly imports: readonly Address[];
  /** Internal state; written only by the Update instruction. */
  readonly privateDefs: Map<Label, Value>;
  readonly publicDefs: Map<Label, Value>;
  readonly rules: readonly Rule[];
};

/**
 * A native function installed at an Address. It reads its arguments from `vm.stack`
 * and delivers its result either by returning it or by raising a Return signal.
 */
export type SystemCall = (vm: VMState) => Value;

/**
 * Overloads operators for Data values whose type Address names a builtin module.
 * Receives the expression and its evaluated operands.
 */
export type OperatorEvaluator = (expr: Expr, operands: readonly Value[], vm: VMState) => Value;

export type LoadedModule =
  | { readonly kind: "Plain"; readonly module: Module }
  | { readonly kind: "Builtin"; readonly module: Module; readonly evaluator?: OperatorEvaluator };

export type Definitions = Iterable<readonly [Label, Value]> | Readonly<Record<string, Value>>;

function isIterableDefs(defs: Definitions): defs is Iterable<readonly [Label, Value]> {
  return Symbol.iterator in defs;
}

export function definitions(defs: Definitions | undefined): Map<Label, Value> {
  if (defs === undefined) return new Map();
  if (isIterableDefs(defs)) return new Map(defs);
  return new Map(Object.entries(defs).map(([k, v]) => [parseLabel(k), v] as const));
}

export function createModule(parts: {
  imports?: readonly Address[];
  privateDefs?: Definitions;
  publicDefs?: Definitions;
  rules?: readonly Rule[];
} = {}): Module {
  return {
    imports: [...(parts.imports ?? [])],
    privateDefs: definitions(parts.privateDefs),
    publicDefs: definitions(parts.publicDefs),
    rules: [...(parts.rules ?? [])],
  };
}

export function plainModule(module: Module): LoadedModule {
  return { kind: "Plain", module };
}

export function rule(pattern: string | readonly string[], action: Block): Rule {
  return { pattern: typeof pattern === "string" ? tokenize(pattern) : [...pattern], action };
}

/** Whitespace tokenizer used for rule patterns and host queries. */
export function tokenize(text: string): string[] {
  return text.split(/\s+/).filter((t) => t.length > 0);
}

/** Remainder of `tokens` after `pattern`, or undefined when `pattern` is not a prefix. */
export function matchPattern(pattern: readonly string[], tokens: readonly string[]): string[] | undefined {
  if (pattern.length > tokens.length) return undefined;
  for (let i = 0; i < pattern.length; i++) {
    if (pattern[i] !== tokens[i]) return undefined;
  }
  return tokens.slice(pattern.length);
}
