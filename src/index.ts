// src/index.ts
// rulevm - Public API
//
// Embeddable VM for token-pattern rule modules: programs are instruction blocks built
// in host code, modules bundle state, functions and rules, and natives extend the VM
// through system calls.

// ═══════════════════════════════════════════════════════════════════════════════
// HOST RUNTIME
// ═══════════════════════════════════════════════════════════════════════════════

export { RuleVM, type RuleVMOptions } from "./runtime";

// ═══════════════════════════════════════════════════════════════════════════════
// NAMES
// ═══════════════════════════════════════════════════════════════════════════════

export { type Label, NameParseError, label, parseLabel, tryParseLabel, isLabel } from "./core/naming/label";
export {
  type Address,
  address,
  parseAddress,
  tryParseAddress,
  showAddress,
  appendLabel,
  concatAddress,
  addressEquals,
  compareAddresses,
  isPrefixOf,
} from "./core/naming/address";
export { LabelTrie } from "./core/naming/trie";

// ═══════════════════════════════════════════════════════════════════════════════
// VALUES
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type Value,
  type ValueTag,
  VNull,
  VTrue,
  mkInt,
  mkFloat,
  mkStr,
  mkPtr,
  mkList,
  mkData,
  mkFunc,
  mkBool,
  asBool,
  compareValues,
  valuesEqual,
  valueKey,
} from "./core/values/values";
export { showValue, printValue } from "./core/values/format";
export { type HostValue, fromHost, toHost, intValue, strValue } from "./core/values/convert";

// ═══════════════════════════════════════════════════════════════════════════════
// PROGRAMS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type Lookup,
  type Command,
  type Condition,
  type Expr,
  type Block,
  type BinaryOp,
  type UnaryOp,
  block,
  emptyBlock,
  L,
  C,
  E,
} from "./core/program/instructions";
export { showLookup, showCommand, showExpr } from "./core/program/format";

// ═══════════════════════════════════════════════════════════════════════════════
// MODULES
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type Module,
  type Rule,
  type LoadedModule,
  type SystemCall,
  type OperatorEvaluator,
  createModule,
  rule,
  tokenize,
} from "./core/modules/module";
export {
  type RuntimeDeclaration,
  ModuleBuilder,
  declareModule,
  declareSystemCall,
  combineDeclarations,
} from "./core/modules/declare";
export { basicIO, type OutputStream } from "./core/stdlib/basicIO";

// ═══════════════════════════════════════════════════════════════════════════════
// VM INTERNALS (for system-call authors)
// ═══════════════════════════════════════════════════════════════════════════════

export { type VMState, createVMState } from "./core/vm/state";
export { VMSignal, returnSignal, errorSignal, isReturn, isError } from "./core/vm/signal";
export { type ErrorKind, errorValue, vmError, errorKindOf, errorProblem } from "./core/vm/errors";
export { stackArguments, popArgument, callFunction } from "./core/vm/natives";
export { invokeFunc, type CallResult } from "./core/vm/calls";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES
// ═══════════════════════════════════════════════════════════════════════════════

export { type Outcome, type Done, type Fail, isDone, isFail } from "./outcome/outcome";
export { type Failure, type FailureReason } from "./outcome/failure";
export { type Diagnostic } from "./outcome/diagnostic";
export { match, mapOutcome, unwrap, unwrapOr } from "./outcome/matchers";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG, LOGGING, TRACING
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
export { type Logger, makeLogger } from "./adapters/logger";
export { loggingTraceSink } from "./adapters/logging";
export { type TraceEvent, type TraceSink, memoryTraceSink, compositeTraceSink } from "./ports/types";
