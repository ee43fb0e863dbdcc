// src/core/vm/state.ts
// The VM state record and the helpers that manipulate frames.

import type { Label } from "../naming/label";
import { LabelTrie } from "../naming/trie";
import type { Value } from "../values/values";
import { VNull } from "../values/values";
import type { Block } from "../program/instructions";
import type { LoadedModule, Module, SystemCall } from "../modules/module";
import type { VMConfig } from "../config/config";
import { DEFAULT_VM_CONFIG } from "../config/config";
import type { TraceSink } from "../../ports/types";

export type VMState = {
  /** Number of evaluation steps taken so far. */
  evalCounter: number;
  lastResult: Value;
  registers: Map<Label, Value>;
  /** Jump targets of the current block, label to instruction index. */
  jumpTable: Map<Label, number>;
  /** Top of stack is the last element. */
  stack: Value[];
  currentModule: Module | undefined;
  currentBlock: Block | undefined;
  programCounter: number;
  systemCalls: LabelTrie<SystemCall>;
  loadedModules: LabelTrie<LoadedModule>;
  callDepth: number;
  /** evalCounter value past which StepLimitExceeded is raised. */
  stepBudgetEnd: number;
  config: VMConfig;
  trace?: TraceSink;
  /** Last correlation id handed out to a trace event. */
  traceSeq: number;
};

export function createVMState(config: Partial<VMConfig> = {}, trace?: TraceSink): VMState {
  const merged: VMConfig = { ...DEFAULT_VM_CONFIG, ...config };
  return {
    evalCounter: 0,
    lastResult: VNull,
    registers: new Map(),
    jumpTable: new Map(),
    stack: [],
    currentModule: undefined,
    currentBlock: undefined,
    programCounter: 0,
    systemCalls: new LabelTrie(),
    loadedModules: new LabelTrie(),
    callDepth: 0,
    stepBudgetEnd: merged.maxEvalSteps > 0 ? merged.maxEvalSteps : Number.POSITIVE_INFINITY,
    config: merged,
    trace,
    traceSeq: 0,
  };
}

/**
 * Correlation id for a trace event, e.g. `syscall:17`. Numbering is per VM.
 */
export function nextTraceId(vm: VMState, kind: string): string {
  vm.traceSeq += 1;
  return `${kind}:${vm.traceSeq}`;
}

/** The parts of the state a function call replaces and a Return restores. */
export type Frame = {
  registers: Map<Label, Value>;
  jumpTable: Map<Label, number>;
  stack: Value[];
  currentBlock: Block | undefined;
  programCounter: number;
};

export function saveFrame(vm: VMState): Frame {
  return {
    registers: vm.registers,
    jumpTable: vm.jumpTable,
    stack: vm.stack,
    currentBlock: vm.currentBlock,
    programCounter: vm.programCounter,
  };
}

export function restoreFrame(vm: VMState, frame: Frame): void {
  vm.registers = frame.registers;
  vm.jumpTable = frame.jumpTable;
  vm.stack = frame.stack;
  vm.currentBlock = frame.currentBlock;
  vm.programCounter = frame.programCounter;
}

/** Index every SetJump label in a block. A later duplicate overrides an earlier one. */
export function buildJumpTable(block: Block): Map<Label, number> {
  const table = new Map<Label, number>();
  block.forEach((cmd, i) => {
    if (cmd.op === "SetJump") table.set(cmd.label, i);
  });
  return table;
}

/** Make `block` current, starting at its first instruction. */
export function enterBlock(vm: VMState, block: Block): void {
  vm.currentBlock = block;
  vm.programCounter = 0;
  vm.jumpTable = buildJumpTable(block);
}
