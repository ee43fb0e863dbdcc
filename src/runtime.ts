// src/runtime.ts
// RuleVM - host API for embedding the VM
//
// Usage:
//   import { RuleVM, basicIO, block, C, E, L, address, mkStr } from "rulevm";
//
//   const vm = new RuleVM({ declarations: [basicIO()] });
//   const out = vm.evaluate(block(C.eval(E.sys(address("print"), E.take(L.konst(mkStr("hi")))))));
//   // prints "hi"; out.tag === "Done"

import type { Address } from "./core/naming/address";
import { parseAddress, showAddress } from "./core/naming/address";
import { NameParseError } from "./core/naming/label";
import type { Value } from "./core/values/values";
import { mkStr } from "./core/values/values";
import { showValue } from "./core/values/format";
import type { Block, Command } from "./core/program/instructions";
import type { Module } from "./core/modules/module";
import { plainModule, tokenize } from "./core/modules/module";
import type { RuntimeDeclaration } from "./core/modules/declare";
import type { VMState } from "./core/vm/state";
import { createVMState } from "./core/vm/state";
import { vmError } from "./core/vm/errors";
import { VMSignal } from "./core/vm/signal";
import { atTopLevel, execCommand, resetStepBudget, runFrom } from "./core/vm/run";
import { evalQuery } from "./core/vm/rules";
import type { PartialConfig, RuleVMConfig } from "./core/config/config";
import { mergeConfigs } from "./core/config/config";
import type { Outcome, OutcomeMeta } from "./outcome/outcome";
import { done, internalError, invalidName, vmFault } from "./outcome/constructors";
import { allDiagnostics } from "./outcome/failure";
import type { Logger } from "./adapters/logger";
import { makeLogger } from "./adapters/logger";
import type { TraceSink } from "./ports/types";

/**
 * Options for RuleVM
 */
export type RuleVMOptions = {
  /** Layered onto the defaults; use loadConfig() to read env and config files first */
  config?: PartialConfig;

  /** Logger (default: pino logger named "rulevm" at config.log.level) */
  logger?: Logger;

  /** Receives system-call, call, goto and rule-match events */
  trace?: TraceSink;

  /** Modules and system calls to install at construction */
  declarations?: RuntimeDeclaration[];
};

type AddressLike = string | Address;

export class RuleVM {
  readonly state: VMState;
  readonly config: RuleVMConfig;
  private readonly log: Logger;

  constructor(options: RuleVMOptions = {}) {
    this.config = mergeConfigs(options.config ?? {});
    this.log = options.logger ?? makeLogger("rulevm", this.config.log.level);
    this.state = createVMState(this.config.vm, options.trace);
    for (const decl of options.declarations ?? []) {
      const out = this.install(decl);
      if (out.tag === "Fail") {
        throw new Error(out.failure.message);
      }
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Module management
  // ─────────────────────────────────────────────────────────────────

  install(...decls: RuntimeDeclaration[]): Outcome<void> {
    return this.guard("install", () => {
      for (const decl of decls) decl(this.state);
      this.log.debug("declarations installed", { count: decls.length });
    });
  }

  /** Load a plain module at `at`. Fails with ModuleAlreadyActive if the address is taken. */
  activateModule(at: AddressLike, module: Module): Outcome<void> {
    return this.guard("activateModule", () => {
      const addr = this.resolve(at);
      if (this.state.loadedModules.has(addr)) {
        throw vmError("ModuleAlreadyActive", "a module is already loaded at this address", {
          address: mkStr(showAddress(addr)),
        });
      }
      this.state.loadedModules.set(addr, plainModule(module));
      this.log.debug("module activated", { address: showAddress(addr) });
    });
  }

  /**
   * Unload the module at `at` and every system call installed under that address.
   * Yields whether a module was loaded there.
   */
  deactivateModule(at: AddressLike): Outcome<boolean> {
    return this.guard("deactivateModule", () => {
      const addr = this.resolve(at);
      const existed = this.state.loadedModules.delete(addr);
      const removedCalls = this.state.systemCalls.deleteBranch(addr);
      this.log.debug("module deactivated", { address: showAddress(addr), existed, removedCalls });
      return existed;
    });
  }

  /** Modules at the given addresses; unparseable or unloaded addresses are logged and skipped. */
  selectModules(addresses: readonly string[]): Module[] {
    const selected: Module[] = [];
    for (const text of addresses) {
      let addr: Address;
      try {
        addr = parseAddress(text);
      } catch (e) {
        if (!(e instanceof NameParseError)) throw e;
        this.log.warn("skipping invalid module address", { code: "W0001", address: text, problem: e.problem });
        continue;
      }
      const loaded = this.state.loadedModules.get(addr);
      if (!loaded) {
        this.log.warn("skipping unknown module", { code: "W0001", address: text });
        continue;
      }
      selected.push(loaded.module);
    }
    return selected;
  }

  selectAllModules(): Module[] {
    return this.state.loadedModules.values().map((m) => m.module);
  }

  // ─────────────────────────────────────────────────────────────────
  // Evaluation
  // ─────────────────────────────────────────────────────────────────

  /**
   * Dispatch a query to `modules` (default: every loaded module). Yields the number of
   * rules that matched.
   */
  query(input: string | readonly string[], modules?: readonly Module[]): Outcome<number> {
    const tokens = typeof input === "string" ? tokenize(input) : input;
    return this.guard("query", () => evalQuery(this.state, tokens, modules ?? this.selectAllModules()));
  }

  /**
   * Run a block from its first instruction. With `module`, that loaded module is current.
   * A Return reaching this level completes the evaluation with its value.
   */
  evaluate(program: Block, options: { module?: AddressLike } = {}): Outcome<Value> {
    return this.guard("evaluate", () => {
      if (options.module !== undefined) {
        const addr = this.resolve(options.module);
        const loaded = this.state.loadedModules.get(addr);
        if (!loaded) {
          throw vmError("UndefinedModule", "no module is loaded at this address", {
            address: mkStr(showAddress(addr)),
          });
        }
        this.state.currentModule = loaded.module;
      }
      return atTopLevel(this.state, () => runFrom(this.state, program));
    });
  }

  /** Execute a single command in the current frame and yield `lastResult`. */
  execute(cmd: Command): Outcome<Value> {
    return this.guard("execute", () => {
      return atTopLevel(this.state, () => {
        execCommand(this.state, cmd);
        return this.state.lastResult;
      });
    });
  }

  // ─────────────────────────────────────────────────────────────────
  // Diagnostics
  // ─────────────────────────────────────────────────────────────────

  listModules(): string[] {
    return this.state.loadedModules.entries().map(([addr, m]) => `${showAddress(addr)} (${m.kind})`);
  }

  listSystemCalls(): string[] {
    return this.state.systemCalls.keys().map(showAddress);
  }

  describeState(): string {
    const s = this.state;
    const registers = [...s.registers.entries()].map(([k, v]) => `  ${k} = ${showValue(v)}`);
    const lines = [
      `evalCounter: ${s.evalCounter}`,
      `lastResult: ${showValue(s.lastResult)}`,
      `programCounter: ${s.programCounter}`,
      `currentBlock: ${s.currentBlock ? `${s.currentBlock.length} instructions` : "none"}`,
      `stack: [${s.stack.map(showValue).join(", ")}]`,
      `registers:${registers.length === 0 ? " none" : ""}`,
      ...registers,
      `modules: ${this.listModules().join(", ") || "none"}`,
      `systemCalls: ${this.listSystemCalls().join(", ") || "none"}`,
    ];
    return lines.join("\n");
  }

  // ─────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────

  private resolve(at: AddressLike): Address {
    return typeof at === "string" ? parseAddress(at) : at;
  }

  /**
   * Run a host operation with a fresh step budget, turning every escape into an Outcome.
   */
  private guard<A>(operation: string, run: () => A): Outcome<A> {
    const start = Date.now();
    const stepsBefore = this.state.evalCounter;
    resetStepBudget(this.state);
    const meta = (): OutcomeMeta => ({
      durationMs: Date.now() - start,
      evalSteps: this.state.evalCounter - stepsBefore,
    });

    try {
      return done(run(), meta());
    } catch (e) {
      const out =
        e instanceof VMSignal && e.kind === "Error"
          ? vmFault(e.value, meta())
          : e instanceof NameParseError
            ? invalidName(e, meta())
            : internalError(e, meta());
      this.log.warn(`${operation} failed`, {
        reason: out.failure.reason,
        message: out.failure.message,
        codes: allDiagnostics(out.failure).map((d) => d.code),
      });
      return out;
    } finally {
      this.state.callDepth = 0;
    }
  }
}
