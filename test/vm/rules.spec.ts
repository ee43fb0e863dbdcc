import { describe, it, expect } from "vitest";
import { C, E, L, block, type Expr } from "../../src/core/program/instructions";
import { VNull, mkInt, mkList, mkStr } from "../../src/core/values/values";
import { printValue } from "../../src/core/values/format";
import { createModule, matchPattern, rule, tokenize } from "../../src/core/modules/module";
import { declareSystemCall } from "../../src/core/modules/declare";
import { stackArguments } from "../../src/core/vm/natives";
import { addr, expectDone, lbl, newVM, str } from "../helpers/vm";

const count = lbl("count");

function recordingVM() {
  const seen: string[] = [];
  const vm = newVM({
    declarations: [
      declareSystemCall("record", (state) => {
        seen.push(stackArguments(state).map(printValue).join(" "));
        return VNull;
      }),
    ],
  });
  return { vm, seen };
}

const record = (...args: Expr[]) => C.eval(E.sys(addr("record"), ...args));

describe("pattern matching", () => {
  it("splits on whitespace", () => {
    expect(tokenize("  say  hello\tworld ")).toEqual(["say", "hello", "world"]);
  });

  it("yields the tokens after a matching prefix", () => {
    expect(matchPattern(["say"], ["say", "hi"])).toEqual(["hi"]);
    expect(matchPattern(["say", "hi"], ["say", "hi"])).toEqual([]);
    expect(matchPattern(["say", "bye"], ["say", "hi"])).toBeUndefined();
    expect(matchPattern(["say", "hi", "there"], ["say", "hi"])).toBeUndefined();
  });
});

describe("query dispatch", () => {
  it("puts the remainder on the stack with its first token on top", () => {
    const { vm, seen } = recordingVM();
    vm.activateModule("chat", createModule({ rules: [rule("say", block(C.pop(), record(E.take(L.result()))))] }));
    expect(vm.query("say hello world")).toMatchObject({ tag: "Done", value: 1 });
    expect(seen).toEqual(["hello"]);
  });

  it("leaves exactly the unmatched tail on the stack", () => {
    const vm = newVM();
    vm.activateModule("intro", createModule({ rules: [rule(["my", "name", "is"], block(C.clearForward()))] }));
    expect(vm.query(["my", "name", "is", "Dave"])).toMatchObject({ tag: "Done", value: 1 });
    expect(vm.state.lastResult).toEqual(mkList([mkStr("Dave")]));
  });

  it("runs every matching rule in declaration order", () => {
    const { vm, seen } = recordingVM();
    vm.activateModule(
      "chat",
      createModule({
        rules: [
          rule("say", block(C.clearReverse(), record(str("say:"), E.take(L.result())))),
          rule("bye", block(record(str("bye")))),
          rule("say hello", block(C.clearReverse(), record(str("say hello:"), E.take(L.result())))),
        ],
      })
    );
    expect(vm.query(["say", "hello", "world"])).toMatchObject({ tag: "Done", value: 2 });
    expect(seen).toEqual(["say: [\"hello\", \"world\"]", "say hello: [\"world\"]"]);
  });

  it("keeps module state updated by earlier matches", () => {
    const mod = createModule({
      privateDefs: { count: mkInt(0) },
      rules: [rule("tick", block(C.eval(E.binary("Add", E.take(L.deref(count)), E.take(L.konst(mkInt(1))))), C.update(L.result(), count)))],
    });
    const vm = newVM();
    vm.activateModule("clock", mod);
    vm.query("tick");
    vm.query("tick now");
    expect(mod.privateDefs.get(count)).toEqual(mkInt(2));
  });

  it("restores the host stack around each action", () => {
    const vm = newVM();
    vm.activateModule("noisy", createModule({ rules: [rule("x", block(C.push(L.konst(mkInt(9)))))] }));
    expectDone(vm.evaluate(block(C.push(L.konst(mkInt(1))))));
    vm.query("x y");
    expect(vm.state.stack).toEqual([mkInt(1)]);
  });

  it("lets Return end only the current action", () => {
    const { vm, seen } = recordingVM();
    vm.activateModule(
      "chat",
      createModule({
        rules: [
          rule("x", block(C.ret(L.konst(mkInt(1))), record(str("unreached")))),
          rule("x", block(record(str("second")))),
        ],
      })
    );
    expect(vm.query("x")).toMatchObject({ tag: "Done", value: 2 });
    expect(seen).toEqual(["second"]);
  });

  it("aborts the query on an error", () => {
    const { vm, seen } = recordingVM();
    vm.activateModule(
      "chat",
      createModule({
        rules: [rule("x", block(C.throw(L.konst(mkStr("stop"))))), rule("x", block(record(str("second"))))],
      })
    );
    const out = vm.query("x");
    expect(out.tag).toBe("Fail");
    expect(out.tag === "Fail" && out.failure.reason).toBe("uncaught-throw");
    expect(seen).toEqual([]);
  });

  it("keeps dispatching to other modules after one fails, then reports the first error", () => {
    const { vm, seen } = recordingVM();
    vm.activateModule("a", createModule({ rules: [rule("x", block(C.throw(L.konst(mkStr("from a")))))] }));
    vm.activateModule("b", createModule({ rules: [rule("x", block(record(str("b"))))] }));
    vm.activateModule("c", createModule({ rules: [rule("x", block(C.throw(L.konst(mkStr("from c")))))] }));

    const out = vm.query("x");
    expect(seen).toEqual(["b"]);
    expect(out.tag === "Fail" && out.failure.message).toBe('Uncaught error value: "from a"');
  });

  it("dispatches only to the selected modules", () => {
    const { vm, seen } = recordingVM();
    vm.activateModule("a", createModule({ rules: [rule("ping", block(record(str("a"))))] }));
    vm.activateModule("b", createModule({ rules: [rule("ping", block(record(str("b"))))] }));

    expect(vm.query("ping", vm.selectModules(["b"]))).toMatchObject({ tag: "Done", value: 1 });
    expect(seen).toEqual(["b"]);

    seen.length = 0;
    expect(vm.query("ping")).toMatchObject({ tag: "Done", value: 2 });
    expect(seen).toEqual(["a", "b"]);
  });

  it("makes the matching module current", () => {
    const mod = createModule({ publicDefs: { name: mkStr("greeter") }, rules: [rule("who", block(C.load(L.deref(lbl("name")))))] });
    const vm = newVM();
    vm.activateModule("greeter", mod);
    vm.query("who");
    expect(vm.state.currentModule).toBe(mod);
    expect(vm.state.lastResult).toEqual(mkStr("greeter"));
  });
});
