import { describe, it, expect } from "vitest";
import { C, E, L } from "../../src/core/program/instructions";
import { VNull, VTrue, mkInt, mkList, mkStr } from "../../src/core/values/values";
import { createModule } from "../../src/core/modules/module";
import { errorField } from "../../src/core/vm/errors";
import { addr, expectDone, expectFail, int, lbl, newVM, run } from "../helpers/vm";

const i = lbl("i");
const more = lbl("more");
const top = lbl("top");

describe("stack commands", () => {
  it("ClearForward yields the stack in push order and empties it", () => {
    const vm = newVM();
    const out = run(vm, C.push(L.konst(mkInt(1))), C.push(L.konst(mkInt(2))), C.clearForward());
    expect(expectDone(out)).toEqual(mkList([mkInt(1), mkInt(2)]));
    expect(vm.state.stack).toEqual([]);
  });

  it("ClearReverse yields the stack top first", () => {
    const vm = newVM();
    const out = run(vm, C.push(L.konst(mkInt(1))), C.push(L.konst(mkInt(2))), C.clearReverse());
    expect(expectDone(out)).toEqual(mkList([mkInt(2), mkInt(1)]));
  });

  it("Pop removes the top and makes it the result", () => {
    const vm = newVM();
    const out = run(vm, C.push(L.konst(mkInt(1))), C.push(L.konst(mkInt(2))), C.pop());
    expect(expectDone(out)).toEqual(mkInt(2));
    expect(vm.state.stack).toEqual([mkInt(1)]);
  });

  it("Peek reads the top without removing it", () => {
    const vm = newVM();
    const out = run(vm, C.push(L.konst(mkStr("a"))), C.peek());
    expect(expectDone(out)).toEqual(mkStr("a"));
    expect(vm.state.stack).toEqual([mkStr("a")]);
  });

  it("Push leaves the result alone", () => {
    const vm = newVM();
    expect(expectDone(run(vm, C.load(L.konst(mkInt(7))), C.push(L.konst(mkInt(1)))))).toEqual(mkInt(7));
  });

  it("Pop and Peek on an empty stack underflow", () => {
    expectFail(run(newVM(), C.pop()), "StackUnderflow");
    const err = expectFail(run(newVM(), C.peek()), "StackUnderflow");
    expect(errorField(err, "instruction")).toEqual(mkStr("PEEK"));
  });
});

describe("registers", () => {
  it("Store binds the result and Var reads it back", () => {
    const vm = newVM();
    const out = run(
      vm,
      C.load(L.konst(mkInt(5))),
      C.store(lbl("x")),
      C.load(L.konst(mkInt(0))),
      C.load(L.v(lbl("x")))
    );
    expect(expectDone(out)).toEqual(mkInt(5));
  });

  it("reading an unbound register fails with the variable name", () => {
    const err = expectFail(run(newVM(), C.load(L.v(lbl("nope")))), "UndefinedVariable");
    expect(errorField(err, "variableName")).toEqual(mkStr("nope"));
  });
});

describe("jumps and conditions", () => {
  it("loops until a When guard fails", () => {
    const vm = newVM();
    const out = run(
      vm,
      C.load(L.konst(mkInt(0))),
      C.store(i),
      C.setJump(top),
      C.eval(E.binary("Add", E.take(L.v(i)), int(1))),
      C.store(i),
      C.eval(E.binary("Lt", E.take(L.v(i)), int(5))),
      C.store(more),
      C.load(L.v(i)),
      C.when(L.v(more), C.jump(top))
    );
    expect(expectDone(out)).toEqual(mkInt(5));
  });

  it("a jump to a missing label fails", () => {
    const err = expectFail(run(newVM(), C.jump(lbl("nowhere"))), "UndefinedJumpTarget");
    expect(errorField(err, "label")).toEqual(mkStr("nowhere"));
  });

  it("a guarded command does not skip the instruction after it", () => {
    const out = run(
      newVM(),
      C.when(L.konst(VTrue), C.push(L.konst(mkInt(1)))),
      C.push(L.konst(mkInt(2))),
      C.clearForward()
    );
    expect(expectDone(out)).toEqual(mkList([mkInt(1), mkInt(2)]));
  });

  it("Unless runs its command only when the test is Null", () => {
    expect(expectDone(run(newVM(), C.unless(L.konst(VNull), C.load(L.konst(mkInt(9))))))).toEqual(mkInt(9));
    expect(
      expectDone(run(newVM(), C.load(L.konst(mkInt(1))), C.unless(L.konst(VTrue), C.load(L.konst(mkInt(9))))))
    ).toEqual(mkInt(1));
  });

  it("When treats any non-Null value as true", () => {
    expect(expectDone(run(newVM(), C.when(L.konst(mkInt(0)), C.load(L.konst(mkStr("ran"))))))).toEqual(mkStr("ran"));
  });
});

describe("module variables", () => {
  it("Update writes private state and yields the replaced value", () => {
    const vm = newVM();
    const counter = createModule({ privateDefs: { count: mkInt(0) } });
    expect(vm.activateModule("counter", counter).tag).toBe("Done");

    const out = vm.evaluate([C.update(L.konst(mkInt(5)), lbl("count"))], { module: "counter" });
    expect(expectDone(out)).toEqual(mkInt(0));
    expect(expectDone(vm.evaluate([C.load(L.deref(lbl("count")))], { module: "counter" }))).toEqual(mkInt(5));
    expect(counter.privateDefs.get(lbl("count"))).toEqual(mkInt(5));
  });

  it("Update needs a current module", () => {
    expectFail(run(newVM(), C.update(L.konst(mkInt(1)), lbl("x"))), "NoCurrentModule");
  });

  it("Update cannot create a private variable", () => {
    const vm = newVM();
    vm.activateModule("m", createModule());
    expectFail(vm.evaluate([C.update(L.konst(mkInt(1)), lbl("x"))], { module: "m" }), "UndefinedVariable");
  });

  it("Deref prefers private definitions over public ones", () => {
    const vm = newVM();
    vm.activateModule(
      "m",
      createModule({ privateDefs: { x: mkInt(1) }, publicDefs: { x: mkInt(2), y: mkInt(3) } })
    );
    expect(expectDone(vm.evaluate([C.load(L.deref(lbl("x")))], { module: "m" }))).toEqual(mkInt(1));
    expect(expectDone(vm.evaluate([C.load(L.deref(lbl("y")))], { module: "m" }))).toEqual(mkInt(3));
    expectFail(vm.evaluate([C.load(L.deref(lbl("z")))], { module: "m" }), "UndefinedModuleVariable");
  });

  it("Deref with no current module reports an undefined module variable", () => {
    const err = expectFail(run(newVM(), C.load(L.deref(lbl("x")))), "UndefinedModuleVariable");
    expect(errorField(err, "variableName")).toEqual(mkStr("x"));
  });

  it("Lookup reads another module's public definitions only", () => {
    const vm = newVM();
    vm.activateModule("lib", createModule({ privateDefs: { secret: mkInt(1) }, publicDefs: { pi: mkInt(3) } }));
    expect(expectDone(run(vm, C.load(L.lookup(addr("lib"), lbl("pi")))))).toEqual(mkInt(3));

    const err = expectFail(run(vm, C.load(L.lookup(addr("lib"), lbl("secret")))), "UndefinedModuleVariable");
    expect(errorField(err, "inModule")).toEqual(mkStr("lib"));
    expectFail(run(vm, C.load(L.lookup(addr("nope"), lbl("pi")))), "UndefinedModule");
  });
});

describe("return and throw", () => {
  it("a top-level Return completes with its value", () => {
    expect(expectDone(run(newVM(), C.ret(L.konst(mkInt(3))), C.load(L.konst(mkInt(4)))))).toEqual(mkInt(3));
  });

  it("a thrown non-error value surfaces as an uncaught throw", () => {
    const out = run(newVM(), C.throw(L.konst(mkStr("boom"))));
    expect(out.tag).toBe("Fail");
    if (out.tag === "Fail") {
      expect(out.failure.reason).toBe("uncaught-throw");
      expect(out.failure.message).toBe('Uncaught error value: "boom"');
    }
  });
});
