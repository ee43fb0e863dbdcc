import { describe, it, expect } from "vitest";
import { C, E, L, type BinaryOp, type Expr } from "../../src/core/program/instructions";
import {
  VNull,
  VTrue,
  mkData,
  mkFloat,
  mkInt,
  mkList,
  mkPtr,
  mkStr,
  type Value,
} from "../../src/core/values/values";
import { label } from "../../src/core/naming/label";
import { createModule, type OperatorEvaluator } from "../../src/core/modules/module";
import { declareModule } from "../../src/core/modules/declare";
import { errorField, errorProblem, vmError } from "../../src/core/vm/errors";
import { addr, expectDone, expectFail, int, konst, newVM, run, str } from "../helpers/vm";

function evalExpr(e: Expr): Value {
  return expectDone(run(newVM(), C.eval(e)));
}

function bin(op: BinaryOp, a: Expr, b: Expr): Value {
  return evalExpr(E.binary(op, a, b));
}

const flt = (f: number) => konst(mkFloat(f));

const point = (x: number, y: number) =>
  mkData(addr("geo.point"), [
    [label("x"), mkInt(x)],
    [label("y"), mkInt(y)],
  ]);

describe("arithmetic", () => {
  it("works on matching Int operands", () => {
    expect(bin("Add", int(2), int(3))).toEqual(mkInt(5));
    expect(bin("Sub", int(2), int(3))).toEqual(mkInt(-1));
    expect(bin("Mul", int(-4), int(3))).toEqual(mkInt(-12));
  });

  it("floors Int division and takes the divisor's sign for Mod", () => {
    expect(bin("Div", int(-7), int(2))).toEqual(mkInt(-4));
    expect(bin("Div", int(7), int(2))).toEqual(mkInt(3));
    expect(bin("Mod", int(-7), int(2))).toEqual(mkInt(1));
    expect(bin("Mod", int(7), int(-2))).toEqual(mkInt(-1));
  });

  it("wraps on 64-bit overflow", () => {
    const max = konst(mkInt(2n ** 63n - 1n));
    expect(bin("Add", max, int(1))).toEqual(mkInt(-(2n ** 63n)));
  });

  it("works on matching Float operands", () => {
    expect(bin("Add", flt(1.5), flt(2))).toEqual(mkFloat(3.5));
    expect(bin("Div", flt(1), flt(4))).toEqual(mkFloat(0.25));
    expect(bin("Mod", flt(-1), flt(4))).toEqual(mkFloat(3));
  });

  it("rejects mixed Int and Float operands", () => {
    const err = expectFail(run(newVM(), C.eval(E.binary("Add", int(1), flt(1)))), "BadInstruction");
    expect(errorField(err, "operands")).toEqual(mkList([mkInt(1), mkFloat(1)]));
  });

  it("rejects Int division by zero", () => {
    const err = expectFail(run(newVM(), C.eval(E.binary("Div", int(1), int(0)))), "BadInstruction");
    expect(errorProblem(err)).toBe("division by zero");
  });
});

describe("comparison and equality", () => {
  it("compares numbers of the same kind to True or Null", () => {
    expect(bin("Lt", int(1), int(2))).toEqual(VTrue);
    expect(bin("Ge", int(1), int(2))).toEqual(VNull);
    expect(bin("Le", int(2), int(2))).toEqual(VTrue);
    expect(bin("Gt", flt(2.5), flt(1))).toEqual(VTrue);
  });

  it("rejects ordering across kinds", () => {
    expectFail(run(newVM(), C.eval(E.binary("Lt", str("a"), str("b")))), "BadInstruction");
  });

  it("tests structural equality of evaluated operands", () => {
    const list = konst(mkList([mkInt(1), mkInt(2)]));
    expect(bin("Eq", list, konst(mkList([mkInt(1), mkInt(2)])))).toEqual(VTrue);
    expect(bin("Eq", E.binary("Add", int(1), int(1)), int(2))).toEqual(VTrue);
    expect(bin("Ne", int(1), flt(1))).toEqual(VTrue);
    expect(bin("Eq", str("a"), str("b"))).toEqual(VNull);
  });
});

describe("strings, lists and bits", () => {
  it("appends strings and lists", () => {
    expect(bin("Append", str("ab"), str("cd"))).toEqual(mkStr("abcd"));
    expect(bin("Append", konst(mkList([mkInt(1)])), konst(mkList([mkInt(2)])))).toEqual(
      mkList([mkInt(1), mkInt(2)])
    );
    expectFail(run(newVM(), C.eval(E.binary("Append", str("a"), int(1)))), "BadInstruction");
  });

  it("applies bitwise operators to Ints", () => {
    expect(bin("And", int(12), int(10))).toEqual(mkInt(8));
    expect(bin("Or", int(12), int(10))).toEqual(mkInt(14));
    expect(bin("Xor", int(12), int(10))).toEqual(mkInt(6));
    expect(bin("ShiftL", int(1), int(4))).toEqual(mkInt(16));
    expect(bin("ShiftR", int(-16), int(2))).toEqual(mkInt(-4));
    expect(bin("ShiftL", int(1), int(64))).toEqual(mkInt(0));
  });

  it("indexes lists and data", () => {
    const list = konst(mkList([mkStr("a"), mkStr("b"), mkStr("c")]));
    expect(bin("Index", int(1), list)).toEqual(mkStr("b"));
    expect(bin("Index", int(5), list)).toEqual(VNull);
    expect(bin("Index", str("x"), konst(point(1, 2)))).toEqual(mkInt(1));
    expect(bin("Index", str("z"), konst(point(1, 2)))).toEqual(VNull);
    expect(bin("Index", konst(VTrue), konst(point(1, 2)))).toEqual(mkPtr(addr("geo.point")));
  });
});

describe("unary operators", () => {
  it("Not flips booleans and complements Ints", () => {
    expect(evalExpr(E.not(konst(VNull)))).toEqual(VTrue);
    expect(evalExpr(E.not(konst(VTrue)))).toEqual(VNull);
    expect(evalExpr(E.not(int(0)))).toEqual(mkInt(-1));
    expectFail(run(newVM(), C.eval(E.not(str("x")))), "BadInstruction");
  });

  it("Size measures magnitudes and lengths", () => {
    expect(evalExpr(E.size(int(-5)))).toEqual(mkInt(5));
    expect(evalExpr(E.size(flt(-2.5)))).toEqual(mkFloat(2.5));
    expect(evalExpr(E.size(konst(mkList([VNull, VNull, VNull]))))).toEqual(mkInt(3));
    expect(evalExpr(E.size(str("héllo")))).toEqual(mkInt(5));
    expect(evalExpr(E.size(konst(VNull)))).toEqual(VNull);
  });
});

describe("conditional expressions", () => {
  it("If picks the first branch on True and IfNot on Null", () => {
    expect(evalExpr(E.if(konst(VTrue), int(1), int(2)))).toEqual(mkInt(1));
    expect(evalExpr(E.if(konst(VNull), int(1), int(2)))).toEqual(mkInt(2));
    expect(evalExpr(E.ifNot(konst(VTrue), int(1), int(2)))).toEqual(mkInt(2));
    expect(evalExpr(E.ifNot(konst(VNull), int(1), int(2)))).toEqual(mkInt(1));
  });

  it("evaluates only the chosen branch", () => {
    expect(evalExpr(E.if(konst(VTrue), int(1), E.binary("Div", int(1), int(0))))).toEqual(mkInt(1));
  });

  it("requires a boolean test", () => {
    const err = expectFail(run(newVM(), C.eval(E.if(int(1), int(1), int(2)))), "BadInstruction");
    expect(errorField(err, "value")).toEqual(mkInt(1));
  });
});

describe("operator delegation for data values", () => {
  const coord = (v: Value, field: string): bigint => {
    if (v.tag === "Data") {
      const x = v.fields.get(label(field));
      if (x?.tag === "Int") return x.n;
    }
    throw vmError("BadInstruction", "not a point");
  };

  const pointOps: OperatorEvaluator = (expr, operands) => {
    const [a, b] = operands;
    if (expr.op === "Add" && a && b) {
      return mkData(addr("geo.point"), [
        [label("x"), mkInt(coord(a, "x") + coord(b, "x"))],
        [label("y"), mkInt(coord(a, "y") + coord(b, "y"))],
      ]);
    }
    if (expr.op === "Size" && a) {
      return mkInt(coord(a, "x") * coord(a, "x") + coord(a, "y") * coord(a, "y"));
    }
    throw vmError("BadInstruction", "unsupported point operation");
  };

  it("hands unsupported shapes to the module named by the data type", () => {
    const vm = newVM({ declarations: [declareModule("geo.point", () => undefined, pointOps)] });
    const sum = run(vm, C.eval(E.binary("Add", konst(point(1, 2)), konst(point(3, 4)))));
    expect(expectDone(sum)).toEqual(point(4, 6));
    expect(expectDone(run(vm, C.eval(E.size(konst(point(3, 4))))))).toEqual(mkInt(25));
  });

  it("propagates errors raised by the evaluator", () => {
    const vm = newVM({ declarations: [declareModule("geo.point", () => undefined, pointOps)] });
    const err = expectFail(run(vm, C.eval(E.binary("Mul", konst(point(1, 2)), int(2)))), "BadInstruction");
    expect(errorProblem(err)).toBe("unsupported point operation");
  });

  it("keeps equality structural", () => {
    const vm = newVM({ declarations: [declareModule("geo.point", () => undefined, pointOps)] });
    expect(expectDone(run(vm, C.eval(E.binary("Eq", konst(point(1, 2)), konst(point(1, 2))))))).toEqual(VTrue);
  });

  it("fails when no module is loaded for the type", () => {
    const err = expectFail(run(newVM(), C.eval(E.not(konst(point(0, 0))))), "UndefinedModule");
    expect(errorField(err, "address")).toEqual(mkStr("geo.point"));
  });

  it("fails when the module defines no operators", () => {
    const plain = newVM();
    plain.activateModule("geo.point", createModule());
    expectFail(run(plain, C.eval(E.not(konst(point(0, 0))))), "BadInstruction");

    const builtin = newVM({ declarations: [declareModule("geo.point", () => undefined)] });
    const err = expectFail(run(builtin, C.eval(E.not(konst(point(0, 0))))), "BadInstruction");
    expect(errorField(err, "dataType")).toEqual(mkStr("geo.point"));
  });
});

describe("lookups inside expressions", () => {
  it("Take reads the last result", () => {
    const out = run(newVM(), C.load(L.konst(mkInt(20))), C.eval(E.binary("Add", E.take(L.result()), int(1))));
    expect(expectDone(out)).toEqual(mkInt(21));
  });
});
