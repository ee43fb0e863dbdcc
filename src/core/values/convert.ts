// src/core/values/convert.ts
// Conversions between host (JavaScript) data and VM values.

import { showAddress } from "../naming/address";
import type { Value } from "./values";
import { VNull, VTrue, mkFloat, mkInt, mkList, mkStr } from "./values";

export type HostValue =
  | null
  | boolean
  | bigint
  | number
  | string
  | readonly HostValue[]
  | { readonly [field: string]: HostValue };

/**
 * Host data to a value. `false` and `null` both become Null; integral numbers become Int.
 * Plain objects have no value counterpart without a type address, so they are rejected.
 */
export function fromHost(x: HostValue): Value {
  if (x === null || x === false) return VNull;
  if (x === true) return VTrue;
  if (typeof x === "bigint") return mkInt(x);
  if (typeof x === "number") return Number.isInteger(x) ? mkInt(x) : mkFloat(x);
  if (typeof x === "string") return mkStr(x);
  if (Array.isArray(x)) return mkList(x.map(fromHost));
  throw new TypeError("fromHost: objects need a data type address; build Data values with mkData");
}

/**
 * Value to host data. Data becomes `{ $type, ...fields }`, pointers their dotted address,
 * functions a descriptive string.
 */
export function toHost(v: Value): HostValue {
  switch (v.tag) {
    case "Null":
      return null;
    case "True":
      return true;
    case "Int":
      return v.n;
    case "Float":
      return v.f;
    case "Str":
      return v.s;
    case "Ptr":
      return showAddress(v.addr);
    case "List":
      return v.items.map(toHost);
    case "Data": {
      const out: Record<string, HostValue> = { $type: showAddress(v.type) };
      for (const [k, x] of v.fields) out[k] = toHost(x);
      return out;
    }
    case "Func":
      return `<func/${v.params.length}>`;
  }
}

export function intValue(v: Value): bigint | undefined {
  return v.tag === "Int" ? v.n : undefined;
}

export function strValue(v: Value): string | undefined {
  return v.tag === "Str" ? v.s : undefined;
}
