// src/core/values/format.ts
// Display forms for values.

import { compareLabels } from "../naming/label";
import { showAddress } from "../naming/address";
import type { Value } from "./values";

function showFloat(f: number): string {
  if (Number.isInteger(f)) return f.toFixed(1);
  return String(f);
}

/**
 * Developer-facing rendering, e.g. `[1, "a", &io.print]` or `point{x = 1, y = 2}`.
 */
export function showValue(v: Value): string {
  switch (v.tag) {
    case "Null":
      return "null";
    case "True":
      return "true";
    case "Int":
      return v.n.toString();
    case "Float":
      return showFloat(v.f);
    case "Str":
      return JSON.stringify(v.s);
    case "Ptr":
      return `&${showAddress(v.addr)}`;
    case "List":
      return `[${v.items.map(showValue).join(", ")}]`;
    case "Data": {
      const fields = [...v.fields.entries()]
        .sort(([a], [b]) => compareLabels(a, b))
        .map(([k, x]) => `${k} = ${showValue(x)}`);
      return `${showAddress(v.type)}{${fields.join(", ")}}`;
    }
    case "Func":
      return `func(${v.params.join(", ")}) {${v.body.length} instructions}`;
  }
}

/**
 * Rendering used by output system calls: strings print raw, booleans as FALSE/TRUE.
 */
export function printValue(v: Value): string {
  switch (v.tag) {
    case "Null":
      return "FALSE";
    case "True":
      return "TRUE";
    case "Str":
      return v.s;
    default:
      return showValue(v);
  }
}
