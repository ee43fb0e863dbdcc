// src/core/vm/signal.ts
// The single non-local exit channel: Return and Error travel as one exception type.

import type { Value } from "../values/values";
import { showValue } from "../values/format";

export type SignalKind = "Return" | "Error";

export class VMSignal extends Error {
  constructor(
    public readonly kind: SignalKind,
    public readonly value: Value
  ) {
    super(`${kind}: ${showValue(value)}`);
    this.name = "VMSignal";
  }
}

export function returnSignal(value: Value): VMSignal {
  return new VMSignal("Return", value);
}

export function errorSignal(value: Value): VMSignal {
  return new VMSignal("Error", value);
}

export function isReturn(e: unknown): e is VMSignal {
  return e instanceof VMSignal && e.kind === "Return";
}

export function isError(e: unknown): e is VMSignal {
  return e instanceof VMSignal && e.kind === "Error";
}
