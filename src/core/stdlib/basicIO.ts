// src/core/stdlib/basicIO.ts
// Console output system calls.

import { mkStr } from "../values/values";
import { printValue } from "../values/format";
import type { SystemCall } from "../modules/module";
import type { RuntimeDeclaration } from "../modules/declare";
import { combineDeclarations, declareSystemCall } from "../modules/declare";
import { stackArguments } from "../vm/natives";

export interface OutputStream {
  write(chunk: string): unknown;
}

function writer(stream: OutputStream): SystemCall {
  return (vm) => {
    const line = stackArguments(vm).map(printValue).join("");
    stream.write(`${line}\n`);
    return mkStr(line);
  };
}

/**
 * `print` writes its arguments to stdout as one line, `error` to stderr. Both return the
 * line written, without the newline.
 */
export function basicIO(streams: { stdout?: OutputStream; stderr?: OutputStream } = {}): RuntimeDeclaration {
  return combineDeclarations(
    declareSystemCall("print", writer(streams.stdout ?? process.stdout)),
    declareSystemCall("error", writer(streams.stderr ?? process.stderr))
  );
}
