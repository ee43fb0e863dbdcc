import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure, FailureReason } from "./failure";
import { failure } from "./failure";
import { ERROR_KIND_CODES, makeDiagnostic } from "./codes";
import type { Value } from "../core/values/values";
import { showValue } from "../core/values/format";
import { errorKindOf, errorProblem } from "../core/vm/errors";
import type { NameParseError } from "../core/naming/label";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export const ok = done;

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

export function err(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>,
  meta: OutcomeMeta = {}
): Fail {
  return fail(failure(reason, message, opts), meta);
}

function fieldParams(v: Value): Record<string, string> {
  const params: Record<string, string> = {};
  if (v.tag !== "Data") return params;
  for (const [k, x] of v.fields) {
    params[k] = x.tag === "Str" ? x.s : showValue(x);
  }
  return params;
}

/**
 * Failure for an Error signal that reached the host. VM error records map to their
 * diagnostic code; any other thrown value is reported as uncaught.
 */
export function vmFault(error: Value, meta: OutcomeMeta = {}): Fail {
  const kind = errorKindOf(error);
  if (kind === undefined) {
    const shown = showValue(error);
    return err(
      "uncaught-throw",
      `Uncaught error value: ${shown}`,
      { context: { error }, diagnostics: [makeDiagnostic("E0900", { value: shown })] },
      meta
    );
  }
  const problem = errorProblem(error) ?? kind;
  return err(
    "vm-error",
    `${kind}: ${problem}`,
    {
      context: { kind, error },
      diagnostics: [makeDiagnostic(ERROR_KIND_CODES[kind], fieldParams(error))],
    },
    meta
  );
}

export function invalidName(e: NameParseError, meta: OutcomeMeta = {}): Fail {
  return err(
    "invalid-name",
    e.message,
    { context: { kind: e.kind, input: e.input }, diagnostics: [makeDiagnostic("E0401", { input: e.input })] },
    meta
  );
}

export function internalError(e: unknown, meta: OutcomeMeta = {}): Fail {
  const message = e instanceof Error ? e.message : String(e);
  return err(
    "internal-error",
    `Internal error: ${message}`,
    { context: { error: e }, diagnostics: [makeDiagnostic("E0999", { message })] },
    meta
  );
}
