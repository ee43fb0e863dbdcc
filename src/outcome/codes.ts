import type { ErrorKind } from "../core/vm/errors";
import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0100: { code: "E0100", severity: "error", category: "Instruction", template: "Bad instruction: {problem}" },
  E0101: { code: "E0101", severity: "error", category: "Lookup", template: "Undefined variable: {variableName}" },
  E0102: { code: "E0102", severity: "error", category: "Lookup", template: "Undefined module variable: {variableName}" },
  E0103: { code: "E0103", severity: "error", category: "Lookup", template: "Undefined module: {address}" },
  E0104: { code: "E0104", severity: "error", category: "Lookup", template: "Undefined system call: {address}" },
  E0105: { code: "E0105", severity: "error", category: "Lookup", template: "Undefined jump target: {label}" },
  E0106: { code: "E0106", severity: "error", category: "Lookup", template: "No current module: {problem}" },

  E0200: { code: "E0200", severity: "error", category: "Stack", template: "Stack underflow in {instruction}" },
  E0201: { code: "E0201", severity: "error", category: "Call", template: "Not enough arguments: expected {expected}, got {actual}" },
  E0202: { code: "E0202", severity: "error", category: "Call", template: "Call depth limit of {limit} exceeded" },
  E0203: { code: "E0203", severity: "error", category: "Budget", template: "Step limit of {limit} exceeded" },

  E0300: { code: "E0300", severity: "error", category: "SystemCall", template: "System call {address} failed: {exception}" },

  E0400: { code: "E0400", severity: "error", category: "Module", template: "Module already active: {address}" },
  E0401: { code: "E0401", severity: "error", category: "Module", template: "Invalid name: {input}" },

  E0900: { code: "E0900", severity: "error", category: "Uncaught", template: "Uncaught error value: {value}" },
  E0999: { code: "E0999", severity: "error", category: "Internal", template: "Internal error: {message}" },

  W0001: { code: "W0001", severity: "warning", category: "Module", template: "Skipped module selection: {address}" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export const ERROR_KIND_CODES: Record<ErrorKind, DiagnosticCode> = {
  BadInstruction: "E0100",
  UndefinedVariable: "E0101",
  UndefinedModuleVariable: "E0102",
  UndefinedModule: "E0103",
  UndefinedSystemCall: "E0104",
  UndefinedJumpTarget: "E0105",
  NoCurrentModule: "E0106",
  StackUnderflow: "E0200",
  NotEnoughArguments: "E0201",
  CallDepthExceeded: "E0202",
  StepLimitExceeded: "E0203",
  SystemCall: "E0300",
  ModuleAlreadyActive: "E0400",
};

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    data: params,
  };
}
