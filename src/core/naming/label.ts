// src/core/naming/label.ts
// Labels: the atomic identifiers used for variables, jump targets, parameters and address segments.

declare const labelBrand: unique symbol;

/** A validated identifier matching `[A-Za-z_][A-Za-z0-9_]*`. */
export type Label = string & { readonly [labelBrand]: true };

const LABEL_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Raised when text does not form a valid Label or Address.
 */
export class NameParseError extends Error {
  constructor(
    public readonly kind: "Label" | "Address",
    public readonly input: string,
    public readonly problem: string
  ) {
    super(`${kind} parse error: ${problem}: ${JSON.stringify(input)}`);
    this.name = "NameParseError";
  }
}

export function isLabel(text: string): text is Label {
  return LABEL_RE.test(text);
}

/**
 * Parse a Label, throwing NameParseError on invalid input.
 * Surrounding whitespace is ignored.
 */
export function parseLabel(text: string): Label {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new NameParseError("Label", text, "empty label");
  }
  if (!isLabel(trimmed)) {
    throw new NameParseError("Label", text, "label must start with a letter or underscore and contain only letters, digits and underscores");
  }
  return trimmed;
}

export function tryParseLabel(text: string): Label | undefined {
  const trimmed = text.trim();
  return isLabel(trimmed) ? trimmed : undefined;
}

/** Shorthand for building labels in host code and tests. */
export const label = parseLabel;

export function compareLabels(a: Label, b: Label): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
