export type ErrorKind =
  | "missing-attribute"
  | "parse"
  | "structural"
  | "lookup"
  | "consistency"
  | "invariant";

export class AtdfError extends Error {
  constructor(
    readonly kind: ErrorKind,
    readonly code: string,
    readonly format: string,
    readonly variables: Record<string, unknown> = {},
  ) {
    const message = format.replace(/{([^}]+)}/g, (match: string, name: string) =>
      name in variables ? JSON.stringify(variables[name]) : match,
    );
    super(message);
    this.name = "AtdfError";
  }
}

export function missingAttribute(element: string, attribute: string, code: string): AtdfError {
  return new AtdfError("missing-attribute", code, "{element} is missing required attribute {attribute}", {
    element,
    attribute,
  });
}

export function isAtdfError(err: unknown, kind?: ErrorKind): err is AtdfError {
  return err instanceof AtdfError && (kind === undefined || err.kind === kind);
}
