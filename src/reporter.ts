export type Severity = "error" | "warn" | "info" | "debug";

export type Diagnostic = {
  severity: Severity;
  scope: string;
  message: string;
  line?: number;
  element?: string;
  attribute?: string;
  code?: string;
};

/** Receives everything the loader has to say. */
export interface Reporter {
  report(diagnostic: Diagnostic): void;
}

type Details = Omit<Diagnostic, "severity" | "scope" | "message">;

export interface Log {
  error(message: string, details?: Details): void;
  warn(message: string, details?: Details): void;
  info(message: string, details?: Details): void;
  debug(message: string, details?: Details): void;
}

const severityRank: Record<Severity, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function isSeverity(v: unknown): v is Severity {
  return typeof v === "string" && Object.hasOwn(severityRank, v);
}

export function atLeast(severity: Severity, threshold: Severity): boolean {
  return severityRank[severity] <= severityRank[threshold];
}

const ANSI = Object.freeze({
  reset: "\x1b[0m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
});

const severityColor: Record<Severity, string> = {
  error: ANSI.red,
  warn: ANSI.yellow,
  info: ANSI.cyan,
  debug: ANSI.gray,
};

export function formatDiagnostic(d: Diagnostic, color = false): string {
  const tag = color ? `${severityColor[d.severity]}${d.severity}${ANSI.reset}` : d.severity;
  const where = d.line !== undefined ? ` line ${d.line}:` : "";
  const code = d.code ? ` [${d.code}]` : "";
  return `${tag} [${d.scope}]${where} ${d.message}${code}`;
}

export class ConsoleReporter implements Reporter {
  constructor(readonly level: Severity = "warn", readonly color = false) {}

  report(diagnostic: Diagnostic): void {
    if (!atLeast(diagnostic.severity, this.level)) return;
    console.error(formatDiagnostic(diagnostic, this.color));
  }
}

export class CollectingReporter implements Reporter {
  readonly diagnostics: Diagnostic[] = [];

  report(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  bySeverity(severity: Severity): Diagnostic[] {
    return this.diagnostics.filter((d) => d.severity === severity);
  }

  byCode(code: string): Diagnostic[] {
    return this.diagnostics.filter((d) => d.code === code);
  }
}

export class CallbackReporter implements Reporter {
  constructor(readonly callback: (diagnostic: Diagnostic) => void) {}

  report(diagnostic: Diagnostic): void {
    this.callback(diagnostic);
  }
}

export const silentReporter: Reporter = new CallbackReporter(() => {});

export function scopedLog(reporter: Reporter, scope: string): Log {
  const emit = (severity: Severity) => (message: string, details: Details = {}) =>
    reporter.report({ ...details, severity, scope, message });
  return {
    error: emit("error"),
    warn: emit("warn"),
    info: emit("info"),
    debug: emit("debug"),
  };
}
