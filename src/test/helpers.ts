import { loadAtdf, LoadOptions } from "../atdf.js";
import { Database } from "../database.js";
import { CollectingReporter } from "../reporter.js";

export function atdf(body: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>\n<avr-tools-device-file>\n${body}\n</avr-tools-device-file>\n`;
}

export function load(text: string, options: Omit<LoadOptions, "reporter"> = {}): { db: Database; reporter: CollectingReporter } {
  const reporter = new CollectingReporter();
  const db = loadAtdf(text, { ...options, reporter });
  return { db, reporter };
}
