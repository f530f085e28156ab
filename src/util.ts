import fs from "fs";
import { AtdfError } from "./errors.js";

export function readText(path: string): string {
  return fs.readFileSync(path, "utf8");
}

export function writeText(path: string, data: string): void {
  fs.writeFileSync(path, data, "utf8");
}

export function asArray<T>(v: T | T[] | undefined | null): T[] {
  if (v === undefined || v === null) return [];
  return Array.isArray(v) ? v : [v];
}

// decimal, or 0x / 0o / 0b prefixed; `_` may separate digits
const integerLiteral = /^([+-])?(0[xX][0-9a-fA-F]+(?:_[0-9a-fA-F]+)*|0[oO][0-7]+(?:_[0-7]+)*|0[bB][01]+(?:_[01]+)*|[0-9]+(?:_[0-9]+)*)$/;

export function parseBigInteger(text: string, signed = false): bigint {
  const m = integerLiteral.exec(text);
  if (!m || (m[1] === "-" && !signed)) {
    throw new AtdfError("parse", "InvalidInteger", "invalid integer literal {text}", { text });
  }
  const magnitude = BigInt(m[2].replace(/_/g, ""));
  return m[1] === "-" ? -magnitude : magnitude;
}

export function parseInteger(text: string, signed = false): number {
  const value = parseBigInteger(text, signed);
  if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new AtdfError("parse", "IntegerOverflow", "integer literal {text} is out of range", { text });
  }
  return Number(value);
}

/** Bits needed to represent `value`, at least one. */
export function bitsNeeded(value: number): number {
  return value === 0 ? 1 : value.toString(2).length;
}
