import fs from "fs";
import yaml from "js-yaml";
import { LoadOptions } from "./atdf.js";
import { isSeverity, Severity } from "./reporter.js";

export type Config = {
  log_level: Severity;
  color: boolean;
  warn_unknown_attributes: boolean;
  inference: {
    peripheral_offsets: boolean;
    enum_sizes: boolean;
  };
};

export const defaultConfig: Config = {
  log_level: "warn",
  color: false,
  warn_unknown_attributes: true,
  inference: {
    peripheral_offsets: true,
    enum_sizes: true,
  },
};

function asBool(v: unknown): boolean | undefined {
  return typeof v === "boolean" ? v : undefined;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function mergeConfig(raw: unknown): Config {
  const cfg: Record<string, unknown> = isRecord(raw) ? raw : {};
  const inference: Record<string, unknown> = isRecord(cfg.inference) ? cfg.inference : {};
  return {
    log_level: isSeverity(cfg.log_level) ? cfg.log_level : defaultConfig.log_level,
    color: asBool(cfg.color) ?? defaultConfig.color,
    warn_unknown_attributes: asBool(cfg.warn_unknown_attributes) ?? defaultConfig.warn_unknown_attributes,
    inference: {
      peripheral_offsets: asBool(inference.peripheral_offsets) ?? defaultConfig.inference.peripheral_offsets,
      enum_sizes: asBool(inference.enum_sizes) ?? defaultConfig.inference.enum_sizes,
    },
  };
}

export function parseConfig(text: string): Config {
  return mergeConfig(yaml.load(text));
}

export function loadConfig(path?: string): Config {
  if (!path) return mergeConfig(undefined);
  return parseConfig(fs.readFileSync(path, "utf8"));
}

export function loadOptionsFrom(cfg: Config): Omit<LoadOptions, "reporter"> {
  return {
    warnUnknownAttributes: cfg.warn_unknown_attributes,
    inferPeripheralOffsets: cfg.inference.peripheral_offsets,
    inferEnumSizes: cfg.inference.enum_sizes,
  };
}
