#!/usr/bin/env node
import { loadAtdf } from "./atdf.js";
import { loadConfig, loadOptionsFrom } from "./config.js";
import { ConsoleReporter } from "./reporter.js";
import { formatCounts, summarizeDatabase } from "./summary.js";
import { readText, writeText } from "./util.js";

async function main() {
  const [atdfPath, configPath, outJson] = process.argv.slice(2);
  if (!atdfPath) {
    console.error("Usage: atdf-graph <in.atdf> [config.yaml] [summary.json]");
    process.exit(1);
  }
  const cfg = loadConfig(configPath);
  const reporter = new ConsoleReporter(cfg.log_level, cfg.color);
  const db = loadAtdf(readText(atdfPath), { ...loadOptionsFrom(cfg), reporter });
  const summary = summarizeDatabase(db);
  console.error(`atdf-graph: ${formatCounts(summary)}`);
  if (outJson) writeText(outJson, JSON.stringify(summary, null, 2));
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
