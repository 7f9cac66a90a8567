#!/usr/bin/env node
import { loadRunConfig } from "../src/config/runConfig.js";
import { errorMessage, PipelineError } from "../src/core/errors.js";
import { openDatabase } from "../src/db/connection.js";
import { createAdapter, resolveAdapterKind } from "../src/execution/adapterSelection.js";
import { envSnapshot } from "../src/mcp/envSnapshot.js";
import { planPipeline, runPipeline } from "../src/pipeline/runPipeline.js";
import { PostgresStore } from "../src/store/postgresStore.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/run_pipeline.ts --config <run.yaml> [--adapter local_process|in_silico] [--plan] [--quiet]",
    "",
    "env:",
    "  DATABASE_URL (optional; without it run records are kept in memory and cache entries under <workdir>/cache)",
    "  AUTO_SCHEMA (optional, default true)",
    "  PIPELINE_ADAPTER (optional, overridden by --adapter)",
    ""
  ].join("\n");
}

const BOOLEAN_FLAGS = new Set(["help", "plan", "quiet"]);

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (BOOLEAN_FLAGS.has(key)) {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }
  const configPath = args.config;
  if (typeof configPath !== "string") throw new Error(`--config is required\n\n${usage()}`);
  const cfg = await loadRunConfig(configPath);

  if (args.plan) {
    const plan = await planPipeline(cfg);
    process.stdout.write(JSON.stringify(plan, null, 2) + "\n");
    return;
  }

  const requested = typeof args.adapter === "string" ? args.adapter : process.env.PIPELINE_ADAPTER;
  const adapter = createAdapter(resolveAdapterKind(requested));
  const autoSchema = (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";
  const database = await openDatabase({ databaseUrl: process.env.DATABASE_URL, autoSchema });
  try {
    const result = await runPipeline(cfg, {
      store: new PostgresStore(database.db),
      adapter,
      echo: !args.quiet,
      environment: envSnapshot(adapter.kind),
      cacheInWorkdir: database.mode === "pg-mem"
    });
    process.stdout.write(JSON.stringify(result, null, 2) + "\n");
  } finally {
    await database.close();
  }
}

main().catch((err) => {
  console.error(err instanceof PipelineError ? `${err.name}: ${err.message}` : errorMessage(err));
  process.exitCode = 1;
});
