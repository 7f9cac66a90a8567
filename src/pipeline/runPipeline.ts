import path from "path";
import { LocalObjectStore } from "../artifacts/localObjectStore.js";
import { ContentHashIndex } from "../cache/contentHashIndex.js";
import { TaskCache } from "../cache/taskCache.js";
import { configSnapshot, type RunConfig } from "../config/runConfig.js";
import { readSampleSheet, setNames } from "../config/sampleSheet.js";
import { errorMessage, TopologyError } from "../core/errors.js";
import { newRunId, type RunId, type Sha256 } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import { Flow } from "../dataflow/flow.js";
import type { ToolAdapter } from "../execution/backends/types.js";
import { publishOutputs } from "../publish/publishOutputs.js";
import { RunLog, type PipelineWarning } from "../runs/runLog.js";
import { ResourcePool } from "../scheduler/resourcePool.js";
import { TaskRunner, type CacheStats } from "../scheduler/taskRunner.js";
import { FileCacheStore } from "../store/fileCacheStore.js";
import type { CacheStore, RunStore } from "../store/postgresStore.js";
import { buildPipelineGraph, type GraphDescription } from "./graphBuilder.js";
import type { PipelineLog, TaskExecutor } from "./process.js";

export interface PipelineServices {
  store: RunStore & CacheStore;
  adapter: ToolAdapter;
  /** Mirror run events to stderr. */
  echo?: boolean;
  environment?: JsonObject | null;
  /** Keep cache entries under `<workdir>/cache` instead of in `store`. */
  cacheInWorkdir?: boolean;
}

export interface PipelineRunResult {
  runId: RunId;
  configHash: Sha256;
  outDir: string;
  manifestSha256: Sha256;
  published: string[];
  warnings: PipelineWarning[];
  cache: CacheStats;
}

export interface PipelinePlan {
  configHash: Sha256;
  sets: string[];
  graph: GraphDescription;
  warnings: PipelineWarning[];
}

const planOnlyExecutor: TaskExecutor = {
  run: async (def) => {
    throw new TopologyError(`plan-only graph cannot execute ${def.name}`, def.name);
  }
};

function collectingLog(): PipelineLog {
  const warnings: PipelineWarning[] = [];
  return {
    warnings,
    warn: (code, message, data = null) => {
      warnings.push({ code, message, data });
    },
    note: () => undefined
  };
}

/** Builds the graph for a configuration without running anything. */
export async function planPipeline(cfg: RunConfig): Promise<PipelinePlan> {
  const samples = await readSampleSheet(cfg.mzmldef, { fractions: cfg.fractions });
  const log = collectingLog();
  const graph = buildPipelineGraph(
    { flow: new Flow(), config: cfg, executor: planOnlyExecutor, log, stagingDir: path.join(cfg.workdir, "plan") },
    samples
  );
  return { configHash: cfg.configHash, sets: setNames(samples), graph: graph.describe(), warnings: [...log.warnings] };
}

/**
 * Runs the whole pipeline for one configuration: reads the sample sheet,
 * executes the graph with caching under `workdir`, and publishes the final
 * tables to `outdir`.
 */
export async function runPipeline(cfg: RunConfig, services: PipelineServices): Promise<PipelineRunResult> {
  const samples = await readSampleSheet(cfg.mzmldef, { fractions: cfg.fractions });

  const runId = newRunId();
  const log = new RunLog(services.store, {
    runId,
    configHash: cfg.configHash,
    configSnapshot: configSnapshot(cfg),
    environment: services.environment ?? null,
    echo: services.echo ?? false
  });
  await log.start();

  try {
    const hashes = new ContentHashIndex();
    const objects = new LocalObjectStore(path.join(cfg.workdir, "objects"), hashes);
    await objects.init();
    const cacheStore = services.cacheInWorkdir ? new FileCacheStore(path.join(cfg.workdir, "cache")) : services.store;
    const runner = new TaskRunner({
      cache: new TaskCache(cacheStore, objects),
      hashes,
      pool: new ResourcePool({ maxCpus: cfg.resources.max_cpus, maxMemoryMb: cfg.resources.max_memory_mb }),
      adapter: services.adapter,
      log,
      workRoot: path.join(cfg.workdir, "tasks"),
      resourceOverrides: cfg.tasks
    });

    const graph = buildPipelineGraph(
      { flow: new Flow(), config: cfg, executor: runner, log, stagingDir: path.join(cfg.workdir, "runs", runId) },
      samples
    );
    const description = graph.describe();
    await log.event("pipeline.graph", `${description.nodes.length} nodes, ${description.edges.length} edges`, {
      sets: setNames(samples),
      skipped: description.nodes.filter((n) => n.skipped).map((n) => n.name),
      adapter: services.adapter.kind
    });

    await graph.flow.run();

    const stats = runner.stats;
    await log.event("pipeline.finished", `hits=${stats.hits} misses=${stats.misses} executed=${stats.executed}`, {
      hits: stats.hits,
      misses: stats.misses,
      executed: stats.executed
    });
    await log.flush();

    const { sinks } = graph;
    const published = await publishOutputs({
      outDir: cfg.outdir,
      runId,
      configHash: cfg.configHash,
      psmTables: await sinks.psmTables.get(),
      mergedTables: await sinks.mergedTables.get(),
      psmQc: await sinks.psmQc.get(),
      report: await sinks.report.get(),
      versions: await sinks.versions.get(),
      warnings: log.warnings,
      logText: log.logText()
    });

    const result: PipelineRunResult = {
      runId,
      configHash: cfg.configHash,
      outDir: published.outDir,
      manifestSha256: published.manifestSha256,
      published: published.files.map((f) => f.path),
      warnings: [...log.warnings],
      cache: stats
    };
    await log.finishSuccess(
      {
        out_dir: result.outDir,
        manifest_sha256: result.manifestSha256,
        published: result.published,
        warnings: result.warnings.map((w) => ({ code: w.code, message: w.message, data: w.data })),
        cache: { hits: stats.hits, misses: stats.misses, executed: stats.executed }
      },
      `published ${result.published.length} files`
    );
    return result;
  } catch (err) {
    await log.finishFailure(errorMessage(err));
    throw err;
  }
}
