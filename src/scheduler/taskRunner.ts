import { promises as fs, type Dirent } from "fs";
import path from "path";
import type { TaskCache } from "../cache/taskCache.js";
import type { ContentHashIndex } from "../cache/contentHashIndex.js";
import { deriveSignature, hashInputs, workDirFor } from "../cache/signature.js";
import {
  CancelledError,
  ConfigurationError,
  errorMessage,
  ToolExecutionError,
  TopologyError
} from "../core/errors.js";
import type { Sha256 } from "../core/ids.js";
import type { TaskRunStatus } from "../core/run.js";
import { countDataRows } from "../core/tsv.js";
import type { ExecutionResult, ToolAdapter } from "../execution/backends/types.js";
import type { RunLog } from "../runs/runLog.js";
import { renderCommand } from "../toolpacks/commandTemplate.js";
import type { TaskDefinition, TaskOutputs, TaskOutputSpec, TaskParams, TaskResources } from "../toolpacks/types.js";
import type { ResourcePool } from "./resourcePool.js";

const STDERR_TAIL_LINES = 20;

export interface TaskCall<P extends TaskParams> {
  /** Record key, e.g. `setA/target`; part of messages, not of the signature. */
  tag: string;
  inputs: Readonly<Record<string, readonly string[]>>;
  params: P;
  /** Error raised when a `nonEmpty` output has no data rows. */
  onEmpty?: (output: string) => Error;
}

export type TaskOutcome =
  | { status: "succeeded" | "cached" | "tolerated"; signature: Sha256; outputs: TaskOutputs }
  | { status: "dropped"; signature: Sha256 };

export interface CacheStats {
  hits: number;
  misses: number;
  executed: number;
}

export type ResourceOverrides = Readonly<Record<string, Readonly<{ cpus?: number; memory_mb?: number }>>>;

/** Declared resources of a task with the run configuration's per-task overrides applied. */
export function resolveResources(task: { name: string; resources: TaskResources }, overrides: ResourceOverrides): TaskResources {
  const o = overrides[task.name];
  return {
    cpus: o?.cpus ?? task.resources.cpus,
    memoryMb: o?.memory_mb ?? task.resources.memoryMb
  };
}

export interface TaskRunnerDeps {
  cache: TaskCache;
  hashes: ContentHashIndex;
  pool: ResourcePool;
  adapter: ToolAdapter;
  log: RunLog;
  workRoot: string;
  resourceOverrides: ResourceOverrides;
}

function stderrTail(stderr: string): string {
  const lines = stderr.trimEnd().split(/\r?\n/);
  return lines.slice(-STDERR_TAIL_LINES).join("\n");
}

function globToRegExp(fileGlob: string): RegExp {
  const escaped = fileGlob.replace(/[.+?^${}()|[\]\\]/g, "\\$&").replace(/\*/g, ".*");
  return new RegExp(`^${escaped}$`);
}

async function collectOutput(workDir: string, spec: TaskOutputSpec): Promise<string[]> {
  if (!spec.path.includes("*")) {
    const abs = path.join(workDir, spec.path);
    const st = await fs.stat(abs).catch(() => null);
    return st?.isFile() ? [abs] : [];
  }
  const dir = path.join(workDir, path.posix.dirname(spec.path));
  const re = globToRegExp(path.posix.basename(spec.path));
  const entries: Dirent[] = await fs.readdir(dir, { withFileTypes: true }).catch(() => []);
  return entries
    .filter((e) => e.isFile() && re.test(e.name))
    .map((e) => e.name)
    .sort()
    .map((name) => path.join(dir, name));
}

/**
 * Runs task invocations: signature, cache lookup, admission, execution and
 * output collection. One instance per pipeline run; counts cache statistics.
 */
export class TaskRunner {
  private readonly counters: CacheStats = { hits: 0, misses: 0, executed: 0 };

  constructor(private readonly deps: TaskRunnerDeps) {}

  get stats(): CacheStats {
    return { ...this.counters };
  }

  resourcesFor(task: { name: string; resources: TaskResources }): TaskResources {
    return resolveResources(task, this.deps.resourceOverrides);
  }

  async run<P extends TaskParams>(def: TaskDefinition<P>, call: TaskCall<P>, signal: AbortSignal): Promise<TaskOutcome> {
    const parsed = def.params.safeParse(call.params);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
      throw new ConfigurationError(`task:${def.name} (${call.tag}): invalid params: ${issues}`);
    }
    const params: TaskParams = parsed.data;

    for (const name of def.inputs) {
      if (!call.inputs[name]) throw new TopologyError(`task:${def.name} (${call.tag}): input ${name} is not bound`, def.name);
    }

    const inputHashes = await hashInputs(def, call.inputs, this.deps.hashes);
    const signature = deriveSignature({
      taskName: def.name,
      taskVersion: def.version,
      command: def.command,
      outputs: def.outputs,
      params,
      inputs: inputHashes
    });
    const workDir = workDirFor(this.deps.workRoot, signature);

    if (signal.aborted) {
      await this.record(def.name, call.tag, signature, "cancelled", null, null, "cancelled before start");
      throw new CancelledError(`task:${def.name} (${call.tag}): cancelled before start`);
    }

    return this.deps.cache.withSignature(signature, async (): Promise<TaskOutcome> => {
      const hit = await this.deps.cache.lookup(signature);
      if (hit) {
        const outputs = await this.deps.cache.restore(hit, workDir);
        this.counters.hits++;
        const now = new Date().toISOString();
        await this.record(def.name, call.tag, signature, "cached", null, now, null, now);
        this.deps.log.note("task.cached", `${def.name} (${call.tag})`, { signature });
        return { status: "cached", signature, outputs };
      }

      this.counters.misses++;
      const resources = this.resourcesFor(def);
      const lease = await this.deps.pool
        .acquire(resources, `task:${def.name} (${call.tag})`, signal)
        .catch(async (err: unknown) => {
          if (err instanceof CancelledError) {
            await this.record(def.name, call.tag, signature, "cancelled", null, null, err.message);
          }
          throw err;
        });
      try {
        return await this.execute(def, call, params, signature, workDir, resources);
      } finally {
        lease.release();
      }
    });
  }

  private async execute<P extends TaskParams>(
    def: TaskDefinition<P>,
    call: TaskCall<P>,
    params: TaskParams,
    signature: Sha256,
    workDir: string,
    resources: TaskResources
  ): Promise<TaskOutcome> {
    const label = `${def.name} (${call.tag})`;
    await fs.rm(workDir, { recursive: true, force: true });
    await fs.mkdir(workDir, { recursive: true });

    const outputPaths: Record<string, string> = {};
    for (const o of def.outputs) outputPaths[o.name] = o.path;
    const argv = renderCommand(def.command, { inputs: call.inputs, params, outputs: outputPaths }, `task:${def.name}`);
    await fs.writeFile(path.join(workDir, ".command.json"), JSON.stringify({ task: def.name, tag: call.tag, argv }, null, 2) + "\n");

    const startedAt = new Date().toISOString();
    this.deps.log.note("task.started", label, { signature, cpus: resources.cpus, memory_mb: resources.memoryMb });
    this.counters.executed++;

    let result: ExecutionResult;
    try {
      result = await this.deps.adapter.execute({
        task: def,
        tag: call.tag,
        signature,
        argv,
        workDir,
        inputs: call.inputs,
        params,
        outputs: outputPaths,
        resources
      });
    } catch (err) {
      const message = `${label}: could not be started: ${errorMessage(err)}`;
      await this.record(def.name, call.tag, signature, "failed", null, startedAt, message);
      throw new ToolExecutionError(message, def.name, call.tag, null, "");
    }
    await fs.writeFile(path.join(workDir, ".command.err"), result.stderr);

    if (result.exitCode !== 0) {
      const tail = stderrTail(result.stderr);
      if (def.tolerateFailure) {
        this.deps.log.warn("tolerated_failure", `${label} exited with code ${result.exitCode}; continuing`, {
          task: def.name,
          tag: call.tag,
          exit_code: result.exitCode,
          stderr_tail: tail
        });
        const outputs: Record<string, string[]> = {};
        for (const spec of def.outputs) outputs[spec.name] = await collectOutput(workDir, spec);
        await this.record(def.name, call.tag, signature, "tolerated", result.exitCode, startedAt, tail);
        return { status: "tolerated", signature, outputs };
      }
      if (def.bestEffort) {
        this.deps.log.warn("best_effort_dropped", `${label} exited with code ${result.exitCode}; record dropped`, {
          task: def.name,
          tag: call.tag,
          exit_code: result.exitCode,
          stderr_tail: tail
        });
        await this.record(def.name, call.tag, signature, "dropped", result.exitCode, startedAt, tail);
        return { status: "dropped", signature };
      }
      const message = `${label} exited with code ${result.exitCode}`;
      await this.record(def.name, call.tag, signature, "failed", result.exitCode, startedAt, `${message}\n${tail}`);
      throw new ToolExecutionError(message, def.name, call.tag, result.exitCode, tail);
    }

    const outputs: Record<string, string[]> = {};
    for (const spec of def.outputs) {
      const files = await collectOutput(workDir, spec);
      if (files.length === 0 && !spec.optional) {
        const message = `${label}: declared output ${spec.name} (${spec.path}) was not produced`;
        await this.record(def.name, call.tag, signature, "failed", result.exitCode, startedAt, message);
        throw new ToolExecutionError(message, def.name, call.tag, result.exitCode, stderrTail(result.stderr));
      }
      if (spec.nonEmpty) {
        for (const f of files) {
          if ((await countDataRows(f)) > 0) continue;
          const error =
            call.onEmpty?.(spec.name) ??
            new ToolExecutionError(`${label}: output ${spec.name} has no data rows`, def.name, call.tag, result.exitCode, "");
          await this.record(def.name, call.tag, signature, "failed", result.exitCode, startedAt, error.message);
          throw error;
        }
      }
      outputs[spec.name] = files;
    }

    await this.deps.cache.save(def.name, signature, workDir, outputs);
    await this.record(def.name, call.tag, signature, "succeeded", result.exitCode, startedAt, null);
    this.deps.log.note("task.succeeded", label, { signature });
    return { status: "succeeded", signature, outputs };
  }

  private async record(
    taskName: string,
    tag: string,
    signature: Sha256,
    status: TaskRunStatus,
    exitCode: number | null,
    startedAt: string | null,
    error: string | null,
    finishedAt: string = new Date().toISOString()
  ): Promise<void> {
    await this.deps.log.recordTask({
      runId: this.deps.log.runId,
      taskName,
      tag,
      signature,
      status,
      exitCode,
      startedAt,
      finishedAt,
      error
    });
  }
}
