import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { chmod, mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import * as z from "zod/v4";

import { LocalObjectStore } from "../src/artifacts/localObjectStore.js";
import { ContentHashIndex } from "../src/cache/contentHashIndex.js";
import { deriveSignature, hashInputs, workDirFor } from "../src/cache/signature.js";
import { TaskCache } from "../src/cache/taskCache.js";
import { sha256File } from "../src/core/canonicalJson.js";
import { CancelledError, ConfigurationError, ThresholdEmptyError, ToolExecutionError } from "../src/core/errors.js";
import { newRunId } from "../src/core/ids.js";
import type { DatabaseHandle } from "../src/db/connection.js";
import { InSilicoAdapter, type InSilicoScript } from "../src/execution/inSilico.js";
import { RunLog } from "../src/runs/runLog.js";
import { ResourcePool } from "../src/scheduler/resourcePool.js";
import { resolveResources, TaskRunner } from "../src/scheduler/taskRunner.js";
import type { PostgresStore } from "../src/store/postgresStore.js";
import { defineTask } from "../src/toolpacks/types.js";
import { openMemoryStore } from "./fixtures.js";

const tableTask = defineTask({
  name: "label_table",
  version: "v1",
  description: "Writes a one-column table labelled by a param.",
  inputs: ["src"],
  outputs: [{ name: "table", path: "table.tsv", nonEmpty: true }],
  command: ["label-table", "{{in.src}}", "--label", "{{param.label}}", "-o", "{{out.table}}"],
  resources: { cpus: 1, memoryMb: 256 },
  params: z.object({ label: z.string().min(1) })
});

const flakyTask = defineTask({
  name: "flaky_step",
  version: "v1",
  description: "Best-effort step.",
  inputs: ["src"],
  outputs: [{ name: "out", path: "out.txt" }],
  command: ["flaky", "{{in.src}}"],
  resources: { cpus: 1, memoryMb: 256 },
  bestEffort: true,
  params: z.object({})
});

const writeLabel: InSilicoScript = async (job) => {
  await job.write("table", `label\n${String(job.param("label"))}\n`);
};

describe("resource pool", () => {
  it("rejects a request larger than the whole budget", async () => {
    const pool = new ResourcePool({ maxCpus: 4, maxMemoryMb: 1000 });
    await expect(pool.acquire({ cpus: 8, memoryMb: 1 }, "big")).rejects.toThrow(
      new ConfigurationError("big: requests cpus=8 memory_mb=1, budget is cpus=4 memory_mb=1000")
    );
  });

  it("admits in FIFO order and lets the head block later requests", async () => {
    const pool = new ResourcePool({ maxCpus: 2, maxMemoryMb: 1000 });
    const granted: string[] = [];
    const first = await pool.acquire({ cpus: 1, memoryMb: 100 }, "first");
    const wide = pool.acquire({ cpus: 2, memoryMb: 100 }, "wide").then((l) => {
      granted.push("wide");
      return l;
    });
    const narrow = pool.acquire({ cpus: 1, memoryMb: 100 }, "narrow").then((l) => {
      granted.push("narrow");
      return l;
    });
    expect(pool.queued).toBe(2);
    expect(pool.inUse).toEqual({ cpus: 1, memoryMb: 100 });

    first.release();
    const wideLease = await wide;
    expect(granted).toEqual(["wide"]);
    expect(pool.queued).toBe(1);

    wideLease.release();
    (await narrow).release();
    expect(granted).toEqual(["wide", "narrow"]);
    expect(pool.inUse).toEqual({ cpus: 0, memoryMb: 0 });
    expect(pool.peakConcurrency).toBe(1);
  });

  it("removes a queued request when its signal aborts", async () => {
    const pool = new ResourcePool({ maxCpus: 1, maxMemoryMb: 1000 });
    const held = await pool.acquire({ cpus: 1, memoryMb: 10 }, "held");
    const controller = new AbortController();
    const waiting = pool.acquire({ cpus: 1, memoryMb: 10 }, "waiting", controller.signal);
    controller.abort();
    await expect(waiting).rejects.toThrow(new CancelledError("waiting: cancelled while queued"));
    expect(pool.queued).toBe(0);
    held.release();
    expect(pool.inUse).toEqual({ cpus: 0, memoryMb: 0 });
  });

  it("applies per-task overrides over declared resources", () => {
    expect(resolveResources(tableTask, { label_table: { cpus: 3 } })).toEqual({ cpus: 3, memoryMb: 256 });
    expect(resolveResources(tableTask, {})).toEqual({ cpus: 1, memoryMb: 256 });
  });
});

describe("input hashing and signatures", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "proteoflow-sig-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("memoizes file hashes until the file changes", async () => {
    const file = path.join(dir, "a.txt");
    await writeFile(file, "alpha\n");
    const index = new ContentHashIndex();
    const h1 = await index.hashFile(file);
    const h2 = await index.hashFile(file);
    expect(h2).toEqual(h1);
    expect(index.hashedCount).toBe(1);

    await writeFile(file, "alpha beta\n");
    const h3 = await index.hashFile(file);
    expect(h3.sha256).not.toBe(h1.sha256);
    expect(index.hashedCount).toBe(2);
  });

  it("keys inputs by base name and content, not by location", async () => {
    await mkdir(path.join(dir, "x"));
    await mkdir(path.join(dir, "y"));
    await writeFile(path.join(dir, "x", "s.mzML"), "<mzML/>\n");
    await writeFile(path.join(dir, "y", "s.mzML"), "<mzML/>\n");
    const index = new ContentHashIndex();
    const sig = async (file: string, label: string): Promise<string> =>
      deriveSignature({
        taskName: tableTask.name,
        taskVersion: tableTask.version,
        command: tableTask.command,
        outputs: tableTask.outputs,
        params: { label },
        inputs: await hashInputs(tableTask, { src: [file] }, index)
      });

    const x = await sig(path.join(dir, "x", "s.mzML"), "one");
    expect(await sig(path.join(dir, "y", "s.mzML"), "one")).toBe(x);
    expect(await sig(path.join(dir, "x", "s.mzML"), "two")).not.toBe(x);
  });

  it("lays out work directories by signature prefix", () => {
    const signature = `sha256:${"ab".repeat(32)}` as const;
    expect(workDirFor("/w", signature)).toBe(path.join("/w", "ab", "ab".repeat(31)));
  });
});

describe("task runner", () => {
  let dir: string;
  let src: string;
  let database: DatabaseHandle;
  let store: PostgresStore;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "proteoflow-runner-"));
    src = path.join(dir, "input.txt");
    await writeFile(src, "input\n");
    ({ database, store } = await openMemoryStore());
  });

  afterEach(async () => {
    await database.close();
    await rm(dir, { recursive: true, force: true });
  });

  async function harness(scripts: Record<string, InSilicoScript>) {
    const log = new RunLog(store, {
      runId: newRunId(),
      configHash: `sha256:${"0".repeat(64)}`,
      configSnapshot: {},
      environment: null,
      echo: false
    });
    await log.start();
    const hashes = new ContentHashIndex();
    const objects = new LocalObjectStore(path.join(dir, "objects"), hashes);
    const adapter = new InSilicoAdapter({ scripts });
    const runner = new TaskRunner({
      cache: new TaskCache(store, objects),
      hashes,
      pool: new ResourcePool({ maxCpus: 2, maxMemoryMb: 1024 }),
      adapter,
      log,
      workRoot: path.join(dir, "tasks"),
      resourceOverrides: {}
    });
    return { log, objects, adapter, runner };
  }

  it("executes once and restores the outputs from the cache afterwards", async () => {
    const first = await harness({ label_table: writeLabel });
    const ran = await first.runner.run(tableTask, { tag: "s1", inputs: { src: [src] }, params: { label: "one" } }, new AbortController().signal);
    expect(ran.status).toBe("succeeded");
    if (ran.status === "dropped") throw new Error("unexpected drop");
    const tablePath = path.join(workDirFor(path.join(dir, "tasks"), ran.signature), "table.tsv");
    expect(ran.outputs).toEqual({ table: [tablePath] });
    expect(first.runner.stats).toEqual({ hits: 0, misses: 1, executed: 1 });

    await rm(path.join(dir, "tasks"), { recursive: true, force: true });

    const second = await harness({ label_table: writeLabel });
    const again = await second.runner.run(tableTask, { tag: "s1", inputs: { src: [src] }, params: { label: "one" } }, new AbortController().signal);
    expect(again).toEqual({ status: "cached", signature: ran.signature, outputs: { table: [tablePath] } });
    expect(await readFile(tablePath, "utf8")).toBe("label\none\n");
    expect(second.adapter.executions).toEqual([]);
    expect(second.runner.stats).toEqual({ hits: 1, misses: 0, executed: 0 });
    expect((await store.listTaskRuns(second.log.runId)).map((t) => t.status)).toEqual(["cached"]);
  });

  it("treats a tampered cached object as a miss", async () => {
    const first = await harness({ label_table: writeLabel });
    const ran = await first.runner.run(tableTask, { tag: "s1", inputs: { src: [src] }, params: { label: "one" } }, new AbortController().signal);
    if (ran.status === "dropped") throw new Error("unexpected drop");
    const tablePath = ran.outputs.table?.[0] ?? "";
    const objectPath = first.objects.objectPath((await sha256File(tablePath)).sha256);
    await chmod(objectPath, 0o644);
    await writeFile(objectPath, "label\ntampered\n");

    const second = await harness({ label_table: writeLabel });
    const again = await second.runner.run(tableTask, { tag: "s1", inputs: { src: [src] }, params: { label: "one" } }, new AbortController().signal);
    expect(again.status).toBe("succeeded");
    expect(second.adapter.executions).toEqual([{ task: "label_table", tag: "s1" }]);
    expect(second.runner.stats).toEqual({ hits: 0, misses: 1, executed: 1 });
  });

  it("drops the record of a failed best-effort task with a warning", async () => {
    const { log, runner } = await harness({ flaky_step: async () => ({ exitCode: 2, stderr: "segfault\n" }) });
    const outcome = await runner.run(flakyTask, { tag: "s1", inputs: { src: [src] }, params: {} }, new AbortController().signal);
    expect(outcome.status).toBe("dropped");
    expect(log.warnings).toEqual([
      {
        code: "best_effort_dropped",
        message: "flaky_step (s1) exited with code 2; record dropped",
        data: { task: "flaky_step", tag: "s1", exit_code: 2, stderr_tail: "segfault" }
      }
    ]);
    await log.flush();
    expect((await store.listTaskRuns(log.runId)).map((t) => [t.status, t.exitCode])).toEqual([["dropped", 2]]);
  });

  it("collects every file matching a wildcard output, sorted by name", async () => {
    const splitTask = defineTask({
      name: "split_parts",
      version: "v1",
      description: "Splits its input into parts.",
      inputs: ["src"],
      outputs: [{ name: "parts", path: "part_*.txt" }],
      command: ["split-parts", "{{in.src}}"],
      resources: { cpus: 1, memoryMb: 256 },
      params: z.object({})
    });
    const { runner } = await harness({
      split_parts: async (job) => {
        await job.writeRelative("part_b.txt", "b\n");
        await job.writeRelative("part_a.txt", "a\n");
        await job.writeRelative("other.txt", "x\n");
      }
    });
    const outcome = await runner.run(splitTask, { tag: "s1", inputs: { src: [src] }, params: {} }, new AbortController().signal);
    if (outcome.status === "dropped") throw new Error("unexpected drop");
    const workDir = workDirFor(path.join(dir, "tasks"), outcome.signature);
    expect(outcome.outputs).toEqual({ parts: [path.join(workDir, "part_a.txt"), path.join(workDir, "part_b.txt")] });
  });

  it("fails when a declared output is missing", async () => {
    const { runner } = await harness({ label_table: async () => undefined });
    await expect(
      runner.run(tableTask, { tag: "s1", inputs: { src: [src] }, params: { label: "one" } }, new AbortController().signal)
    ).rejects.toThrow(new ToolExecutionError("label_table (s1): declared output table (table.tsv) was not produced", "label_table", "s1", 0, ""));
  });

  it("raises the caller's error for a table without data rows", async () => {
    const { runner } = await harness({
      label_table: async (job) => {
        await job.write("table", "label\n");
      }
    });
    const call = {
      tag: "s1",
      inputs: { src: [src] },
      params: { label: "one" },
      onEmpty: () => new ThresholdEmptyError("s1", "target", 0.01, 0.01)
    };
    await expect(runner.run(tableTask, call, new AbortController().signal)).rejects.toBeInstanceOf(ThresholdEmptyError);
  });

  it("rejects params that do not match the task schema", async () => {
    const { runner, adapter } = await harness({ label_table: writeLabel });
    await expect(
      runner.run(tableTask, { tag: "s1", inputs: { src: [src] }, params: { label: "" } }, new AbortController().signal)
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(adapter.executions).toEqual([]);
  });

  it("does not start work after cancellation", async () => {
    const { runner, adapter } = await harness({ label_table: writeLabel });
    const controller = new AbortController();
    controller.abort();
    await expect(
      runner.run(tableTask, { tag: "s1", inputs: { src: [src] }, params: { label: "one" } }, controller.signal)
    ).rejects.toBeInstanceOf(CancelledError);
    expect(adapter.executions).toEqual([]);
  });
});
