import type { Kysely, Selectable } from "kysely";
import * as z from "zod/v4";
import type { RunId, Sha256 } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type {
  CacheEntry,
  CachedOutputs,
  RunEventRecord,
  RunRecord,
  RunStatus,
  TaskRunRecord,
  TaskRunStatus
} from "../core/run.js";
import type { DB } from "../db/types.js";

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return value;
  return new Date(String(value)).toISOString();
}

function toIsoOrNull(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return toIso(value);
}

const zSha256 = z.string().regex(/^sha256:[a-f0-9]{64}$/).transform((s): Sha256 => `sha256:${s.slice(7)}`);

export const zCachedOutputs = z.record(
  z.string(),
  z.array(
    z.object({
      relpath: z.string().min(1),
      sha256: zSha256,
      sizeBytes: z.number().int().min(0)
    })
  )
);

const RUN_STATUSES: readonly RunStatus[] = ["running", "succeeded", "failed"];
const TASK_STATUSES: readonly TaskRunStatus[] = ["succeeded", "cached", "failed", "tolerated", "dropped", "cancelled"];

function runStatus(value: string): RunStatus {
  const found = RUN_STATUSES.find((s) => s === value);
  if (!found) throw new Error(`unknown run status in store: ${value}`);
  return found;
}

function taskStatus(value: string): TaskRunStatus {
  const found = TASK_STATUSES.find((s) => s === value);
  if (!found) throw new Error(`unknown task status in store: ${value}`);
  return found;
}

function asRunId(value: string): RunId {
  if (!value.startsWith("run_")) throw new Error(`malformed run_id in store: ${value}`);
  return `run_${value.slice(4)}`;
}

function asJsonObject(value: Record<string, unknown> | null): JsonObject | null {
  if (value === null) return null;
  return JSON.parse(JSON.stringify(value));
}

/** Persistent key→artifact index for resumable execution. */
export interface CacheStore {
  getCacheEntry(signature: Sha256): Promise<CacheEntry | null>;
  /** Returns false when an entry for the signature already exists. */
  putCacheEntry(entry: Omit<CacheEntry, "createdAt">): Promise<boolean>;
  deleteCacheEntry(signature: Sha256): Promise<void>;
}

export interface RunStore {
  createRun(input: {
    runId: RunId;
    configHash: Sha256;
    configSnapshot: JsonObject;
    environment: JsonObject | null;
  }): Promise<RunRecord>;
  getRun(runId: RunId): Promise<RunRecord | null>;
  updateRun(
    runId: RunId,
    patch: Partial<Pick<RunRecord, "status" | "startedAt" | "finishedAt" | "error" | "resultJson">>
  ): Promise<void>;
  addRunEvent(runId: RunId, kind: string, message: string | null, data: JsonObject | null): Promise<void>;
  listRunEvents(runId: RunId): Promise<RunEventRecord[]>;
  recordTaskRun(record: TaskRunRecord): Promise<void>;
  listTaskRuns(runId: RunId): Promise<TaskRunRecord[]>;
}

export class PostgresStore implements RunStore, CacheStore {
  constructor(private readonly db: Kysely<DB>) {}

  async createRun(input: {
    runId: RunId;
    configHash: Sha256;
    configSnapshot: JsonObject;
    environment: JsonObject | null;
  }): Promise<RunRecord> {
    await this.db
      .insertInto("pipeline_runs")
      .values({
        run_id: input.runId,
        config_hash: input.configHash,
        status: "running",
        config_snapshot: input.configSnapshot,
        environment: input.environment
      })
      .onConflict((oc) => oc.column("run_id").doNothing())
      .execute();

    const row = await this.db
      .selectFrom("pipeline_runs")
      .selectAll()
      .where("run_id", "=", input.runId)
      .executeTakeFirstOrThrow();

    return this.mapRun(row);
  }

  async getRun(runId: RunId): Promise<RunRecord | null> {
    const row = await this.db.selectFrom("pipeline_runs").selectAll().where("run_id", "=", runId).executeTakeFirst();
    return row ? this.mapRun(row) : null;
  }

  async updateRun(
    runId: RunId,
    patch: Partial<Pick<RunRecord, "status" | "startedAt" | "finishedAt" | "error" | "resultJson">>
  ): Promise<void> {
    const updates: Record<string, unknown> = {};
    if (patch.status) updates.status = patch.status;
    if (patch.startedAt !== undefined) updates.started_at = patch.startedAt;
    if (patch.finishedAt !== undefined) updates.finished_at = patch.finishedAt;
    if (patch.error !== undefined) updates.error = patch.error;
    if (patch.resultJson !== undefined) updates.result_json = patch.resultJson;

    if (Object.keys(updates).length === 0) return;

    await this.db.updateTable("pipeline_runs").set(updates).where("run_id", "=", runId).execute();
  }

  async addRunEvent(runId: RunId, kind: string, message: string | null, data: JsonObject | null): Promise<void> {
    await this.db
      .insertInto("run_events")
      .values({
        run_id: runId,
        kind,
        message,
        data: data ?? null
      })
      .execute();
  }

  async listRunEvents(runId: RunId): Promise<RunEventRecord[]> {
    const rows = await this.db
      .selectFrom("run_events")
      .selectAll()
      .where("run_id", "=", runId)
      .orderBy("event_id", "asc")
      .execute();
    return rows.map((r) => ({
      ts: toIso(r.ts),
      kind: r.kind,
      message: r.message,
      data: asJsonObject(r.data)
    }));
  }

  async recordTaskRun(record: TaskRunRecord): Promise<void> {
    await this.db
      .insertInto("task_runs")
      .values({
        run_id: record.runId,
        task_name: record.taskName,
        tag: record.tag,
        signature: record.signature,
        status: record.status,
        exit_code: record.exitCode,
        started_at: record.startedAt,
        finished_at: record.finishedAt,
        error: record.error
      })
      .execute();
  }

  async listTaskRuns(runId: RunId): Promise<TaskRunRecord[]> {
    const rows = await this.db
      .selectFrom("task_runs")
      .selectAll()
      .where("run_id", "=", runId)
      .orderBy("task_run_id", "asc")
      .execute();
    return rows.map((r) => ({
      runId: asRunId(r.run_id),
      taskName: r.task_name,
      tag: r.tag,
      signature: zSha256.parse(r.signature),
      status: taskStatus(r.status),
      exitCode: r.exit_code,
      startedAt: toIsoOrNull(r.started_at),
      finishedAt: toIsoOrNull(r.finished_at),
      error: r.error
    }));
  }

  async getCacheEntry(signature: Sha256): Promise<CacheEntry | null> {
    const row = await this.db
      .selectFrom("cache_entries")
      .selectAll()
      .where("signature", "=", signature)
      .executeTakeFirst();
    if (!row) return null;

    const outputs = zCachedOutputs.safeParse(row.outputs);
    // A malformed entry cannot be replayed; callers treat it as a miss.
    if (!outputs.success) return null;

    return {
      signature,
      taskName: row.task_name,
      outputs: outputs.data satisfies CachedOutputs,
      createdAt: toIso(row.created_at)
    };
  }

  async putCacheEntry(entry: Omit<CacheEntry, "createdAt">): Promise<boolean> {
    const existing = await this.db
      .selectFrom("cache_entries")
      .select(["signature"])
      .where("signature", "=", entry.signature)
      .executeTakeFirst();
    if (existing) return false;

    await this.db
      .insertInto("cache_entries")
      .values({
        signature: entry.signature,
        task_name: entry.taskName,
        outputs: entry.outputs
      })
      .onConflict((oc) => oc.column("signature").doNothing())
      .execute();
    return true;
  }

  async deleteCacheEntry(signature: Sha256): Promise<void> {
    await this.db.deleteFrom("cache_entries").where("signature", "=", signature).execute();
  }

  private mapRun(row: Selectable<DB["pipeline_runs"]>): RunRecord {
    return {
      runId: asRunId(row.run_id),
      configHash: zSha256.parse(row.config_hash),
      status: runStatus(row.status),
      createdAt: toIso(row.created_at),
      startedAt: toIsoOrNull(row.started_at),
      finishedAt: toIsoOrNull(row.finished_at),
      configSnapshot: asJsonObject(row.config_snapshot) ?? {},
      environment: asJsonObject(row.environment),
      error: row.error,
      resultJson: asJsonObject(row.result_json)
    };
  }
}
