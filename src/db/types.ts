import type { ColumnType, Generated, JSONColumnType } from "kysely";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type JsonObject = Record<string, unknown>;
type Json = JSONColumnType<JsonObject, JsonObject, JsonObject>;
type JsonNullable = JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;

export interface PipelineRunsTable {
  run_id: string;
  config_hash: string;
  status: string;
  created_at: Generated<string>;
  started_at: OptionalNullable<string>;
  finished_at: OptionalNullable<string>;
  config_snapshot: Json;
  environment: JsonNullable;
  error: OptionalNullable<string>;
  result_json: JsonNullable;
}

export interface RunEventsTable {
  event_id: Generated<string>;
  run_id: string;
  ts: Generated<string>;
  kind: string;
  message: OptionalNullable<string>;
  data: JsonNullable;
}

export interface TaskRunsTable {
  task_run_id: Generated<string>;
  run_id: string;
  task_name: string;
  tag: string;
  signature: string;
  status: string;
  exit_code: ColumnType<number | null, number | null | undefined, number | null>;
  started_at: OptionalNullable<string>;
  finished_at: OptionalNullable<string>;
  error: OptionalNullable<string>;
}

export interface CacheEntriesTable {
  signature: string;
  task_name: string;
  outputs: Json;
  created_at: Generated<string>;
}

export interface DB {
  pipeline_runs: PipelineRunsTable;
  run_events: RunEventsTable;
  task_runs: TaskRunsTable;
  cache_entries: CacheEntriesTable;
}
