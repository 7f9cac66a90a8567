import type { RunId, Sha256 } from "./ids.js";
import type { JsonObject } from "./json.js";

export type RunStatus = "running" | "succeeded" | "failed";

export interface RunRecord {
  runId: RunId;
  configHash: Sha256;
  status: RunStatus;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  configSnapshot: JsonObject;
  environment: JsonObject | null;
  error: string | null;
  resultJson: JsonObject | null;
}

export interface RunEventRecord {
  ts: string;
  kind: string;
  message: string | null;
  data: JsonObject | null;
}

export type TaskRunStatus = "succeeded" | "cached" | "failed" | "tolerated" | "dropped" | "cancelled";

export interface TaskRunRecord {
  runId: RunId;
  taskName: string;
  tag: string;
  signature: Sha256;
  status: TaskRunStatus;
  exitCode: number | null;
  startedAt: string | null;
  finishedAt: string | null;
  error: string | null;
}

export interface CachedFile {
  relpath: string;
  sha256: Sha256;
  sizeBytes: number;
}

/** Output files of one invocation, by declared output name. */
export type CachedOutputs = Record<string, CachedFile[]>;

export interface CacheEntry {
  signature: Sha256;
  taskName: string;
  outputs: CachedOutputs;
  createdAt: string;
}
