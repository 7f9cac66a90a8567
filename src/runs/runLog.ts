import { stableJsonStringify } from "../core/canonicalJson.js";
import type { RunId, Sha256 } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { TaskRunRecord } from "../core/run.js";
import type { RunStore } from "../store/postgresStore.js";

export type WarningCode =
  | "score_fallback"
  | "unpaired_target_decoy"
  | "branch_skipped"
  | "tolerated_failure"
  | "best_effort_dropped"
  | "empty_table"
  | "no_usable_score";

export interface PipelineWarning {
  code: WarningCode;
  message: string;
  data: JsonObject | null;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Warnings ordered by code, then message, then data; independent of task completion order. */
export function sortWarnings(warnings: readonly PipelineWarning[]): PipelineWarning[] {
  return [...warnings].sort(
    (a, b) =>
      compareText(a.code, b.code) ||
      compareText(a.message, b.message) ||
      compareText(stableJsonStringify(a.data), stableJsonStringify(b.data))
  );
}

/**
 * Structured event log of one pipeline run plus the central collector of
 * non-fatal warnings. Events go to the run store and, when `echo` is set, to
 * stderr as JSON lines.
 */
export class RunLog {
  readonly runId: RunId;
  private readonly logLines: string[] = [];
  private readonly collected: PipelineWarning[] = [];
  private pendingWrites: Promise<void> = Promise.resolve();
  private writeFailure: { error: unknown } | null = null;

  constructor(
    private readonly store: RunStore,
    private readonly info: {
      runId: RunId;
      configHash: Sha256;
      configSnapshot: JsonObject;
      environment: JsonObject | null;
      echo: boolean;
    }
  ) {
    this.runId = info.runId;
  }

  get warnings(): readonly PipelineWarning[] {
    return this.collected;
  }

  logText(): string {
    return this.logLines.length > 0 ? this.logLines.join("\n") + "\n" : "";
  }

  async start(): Promise<void> {
    await this.store.createRun({
      runId: this.runId,
      configHash: this.info.configHash,
      configSnapshot: this.info.configSnapshot,
      environment: this.info.environment
    });
    const now = new Date().toISOString();
    await this.store.updateRun(this.runId, { startedAt: now });
    await this.event("run.started", `config=${this.info.configHash}`, { now });
  }

  async event(kind: string, message: string, data: JsonObject | null): Promise<void> {
    this.append(kind, message, data);
    await this.store.addRunEvent(this.runId, kind, message, data);
  }

  /**
   * Fire-and-track variant for call sites inside synchronous operator
   * callbacks; writes are chained and awaited by `flush()`.
   */
  note(kind: string, message: string, data: JsonObject | null): void {
    this.append(kind, message, data);
    this.pendingWrites = this.pendingWrites
      .then(() => this.store.addRunEvent(this.runId, kind, message, data))
      .catch((err: unknown) => {
        if (!this.writeFailure) this.writeFailure = { error: err };
      });
  }

  warn(code: WarningCode, message: string, data: JsonObject | null = null): void {
    this.collected.push({ code, message, data });
    this.note(`warning.${code}`, message, data);
  }

  async recordTask(record: TaskRunRecord): Promise<void> {
    await this.store.recordTaskRun(record);
  }

  async flush(): Promise<void> {
    await this.pendingWrites;
    if (this.writeFailure) throw this.writeFailure.error;
  }

  async finishSuccess(result: JsonObject, summary: string): Promise<void> {
    await this.finish("succeeded", null, summary, result);
  }

  async finishFailure(errorMessage: string): Promise<void> {
    await this.finish("failed", errorMessage, `failed: ${errorMessage}`, null);
  }

  private append(kind: string, message: string, data: JsonObject | null): void {
    const line = JSON.stringify({ ts: new Date().toISOString(), kind, message, data });
    this.logLines.push(line);
    if (this.info.echo) console.error(line);
  }

  private async finish(
    status: "succeeded" | "failed",
    error: string | null,
    finalMessage: string,
    result: JsonObject | null
  ): Promise<void> {
    if (status === "succeeded") await this.flush();
    else await this.pendingWrites;
    await this.event(`run.${status}`, finalMessage, error ? { error } : null);
    await this.store.updateRun(this.runId, {
      status,
      finishedAt: new Date().toISOString(),
      error,
      resultJson: result ? { ...result, provenance_run_id: this.runId } : null
    });
  }
}
