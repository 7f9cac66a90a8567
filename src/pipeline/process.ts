import type { RunConfig } from "../config/runConfig.js";
import { CancelledError, TopologyError } from "../core/errors.js";
import type { JsonObject } from "../core/json.js";
import type { Stream } from "../dataflow/channel.js";
import type { Flow } from "../dataflow/flow.js";
import type { PipelineWarning, WarningCode } from "../runs/runLog.js";
import type { TaskCall, TaskOutcome } from "../scheduler/taskRunner.js";
import type { TaskDefinition, TaskOutputs, TaskParams } from "../toolpacks/types.js";

/** What a task node needs to run an invocation; `TaskRunner` in a real run. */
export interface TaskExecutor {
  run<P extends TaskParams>(def: TaskDefinition<P>, call: TaskCall<P>, signal: AbortSignal): Promise<TaskOutcome>;
}

/** The part of `RunLog` the graph writes to. */
export interface PipelineLog {
  readonly warnings: readonly PipelineWarning[];
  warn(code: WarningCode, message: string, data?: JsonObject | null): void;
  note(kind: string, message: string, data: JsonObject | null): void;
}

export interface PipelineContext {
  flow: Flow;
  config: RunConfig;
  executor: TaskExecutor;
  log: PipelineLog;
  /** Per-run scratch directory for files the graph itself writes. */
  stagingDir: string;
}

export type CompletedOutcome = Exclude<TaskOutcome, { status: "dropped" }>;

/**
 * Task node: one invocation of `def` per input record, run concurrently and
 * emitted in completion order. Returns null (and records a skipped node) when
 * the task's `when` predicate is false for this configuration.
 */
export function processNode<R, P extends TaskParams, O>(
  ctx: PipelineContext,
  def: TaskDefinition<P>,
  src: Stream<R>,
  opts: {
    call: (record: R) => TaskCall<P>;
    output: (record: R, outputs: TaskOutputs, outcome: CompletedOutcome) => O;
  }
): Stream<O> | null {
  const { flow } = ctx;
  const node = flow.nodeName(def.name);
  if (def.when && !def.when(ctx.config)) {
    flow.declareSkipped("task", node);
    return null;
  }

  const input = src.subscribe(node);
  const out = flow.stream<O>(`${node}.out`, node);
  flow.declare({ kind: "task", name: node, inputs: [src], outputs: [out] }, async () => {
    const invocations: Array<Promise<void>> = [];
    const failures: Array<{ error: unknown }> = [];
    try {
      for await (const record of input) {
        invocations.push(
          (async () => {
            const outcome = await ctx.executor.run(def, opts.call(record), flow.signal);
            if (outcome.status === "dropped") return;
            out.emit(opts.output(record, outcome.outputs, outcome));
          })().then(
            () => undefined,
            (err: unknown) => {
              // Never rejects; the first failure is rethrown once the input drains.
              failures.push({ error: err });
              if (!(err instanceof CancelledError)) flow.cancel(err);
            }
          )
        );
      }
    } catch (err) {
      failures.push({ error: err });
    }
    await Promise.all(invocations);
    const [first] = failures;
    if (first) throw first.error;
  });
  return out;
}

/** Sole file of a declared output. */
export function outputFile(outputs: TaskOutputs, name: string, context: string): string {
  const files = outputs[name] ?? [];
  const [first] = files;
  if (first === undefined || files.length > 1) {
    throw new TopologyError(`${context}: expected exactly one file for output ${name}, got ${files.length}`, context);
  }
  return first;
}

/** File of an output that may be absent (optional or tolerated). */
export function maybeOutputFile(outputs: TaskOutputs, name: string): string | null {
  return outputs[name]?.[0] ?? null;
}
