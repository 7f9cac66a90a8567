import type { Sha256 } from "../../core/ids.js";
import type { TaskOutputs, TaskParams, TaskResources, TaskSpec } from "../../toolpacks/types.js";

export interface ExecutionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  startedAt: string;
  finishedAt: string;
}

/** One resolved task invocation, ready for an adapter. */
export interface ToolInvocation {
  task: TaskSpec;
  /** Record key, used in messages (e.g. `setA/target`). */
  tag: string;
  signature: Sha256;
  argv: string[];
  workDir: string;
  inputs: TaskOutputs;
  params: TaskParams;
  /** Declared output name → path relative to `workDir`. */
  outputs: Readonly<Record<string, string>>;
  resources: TaskResources;
}

export type AdapterKind = "local_process" | "in_silico";

/** Opaque executor of external tools: declared inputs in, declared files and an exit status out. */
export interface ToolAdapter {
  readonly kind: AdapterKind;
  execute(invocation: ToolInvocation): Promise<ExecutionResult>;
}
