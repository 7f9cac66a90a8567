import type { ZodType } from "zod/v4";
import type { RunConfig } from "../config/runConfig.js";

export type TaskParamValue = string | number | boolean | null | string[];
export type TaskParams = Record<string, TaskParamValue>;

export interface TaskOutputSpec {
  name: string;
  /** Relative to the invocation work directory. A single `*` collects every match. */
  path: string;
  /** Absence is not an error; the output resolves to an empty list. */
  optional?: boolean;
  /** Table that must keep at least one data row after the header. */
  nonEmpty?: boolean;
}

/**
 * argv template. Strings may hold `{{in.<name>}}`, `{{param.<key>}}` and
 * `{{out.<name>}}` placeholders; a string that is exactly one list-valued
 * placeholder expands to one argument per element. A nested array is an
 * optional group, dropped when any placeholder inside it is null or empty.
 */
export type CommandTemplate = ReadonlyArray<string | readonly string[]>;

export interface TaskResources {
  cpus: number;
  memoryMb: number;
}

/** Everything about a task that does not depend on its parameter type. */
export interface TaskSpec {
  name: string;
  version: string;
  description: string;
  inputs: readonly string[];
  outputs: readonly TaskOutputSpec[];
  command: CommandTemplate;
  resources: TaskResources;
  /** Pure function of the run configuration; a false result removes the node. */
  when?: (config: RunConfig) => boolean;
  /** A non-zero exit is a warning; outputs that exist are still used. */
  tolerateFailure?: boolean;
  /** A non-zero exit is a warning and the record is dropped. */
  bestEffort?: boolean;
}

export interface TaskDefinition<P extends TaskParams> extends TaskSpec {
  params: ZodType<P>;
}

export function defineTask<P extends TaskParams>(def: TaskDefinition<P>): TaskDefinition<P> {
  return def;
}

/** Output files of one invocation by declared output name. */
export type TaskOutputs = Readonly<Record<string, readonly string[]>>;
