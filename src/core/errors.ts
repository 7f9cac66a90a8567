export type PipelineErrorKind =
  | "configuration"
  | "topology"
  | "tool_execution"
  | "threshold_empty"
  | "missing_key"
  | "cancelled";

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
}

/** Contradictory or missing options; raised before any task runs. */
export class ConfigurationError extends PipelineError {
  readonly kind = "configuration" as const;

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Structural mismatch inside the graph (list arity, double subscription, unpaired mandatory arm). */
export class TopologyError extends PipelineError {
  readonly kind = "topology" as const;

  constructor(
    message: string,
    readonly node: string | null = null
  ) {
    super(message);
    this.name = "TopologyError";
  }
}

export class ToolExecutionError extends PipelineError {
  readonly kind = "tool_execution" as const;

  constructor(
    message: string,
    readonly node: string,
    readonly key: string,
    readonly exitCode: number | null,
    readonly stderrTail: string
  ) {
    super(message);
    this.name = "ToolExecutionError";
  }
}

export class ThresholdEmptyError extends PipelineError {
  readonly kind = "threshold_empty" as const;

  constructor(
    readonly setName: string,
    readonly branch: string,
    readonly psmConfLvl: number,
    readonly pepConfLvl: number
  ) {
    super(
      `no ${branch} PSMs left for set ${setName} after filtering at psmconflvl=${psmConfLvl} and pepconflvl=${pepConfLvl}`
    );
    this.name = "ThresholdEmptyError";
  }
}

export class MissingKeyError extends PipelineError {
  readonly kind = "missing_key" as const;

  constructor(
    readonly lookup: string,
    readonly key: string
  ) {
    super(`${lookup}: no entry for key "${key}"`);
    this.name = "MissingKeyError";
  }
}

export class CancelledError extends PipelineError {
  readonly kind = "cancelled" as const;

  constructor(message: string) {
    super(message);
    this.name = "CancelledError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function assertNever(value: never, context: string): never {
  throw new ConfigurationError(`${context}: unmapped value ${String(value)}`);
}
