import path from "path";
import { ConfigurationError } from "../core/errors.js";
import { placeholdersOf } from "./commandTemplate.js";
import type { TaskSpec } from "./types.js";

const TASK_NAME_RE = /^[a-z][a-z0-9_]*$/;
const VERSION_RE = /^v\d+(\.\d+)*$/;
const OUTPUT_NAME_RE = /^[a-z][a-z0-9_]*$/;

function assertSafeRelpath(task: string, output: string, rel: string): void {
  if (rel.trim() !== rel || rel.length === 0 || rel.length > 256) {
    throw new ConfigurationError(`task:${task}: invalid path for output ${output}: "${rel}"`);
  }
  const normalized = path.posix.normalize(rel);
  if (path.posix.isAbsolute(rel) || normalized.startsWith("..") || normalized !== rel) {
    throw new ConfigurationError(`task:${task}: output ${output} must be a safe relative path: ${rel}`);
  }
  if ((rel.match(/\*/g) ?? []).length > 1 || path.posix.dirname(rel).includes("*")) {
    throw new ConfigurationError(`task:${task}: output ${output} may use one "*" in its file name only: ${rel}`);
  }
}

export function validateTaskSpec(task: TaskSpec): void {
  if (!TASK_NAME_RE.test(task.name) || task.name.length > 64) {
    throw new ConfigurationError(`task: invalid name: ${task.name}`);
  }
  if (!VERSION_RE.test(task.version)) {
    throw new ConfigurationError(`task:${task.name}: invalid version: ${task.version}`);
  }
  if (task.tolerateFailure && task.bestEffort) {
    throw new ConfigurationError(`task:${task.name}: tolerateFailure and bestEffort are exclusive`);
  }
  if (task.resources.cpus < 1 || task.resources.memoryMb < 1) {
    throw new ConfigurationError(`task:${task.name}: resources must be positive`);
  }
  if (task.command.length === 0) {
    throw new ConfigurationError(`task:${task.name}: command must not be empty`);
  }

  const inputs = new Set<string>();
  for (const input of task.inputs) {
    if (inputs.has(input)) throw new ConfigurationError(`task:${task.name}: duplicate input: ${input}`);
    inputs.add(input);
  }

  const outputs = new Set<string>();
  const paths = new Set<string>();
  for (const out of task.outputs) {
    if (!OUTPUT_NAME_RE.test(out.name)) throw new ConfigurationError(`task:${task.name}: invalid output name: ${out.name}`);
    if (outputs.has(out.name)) throw new ConfigurationError(`task:${task.name}: duplicate output: ${out.name}`);
    outputs.add(out.name);
    assertSafeRelpath(task.name, out.name, out.path);
    if (paths.has(out.path)) throw new ConfigurationError(`task:${task.name}: duplicate output path: ${out.path}`);
    paths.add(out.path);
  }

  for (const p of placeholdersOf(task.command)) {
    if (p.scope === "in" && !inputs.has(p.name)) {
      throw new ConfigurationError(`task:${task.name}: command references undeclared input ${p.name}`);
    }
    if (p.scope === "out" && !outputs.has(p.name)) {
      throw new ConfigurationError(`task:${task.name}: command references undeclared output ${p.name}`);
    }
  }
}

/** Validated, name-unique set of task definitions. */
export class TaskRegistry {
  private readonly byName = new Map<string, TaskSpec>();

  constructor(tasks: readonly TaskSpec[] = []) {
    for (const t of tasks) this.register(t);
  }

  register(task: TaskSpec): void {
    validateTaskSpec(task);
    if (this.byName.has(task.name)) throw new ConfigurationError(`task: duplicate name: ${task.name}`);
    this.byName.set(task.name, task);
  }

  get(name: string): TaskSpec {
    const t = this.byName.get(name);
    if (!t) throw new ConfigurationError(`task: unknown task ${name}`);
    return t;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  list(): TaskSpec[] {
    return [...this.byName.values()];
  }
}
