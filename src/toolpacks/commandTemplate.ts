import { ConfigurationError } from "../core/errors.js";
import type { CommandTemplate, TaskOutputs, TaskParams, TaskParamValue } from "./types.js";

const PLACEHOLDER_RE = /\{\{(in|param|out)\.([A-Za-z0-9_]+)\}\}/g;
const WHOLE_PLACEHOLDER_RE = /^\{\{(in|param|out)\.([A-Za-z0-9_]+)\}\}$/;

export type PlaceholderScope = "in" | "param" | "out";

export interface Placeholder {
  scope: PlaceholderScope;
  name: string;
}

function asScope(value: string): PlaceholderScope {
  if (value === "in" || value === "param" || value === "out") return value;
  throw new ConfigurationError(`unknown placeholder scope: ${value}`);
}

export function placeholdersOf(template: CommandTemplate): Placeholder[] {
  const out: Placeholder[] = [];
  const scan = (token: string): void => {
    for (const m of token.matchAll(PLACEHOLDER_RE)) {
      const [, scope, name] = m;
      if (scope && name) out.push({ scope: asScope(scope), name });
    }
  };
  for (const item of template) {
    if (typeof item === "string") scan(item);
    else item.forEach(scan);
  }
  return out;
}

export interface TemplateBindings {
  inputs: TaskOutputs;
  params: TaskParams;
  outputs: Readonly<Record<string, string>>;
}

/**
 * Resolved value of one placeholder, or null when absent. Absent means a null
 * or false param, or an empty list; `true` is present with no values.
 */
function resolve(p: Placeholder, b: TemplateBindings, context: string): string[] | null {
  switch (p.scope) {
    case "in": {
      const files = b.inputs[p.name];
      if (!files) throw new ConfigurationError(`${context}: input ${p.name} is not bound`);
      return files.length > 0 ? [...files] : null;
    }
    case "out": {
      const rel = b.outputs[p.name];
      if (rel === undefined) throw new ConfigurationError(`${context}: output ${p.name} is not declared`);
      return [rel];
    }
    case "param": {
      if (!Object.prototype.hasOwnProperty.call(b.params, p.name)) {
        throw new ConfigurationError(`${context}: param ${p.name} is not set`);
      }
      return paramStrings(b.params[p.name] ?? null);
    }
  }
}

function paramStrings(value: TaskParamValue): string[] | null {
  if (value === null || value === false) return null;
  if (value === true) return [];
  if (Array.isArray(value)) return value.length > 0 ? [...value] : null;
  return [String(value)];
}

function renderToken(token: string, b: TemplateBindings, context: string): string[] | null {
  const whole = WHOLE_PLACEHOLDER_RE.exec(token);
  if (whole) {
    const [, scope, name] = whole;
    if (!scope || !name) return null;
    return resolve({ scope: asScope(scope), name }, b, context);
  }

  let missing = false;
  const rendered = token.replace(PLACEHOLDER_RE, (_m, scope: string, name: string) => {
    const values = resolve({ scope: asScope(scope), name }, b, context);
    if (values === null) {
      missing = true;
      return "";
    }
    return values.join(" ");
  });
  return missing ? null : [rendered];
}

/** Expands the template into argv. A required token that resolves to nothing is an error. */
export function renderCommand(template: CommandTemplate, b: TemplateBindings, context: string): string[] {
  const argv: string[] = [];
  for (const item of template) {
    if (typeof item === "string") {
      const values = renderToken(item, b, context);
      if (values === null) throw new ConfigurationError(`${context}: required argument "${item}" resolved to nothing`);
      argv.push(...values);
      continue;
    }
    const group: string[] = [];
    let complete = true;
    for (const token of item) {
      const values = renderToken(token, b, context);
      if (values === null) {
        complete = false;
        break;
      }
      group.push(...values);
    }
    if (complete) argv.push(...group);
  }
  return argv;
}
