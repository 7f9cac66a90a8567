import { ulid } from "ulid";

export type RunId = `run_${string}`;
export type Sha256 = `sha256:${string}`;

export function newRunId(): RunId {
  return `run_${ulid()}`;
}

export function isRunId(value: string): value is RunId {
  return /^run_[0-9A-HJKMNP-TV-Z]{26}$/.test(value);
}

