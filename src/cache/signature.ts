import path from "path";
import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import type { Sha256 } from "../core/ids.js";
import type { TaskParams, TaskSpec } from "../toolpacks/types.js";
import type { ContentHashIndex } from "./contentHashIndex.js";

export interface InputFileHash {
  name: string;
  sha256: Sha256;
}

export interface SignatureInput {
  taskName: string;
  taskVersion: string;
  command: TaskSpec["command"];
  outputs: TaskSpec["outputs"];
  params: TaskParams;
  /** In declared input order; files in binding order. */
  inputs: Array<{ input: string; files: InputFileHash[] }>;
}

/** Cache key of one invocation. Input files take part by base name and content, never by absolute path. */
export function deriveSignature(input: SignatureInput): Sha256 {
  return sha256Prefixed(
    stableJsonStringify({
      task: input.taskName,
      version: input.taskVersion,
      command: input.command,
      outputs: input.outputs,
      params: input.params,
      inputs: input.inputs
    })
  );
}

export async function hashInputs(
  task: TaskSpec,
  bound: Readonly<Record<string, readonly string[]>>,
  hashes: ContentHashIndex
): Promise<SignatureInput["inputs"]> {
  const out: SignatureInput["inputs"] = [];
  for (const name of task.inputs) {
    const files = bound[name] ?? [];
    const hashed: InputFileHash[] = [];
    for (const f of files) {
      const { sha256 } = await hashes.hashFile(f);
      hashed.push({ name: path.basename(f), sha256 });
    }
    out.push({ input: name, files: hashed });
  }
  return out;
}

/** `<workdir>/<hex[0:2]>/<hex[2:]>` */
export function workDirFor(workRoot: string, signature: Sha256): string {
  const hex = signature.slice("sha256:".length);
  return path.join(workRoot, hex.slice(0, 2), hex.slice(2));
}
