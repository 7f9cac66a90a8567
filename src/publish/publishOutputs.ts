import { promises as fs } from "fs";
import path from "path";
import { sha256File, sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import type { RunId, Sha256 } from "../core/ids.js";
import type { MergedTable, PsmQc, PsmTable } from "../pipeline/graphBuilder.js";
import { sortWarnings, type PipelineWarning } from "../runs/runLog.js";
import { OUTPUT_MANIFEST_V1_SCHEMA_ID, type OutputFileEntry, type OutputManifestV1 } from "./manifest.js";

export interface PublishInput {
  outDir: string;
  runId: RunId;
  configHash: Sha256;
  psmTables: readonly PsmTable[];
  mergedTables: readonly MergedTable[];
  psmQc: readonly PsmQc[];
  report: string;
  versions: string | null;
  warnings: readonly PipelineWarning[];
  logText: string;
}

export interface PublishResult {
  outDir: string;
  manifestPath: string;
  manifestSha256: Sha256;
  files: OutputFileEntry[];
}

function requireRelativePath(p: string, label: string): string {
  const trimmed = p.trim();
  if (trimmed.length === 0) throw new Error(`${label} must be non-empty`);
  if (path.isAbsolute(trimmed)) throw new Error(`${label} must be a relative path`);
  const normalized = path.posix.normalize(trimmed);
  if (normalized.startsWith("../") || normalized === "..") throw new Error(`${label} must not contain '..' segments`);
  return normalized;
}

async function copyInto(outDir: string, relPath: string, source: string): Promise<string> {
  const safeRel = requireRelativePath(relPath, "published file path");
  const full = path.join(outDir, safeRel);
  await fs.mkdir(path.dirname(full), { recursive: true });
  await fs.copyFile(source, full);
  await fs.chmod(full, 0o644);
  return safeRel;
}

async function writeFileUtf8(outDir: string, relPath: string, content: string): Promise<string> {
  const safeRel = requireRelativePath(relPath, "published file path");
  const full = path.join(outDir, safeRel);
  await fs.mkdir(path.dirname(full), { recursive: true });
  await fs.writeFile(full, content, "utf8");
  return safeRel;
}

/** Published name of a merged table, e.g. `proteins_table.txt`. */
export function mergedTableName(featureType: MergedTable["featureType"]): string {
  return `${featureType}s_table.txt`;
}

export function psmTableName(table: Pick<PsmTable, "setName" | "td">): string {
  return `${table.setName}_${table.td}_psms.txt`;
}

/**
 * Copies the final tables out of the work area into the run's output
 * directory and writes `manifest.json` over everything published.
 */
export async function publishOutputs(input: PublishInput): Promise<PublishResult> {
  const { outDir } = input;
  await fs.mkdir(outDir, { recursive: true });

  const written: string[] = [];
  for (const t of input.psmTables) written.push(await copyInto(outDir, psmTableName(t), t.table));
  for (const t of input.mergedTables) written.push(await copyInto(outDir, mergedTableName(t.featureType), t.table));
  for (const q of input.psmQc) written.push(await copyInto(outDir, `qc/psm_qc_${q.partition}.json`, q.qc));
  written.push(await copyInto(outDir, "qc/qc_report.html", input.report));
  if (input.versions !== null) written.push(await copyInto(outDir, "software_versions.txt", input.versions));
  written.push(await writeFileUtf8(outDir, "warnings.json", JSON.stringify(sortWarnings(input.warnings), null, 2) + "\n"));
  written.push(await writeFileUtf8(outDir, "pipeline.log", input.logText));

  const files: OutputFileEntry[] = [];
  for (const rel of [...written].sort()) {
    const { sha256, sizeBytes } = await sha256File(path.join(outDir, rel));
    files.push({ path: rel, sha256, size_bytes: sizeBytes });
  }

  const manifest: OutputManifestV1 = {
    schema_id: OUTPUT_MANIFEST_V1_SCHEMA_ID,
    manifest_version: 1,
    run_id: input.runId,
    config_hash: input.configHash,
    files
  };
  const manifestBytes = Buffer.from(stableJsonStringify(manifest), "utf8");
  await fs.writeFile(path.join(outDir, "manifest.json"), manifestBytes);
  const manifestSha256 = sha256Prefixed(manifestBytes);
  await writeFileUtf8(outDir, "manifest.sha256", `${manifestSha256}  manifest.json\n`);

  return { outDir, manifestPath: path.join(outDir, "manifest.json"), manifestSha256, files };
}
