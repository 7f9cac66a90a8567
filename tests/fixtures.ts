import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";

import { parseRunConfig, type RunConfig } from "../src/config/runConfig.js";
import { openDatabase, type DatabaseHandle } from "../src/db/connection.js";
import { formatTable, parseTable, type InSilicoJob } from "../src/execution/inSilico.js";
import { PostgresStore } from "../src/store/postgresStore.js";

export interface SampleRow {
  file: string;
  set: string;
  instrument?: string;
  plate?: string;
  fraction?: string;
}

export interface Workspace {
  dir: string;
  mzml(file: string): string;
  cleanup(): Promise<void>;
}

export const TWO_SETS: readonly SampleRow[] = [
  { file: "setA_f01.mzML", set: "setA" },
  { file: "setA_f02.mzML", set: "setA" },
  { file: "setB_f01.mzML", set: "setB", instrument: "velos" }
];

/** Temp directory with placeholder mzML files, a sample sheet, a FASTA and a mods file. */
export async function createWorkspace(rows: readonly SampleRow[], opts: { fractions?: boolean } = {}): Promise<Workspace> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "proteoflow-"));
  const header = opts.fractions ? "mzmlfile\tinstrument\tsetname\tplate\tfraction" : "mzmlfile\tinstrument\tsetname";
  const lines = [header];
  for (const r of rows) {
    await writeFile(path.join(dir, r.file), `<mzML id="${r.file}"/>\n`);
    const cols = [r.file, r.instrument ?? "qe", r.set];
    if (opts.fractions) cols.push(r.plate ?? "", r.fraction ?? "");
    lines.push(cols.join("\t"));
  }
  await writeFile(path.join(dir, "samples.tsv"), lines.join("\n") + "\n");
  await writeFile(path.join(dir, "target.fasta"), ">sp|P00001|PRT1_TEST test protein GN=GENE1\nMKTAYIAKQRQISFVK\n");
  await writeFile(path.join(dir, "mods.txt"), "57.021464,C,fix,any,Carbamidomethyl\n");
  return {
    dir,
    mzml: (file) => path.join(dir, file),
    cleanup: () => rm(dir, { recursive: true, force: true })
  };
}

export function baseOptions(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    mzmldef: "samples.tsv",
    tdb: "target.fasta",
    mods: "mods.txt",
    outdir: "out",
    workdir: "work",
    ...overrides
  };
}

export function workspaceConfig(ws: Workspace, overrides: Record<string, unknown> = {}): Promise<RunConfig> {
  return parseRunConfig(baseOptions(overrides), ws.dir);
}

export async function openMemoryStore(): Promise<{ database: DatabaseHandle; store: PostgresStore }> {
  const database = await openDatabase({ schemaPath: path.resolve("db/schema.sql") });
  return { database, store: new PostgresStore(database.db) };
}

/** Rewrites one column of a table the simulated tool has already written. */
export async function rewriteColumn(
  job: InSilicoJob,
  output: string,
  columnName: string,
  value: (row: string[]) => string
): Promise<void> {
  const rel = job.invocation.outputs[output];
  if (rel === undefined) throw new Error(`no output ${output}`);
  const file = path.join(job.invocation.workDir, rel);
  const table = parseTable(await readFile(file, "utf8"));
  const idx = table.header.indexOf(columnName);
  if (idx < 0) throw new Error(`no column ${columnName}`);
  const rows = table.rows.map((r) => r.map((cell, i) => (i === idx ? value(r) : cell)));
  await writeFile(file, formatTable({ header: table.header, rows }));
}
