import { promises as fs } from "fs";
import path from "path";
import type { TaskParamValue } from "../toolpacks/types.js";
import type { ExecutionResult, ToolAdapter, ToolInvocation } from "./backends/types.js";
import { floatBetween, intBetween, peptideFrom, seedFrom } from "./deterministic.js";

/** Column layout of simulated PSM and peptide tables. */
export const SIMULATED_PSM_HEADER = [
  "SpectraFile",
  "Peptide",
  "Protein",
  "Gene Name",
  "Symbol",
  "percolator svm-score",
  "q-value",
  "MSGFScore"
] as const;

export interface Table {
  header: string[];
  rows: string[][];
}

export function parseTable(text: string): Table {
  const lines = text.split(/\r?\n/).filter((l) => l.length > 0);
  const [head, ...rest] = lines;
  return { header: head ? head.split("\t") : [], rows: rest.map((l) => l.split("\t")) };
}

export function formatTable(table: Table): string {
  return [table.header, ...table.rows].map((r) => r.join("\t")).join("\n") + "\n";
}

function column(table: Table, name: string): number {
  const idx = table.header.indexOf(name);
  if (idx < 0) throw new Error(`simulated table has no column ${name}`);
  return idx;
}

export interface InSilicoJob {
  invocation: ToolInvocation;
  seed: Buffer;
  input(name: string): readonly string[];
  readInput(name: string, index?: number): Promise<string>;
  param(name: string): TaskParamValue;
  write(output: string, text: string): Promise<void>;
  /** Writes to a path relative to the work directory (for glob outputs). */
  writeRelative(relpath: string, text: string): Promise<void>;
}

export interface InSilicoOutcome {
  exitCode: number;
  stderr?: string;
}

export type InSilicoScript = (job: InSilicoJob) => Promise<InSilicoOutcome | void>;

function str(value: TaskParamValue): string {
  if (Array.isArray(value)) return value.join(",");
  return value === null ? "" : String(value);
}

function list(value: TaskParamValue): string[] {
  return Array.isArray(value) ? value : [];
}

function simulatedPsms(seed: Buffer, source: string, arm: "target" | "decoy", count: number): string[][] {
  const rows: string[][] = [];
  for (let i = 0; i < count; i++) {
    const s = seedFrom([seed.toString("hex"), source, arm, String(i)]);
    const n = intBetween(s, 4, 1, 40);
    const prefix = arm === "decoy" ? "decoy_" : "";
    const svm = arm === "target" ? floatBetween(s, 8, 0.5, 4) : floatBetween(s, 8, -2, 1);
    rows.push([
      source,
      peptideFrom(s, intBetween(s, 0, 7, 14)),
      `${prefix}PROT${n}`,
      `${prefix}GENE${n % 25}`,
      `${prefix}SYM${n % 25}`,
      svm.toFixed(4),
      floatBetween(s, 12, 0.0001, 0.009).toFixed(5),
      String(intBetween(s, 16, 20, 250))
    ]);
  }
  return rows;
}

async function copyTableWithColumn(job: InSilicoJob, inputName: string, output: string, name: string, value: string): Promise<void> {
  const table = parseTable(await job.readInput(inputName));
  await job.write(
    output,
    formatTable({ header: [...table.header, name], rows: table.rows.map((r) => [...r, value]) })
  );
}

/** Toy competition: best score per accession, q-value = decoys / targets at or above each target score. */
async function compete(job: InSilicoJob, accColumn: string): Promise<void> {
  const scoreColumn = str(job.param("scoreColumn"));
  const logScore = job.param("logScore") === true;
  const best = async (name: string): Promise<Map<string, number>> => {
    const table = parseTable(await job.readInput(name));
    const a = column(table, accColumn);
    const sc = column(table, scoreColumn);
    const out = new Map<string, number>();
    for (const r of table.rows) {
      const raw = Number(r[sc]);
      if (!Number.isFinite(raw)) continue;
      const score = logScore ? -Math.log10(Math.max(raw, 1e-12)) : raw;
      const acc = r[a] ?? "";
      out.set(acc, Math.max(out.get(acc) ?? -Infinity, score));
    }
    return out;
  };
  const targets = await best("target");
  const decoys = [...(await best("decoy")).values()];
  const rows = [...targets.entries()]
    .sort((x, y) => y[1] - x[1] || (x[0] < y[0] ? -1 : 1))
    .map(([acc, score], rank) => {
      const decoysAbove = decoys.filter((d) => d >= score).length;
      return [acc, score.toFixed(4), (decoysAbove / (rank + 1)).toFixed(5)];
    });
  await job.write("table", formatTable({ header: [accColumn, "best score", "q-value"], rows }));
}

const ACCESSION_COLUMNS: Record<string, string> = {
  peptide: "Peptide",
  protein: "Protein",
  gene: "Gene Name",
  symbol: "Symbol"
};

export const DEFAULT_SCRIPTS: Readonly<Record<string, InSilicoScript>> = {
  async software_versions(job) {
    await job.write("versions", "msgf_plus: v2024.03.26\npercolator: 3.06.1\nmsstitch: 3.16\n");
  },

  async create_decoy_db(job) {
    const tdb = await job.readInput("tdb");
    const decoy = tdb
      .split(/\r?\n/)
      .map((l) => (l.startsWith(">") ? `>decoy_${l.slice(1)}` : l.split("").reverse().join("")))
      .join("\n");
    await job.write("decoy", decoy);
    await job.write("concat", `${tdb.trimEnd()}\n${decoy}`);
  },

  async quant_isobaric(job) {
    await job.write("isobaric", `<consensusXML plex="${str(job.param("plex"))}" sample="${str(job.param("sample"))}" seed="${job.seed.toString("hex", 0, 8)}"/>\n`);
  },

  async quant_ms1(job) {
    const rows: string[][] = [];
    for (let i = 0; i < 4; i++) {
      rows.push([floatBetween(job.seed, i * 4, 400, 1200).toFixed(4), String(intBetween(job.seed, i * 4 + 2, 2, 4)), String(intBetween(job.seed, i * 4 + 1, 1e4, 1e7))]);
    }
    await job.write("features", formatTable({ header: ["mz", "charge", "intensitySum"], rows }));
  },

  async create_spectra_lookup(job) {
    const lines = job.input("mzml").map((f, i) => `${path.basename(f)}\t${list(job.param("setNames"))[i] ?? ""}`);
    lines.push(`ms1=${job.input("ms1").length}`, `isobaric=${job.input("isobaric").length}`);
    await job.write("lookup", lines.join("\n") + "\n");
  },

  async load_quant_lookup(job) {
    await job.write("lookup", await job.readInput("lookup"));
  },

  async msgf_search(job) {
    await job.write(
      "mzid",
      `<MzIdentML sample="${str(job.param("sample"))}" set="${str(job.param("setName"))}" inst="${str(job.param("instrument"))}" seed="${job.seed.toString("hex", 0, 8)}"/>\n`
    );
  },

  async percolator(job) {
    await job.write("perco", `<percolator_output set="${str(job.param("setName"))}" psms="${job.input("mzids").length}" seed="${job.seed.toString("hex", 0, 8)}"/>\n`);
  },

  async svm_to_tsv(job) {
    const target: string[][] = [];
    const decoy: string[][] = [];
    for (let i = 0; i < job.input("mzids").length; i++) {
      const mzid = await job.readInput("mzids", i);
      const source = /sample="([^"]*)"/.exec(mzid)?.[1] ?? `search${i}`;
      target.push(...simulatedPsms(job.seed, source, "target", 6));
      decoy.push(...simulatedPsms(job.seed, source, "decoy", 4));
    }
    await job.write("target", formatTable({ header: [...SIMULATED_PSM_HEADER], rows: target }));
    await job.write("decoy", formatTable({ header: [...SIMULATED_PSM_HEADER], rows: decoy }));
  },

  async create_psm_table(job) {
    const table = parseTable(await job.readInput("psms"));
    const q = column(table, "q-value");
    const psmconflvl = Number(job.param("psmconflvl"));
    const pepconflvl = Number(job.param("pepconflvl"));
    const cutoff = Math.min(psmconflvl, pepconflvl);
    const rows = table.rows.filter((r) => Number(r[q]) <= cutoff).map((r) => [...r, str(job.param("setName"))]);
    await job.write("psmtable", formatTable({ header: [...table.header, "Biological set"], rows }));
  },

  async pi_annotation(job) {
    await copyTableWithColumn(job, "psmtable", "annotated", "Predicted pI", "6.5");
  },

  async split_psm_plates(job) {
    const table = parseTable(await job.readInput("psmtable"));
    const plates = list(job.param("plates"));
    for (const [i, plate] of plates.entries()) {
      const rows = table.rows.filter((_r, idx) => idx % plates.length === i);
      await job.writeRelative(`plates/${plate}_psms.txt`, formatTable({ header: [...table.header, "Plate"], rows: rows.map((r) => [...r, plate]) }));
    }
  },

  async create_peptide_table(job) {
    const table = parseTable(await job.readInput("psmtable"));
    const pep = column(table, "Peptide");
    const keep = SIMULATED_PSM_HEADER.slice(1).map((c) => column(table, c));
    const seen = new Map<string, string[]>();
    for (const r of table.rows) {
      const key = r[pep] ?? "";
      if (!seen.has(key)) seen.set(key, keep.map((i) => r[i] ?? ""));
    }
    const rows = [...seen.values()].sort((a, b) => ((a[0] ?? "") < (b[0] ?? "") ? -1 : 1));
    await job.write("peptides", formatTable({ header: SIMULATED_PSM_HEADER.slice(1), rows }));
  },

  async protein_fdr(job) {
    await compete(job, "Protein");
  },

  async picked_fdr(job) {
    await compete(job, ACCESSION_COLUMNS[str(job.param("accType"))] ?? "Gene Name");
  },

  async merge_set_tables(job) {
    const setNames = list(job.param("setNames"));
    const accColumn = ACCESSION_COLUMNS[str(job.param("accType"))] ?? "Protein";
    const merged = new Map<string, string[]>();
    const files = job.input("tables");
    for (let i = 0; i < files.length; i++) {
      const table = parseTable(await job.readInput("tables", i));
      const a = column(table, accColumn);
      const q = column(table, "q-value");
      for (const r of table.rows) {
        const acc = r[a] ?? "";
        const values = merged.get(acc) ?? setNames.map(() => "NA");
        values[i] = r[q] ?? "NA";
        merged.set(acc, values);
      }
    }
    const rows = [...merged.entries()].sort((x, y) => (x[0] < y[0] ? -1 : 1)).map(([acc, values]) => [acc, ...values]);
    await job.write("merged", formatTable({ header: [accColumn, ...setNames.map((s) => `${s}_q-value`)], rows }));
  },

  async normalize_table(job) {
    await copyTableWithColumn(job, "table", "normalized", "normalized", "1.0");
  },

  async deqms(job) {
    await copyTableWithColumn(job, "table", "deqms", "sca.adj.pva", "0.5");
  },

  async qc_psms(job) {
    const counts: Record<string, number> = {};
    for (let i = 0; i < job.input("psmtables").length; i++) {
      const file = job.input("psmtables")[i] ?? "";
      counts[`${i}:${path.basename(file)}`] = parseTable(await job.readInput("psmtables", i)).rows.length;
    }
    await job.write("qc", JSON.stringify({ partition: job.param("partition"), sets: job.param("sets"), psms: counts }, null, 2) + "\n");
  },

  async qc_report(job) {
    const warnings = await job.readInput("warnings");
    const tables = job.input("tables").map((f) => `<li>${path.basename(path.dirname(f))}/${path.basename(f)}</li>`);
    await job.write(
      "report",
      `<html><body><h1>QC</h1><ul>${tables.join("")}</ul><p>psm qc: ${job.input("psmqc").length}</p><pre>${warnings.trim()}</pre></body></html>\n`
    );
  }
};

/**
 * Stands in for the external tools: writes deterministic outputs derived from
 * input content and params. Scripts can be replaced per task.
 */
export class InSilicoAdapter implements ToolAdapter {
  readonly kind = "in_silico" as const;
  readonly executions: Array<{ task: string; tag: string }> = [];
  private readonly scripts: Readonly<Record<string, InSilicoScript>>;

  constructor(opts: { scripts?: Readonly<Record<string, InSilicoScript>> } = {}) {
    this.scripts = { ...DEFAULT_SCRIPTS, ...opts.scripts };
  }

  async execute(invocation: ToolInvocation): Promise<ExecutionResult> {
    const startedAt = new Date().toISOString();
    this.executions.push({ task: invocation.task.name, tag: invocation.tag });

    const script = this.scripts[invocation.task.name];
    if (!script) {
      return { exitCode: 127, stdout: "", stderr: `${invocation.task.name}: no simulated tool\n`, startedAt, finishedAt: startedAt };
    }

    const job: InSilicoJob = {
      invocation,
      seed: seedFrom([invocation.task.name, invocation.signature]),
      input: (name) => invocation.inputs[name] ?? [],
      readInput: async (name, index = 0) => {
        const file = invocation.inputs[name]?.[index];
        if (file === undefined) throw new Error(`${invocation.task.name}: no input ${name}[${index}]`);
        return fs.readFile(file, "utf8");
      },
      param: (name) => invocation.params[name] ?? null,
      write: async (output, text) => {
        const rel = invocation.outputs[output];
        if (rel === undefined) throw new Error(`${invocation.task.name}: undeclared output ${output}`);
        await job.writeRelative(rel, text);
      },
      writeRelative: async (relpath, text) => {
        const abs = path.join(invocation.workDir, relpath);
        await fs.mkdir(path.dirname(abs), { recursive: true });
        await fs.writeFile(abs, text);
      }
    };

    let outcome: InSilicoOutcome | void;
    try {
      outcome = await script(job);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { exitCode: 1, stdout: "", stderr: `${message}\n`, startedAt, finishedAt: new Date().toISOString() };
    }
    return {
      exitCode: outcome?.exitCode ?? 0,
      stdout: "",
      stderr: outcome?.stderr ?? "",
      startedAt,
      finishedAt: new Date().toISOString()
    };
  }
}
