import * as z from "zod/v4";
import { defineTask } from "../types.js";

const zSetName = z.string().regex(/^[A-Za-z0-9_.-]+$/);

const zCompetitionParams = {
  setName: zSetName,
  /** Column ranked by the competition; the primary score or its raw fallback. */
  scoreColumn: z.string().min(1),
  /** Scores where lower is better (q-values) are compared on -log10. */
  logScore: z.boolean()
};

/**
 * Best-scoring peptide per protein, one target list competed against one
 * decoy list; assigns a q-value per protein.
 */
export const proteinFdrTask = defineTask({
  name: "protein_fdr",
  version: "v1",
  description: "Protein-level target/decoy competition for one set.",
  inputs: ["target", "decoy"],
  outputs: [{ name: "table", path: "proteins.txt" }],
  command: [
    "msstitch",
    "proteins",
    "-i",
    "{{in.target}}",
    "--decoyfn",
    "{{in.decoy}}",
    "--scorecolpattern",
    "{{param.scoreColumn}}",
    ["--logscore", "{{param.logScore}}"],
    "-o",
    "{{out.table}}"
  ],
  when: (cfg) => !cfg.onlypeptides,
  resources: { cpus: 1, memoryMb: 2048 },
  params: z.object({ ...zCompetitionParams, accType: z.literal("protein") })
});

/** Picked FDR for genes and symbols; needs both FASTA files to resolve shared peptides. */
export const pickedFdrTask = defineTask({
  name: "picked_fdr",
  version: "v1",
  description: "Picked target/decoy competition at gene or symbol level for one set.",
  inputs: ["target", "decoy", "tdb", "decoydb"],
  outputs: [{ name: "table", path: "features.txt" }],
  command: [
    "msstitch",
    "{{param.accType}}s",
    "-i",
    "{{in.target}}",
    "--decoyfn",
    "{{in.decoy}}",
    "--targetfasta",
    "{{in.tdb}}",
    "--decoyfasta",
    "{{in.decoydb}}",
    "--fdrtype",
    "picked",
    "--scorecolpattern",
    "{{param.scoreColumn}}",
    ["--logscore", "{{param.logScore}}"],
    "-o",
    "{{out.table}}"
  ],
  when: (cfg) => !cfg.onlypeptides && (cfg.genes || cfg.symbols),
  resources: { cpus: 1, memoryMb: 2048 },
  params: z.object({ ...zCompetitionParams, accType: z.enum(["gene", "symbol"]) })
});
