import * as z from "zod/v4";
import { FEATURE_TYPES, ISOBARIC_PLEXES } from "../../config/enums.js";
import { defineTask } from "../types.js";

const zSetName = z.string().regex(/^[A-Za-z0-9_.-]+$/);
const zTd = z.enum(["target", "decoy"]);

export const createPsmTableTask = defineTask({
  name: "create_psm_table",
  version: "v1",
  description: "Filters one set/arm PSM table at the PSM and peptide q-value cutoffs and adds lookup columns.",
  inputs: ["psms", "lookup", "db"],
  outputs: [{ name: "psmtable", path: "psms.txt", nonEmpty: true }],
  command: [
    "msstitch",
    "psmtable",
    "-i",
    "{{in.psms}}",
    "--dbfile",
    "{{in.lookup}}",
    "--fasta",
    "{{in.db}}",
    "--filtpsm",
    "{{param.psmconflvl}}",
    "--filtpep",
    "{{param.pepconflvl}}",
    ["--isobaric", "{{param.isobaric}}"],
    ["--denompatterns", "{{param.denoms}}"],
    ["--mediansweep", "{{param.medianSweep}}"],
    "--setname",
    "{{param.setName}}",
    ["--fractions", "{{param.fractions}}"],
    "-o",
    "{{out.psmtable}}"
  ],
  resources: { cpus: 1, memoryMb: 4096 },
  params: z.object({
    setName: zSetName,
    td: zTd,
    psmconflvl: z.number().gt(0).lte(1),
    pepconflvl: z.number().gt(0).lte(1),
    isobaric: z.enum(ISOBARIC_PLEXES).nullable(),
    /** Denominator channels of this set; null means no ratios or a median sweep. */
    denoms: z.array(z.string().min(1)).nullable(),
    medianSweep: z.boolean(),
    fractions: z.boolean()
  })
});

export const piAnnotationTask = defineTask({
  name: "pi_annotation",
  version: "v1",
  description: "Adds predicted and observed isoelectric point columns from the hiRIEF peptide table.",
  inputs: ["psmtable", "pitable"],
  outputs: [{ name: "annotated", path: "psms_pi.txt" }],
  command: ["peptide_pi_annotator.py", "-i", "{{in.pitable}}", "-p", "{{in.psmtable}}", "--out", "{{out.annotated}}"],
  when: (cfg) => cfg.hirief !== null,
  resources: { cpus: 1, memoryMb: 2048 },
  params: z.object({ setName: zSetName, td: zTd })
});

export const splitPsmPlatesTask = defineTask({
  name: "split_psm_plates",
  version: "v1",
  description: "Splits one set's target PSM table into per-plate tables.",
  inputs: ["psmtable"],
  outputs: [{ name: "plates", path: "plates/*_psms.txt" }],
  command: ["msstitch", "split", "-i", "{{in.psmtable}}", "--splitcol", "Plate", "--outdir", "plates", "--plates", "{{param.plates}}"],
  when: (cfg) => cfg.fractions,
  resources: { cpus: 1, memoryMb: 1024 },
  params: z.object({
    setName: zSetName,
    plates: z.array(z.string().min(1)).min(1)
  })
});

export const createPeptideTableTask = defineTask({
  name: "create_peptide_table",
  version: "v1",
  description: "Peptide table of one set/arm from its filtered PSM table.",
  inputs: ["psmtable"],
  outputs: [{ name: "peptides", path: "peptides.txt" }],
  command: [
    "msstitch",
    "peptides",
    "-i",
    "{{in.psmtable}}",
    "--spectracol",
    "1",
    "--scorecolpattern",
    "svm",
    ["--isobquantcolpattern", "{{param.isobaric}}"],
    ["--ms1quantcolpattern", "{{param.ms1Quant}}"],
    "-o",
    "{{out.peptides}}"
  ],
  resources: { cpus: 1, memoryMb: 2048 },
  params: z.object({
    setName: zSetName,
    td: zTd,
    isobaric: z.enum(ISOBARIC_PLEXES).nullable(),
    ms1Quant: z.string().nullable()
  })
});

export const mergeSetTablesTask = defineTask({
  name: "merge_set_tables",
  version: "v1",
  description: "Merges per-set feature tables of one accession type into one table.",
  inputs: ["tables", "lookup"],
  outputs: [{ name: "merged", path: "merged.txt" }],
  command: [
    "msstitch",
    "merge",
    "-i",
    "{{in.tables}}",
    "--setnames",
    "{{param.setNames}}",
    "--dbfile",
    "{{in.lookup}}",
    "--featcol",
    "{{param.accType}}",
    ["--isobaric", "{{param.isobaric}}"],
    "-o",
    "{{out.merged}}"
  ],
  resources: { cpus: 1, memoryMb: 4096 },
  params: z.object({
    accType: z.enum(FEATURE_TYPES),
    /** One set name per input table, in the same order. */
    setNames: z.array(zSetName).min(1),
    isobaric: z.enum(ISOBARIC_PLEXES).nullable()
  })
});

export const normalizeTableTask = defineTask({
  name: "normalize_table",
  version: "v1",
  description: "Channel-median normalization of a merged isobaric table.",
  inputs: ["table"],
  outputs: [{ name: "normalized", path: "normalized.txt" }],
  command: ["msstitch", "isonormalize", "-i", "{{in.table}}", "--median-normalize", "--plex", "{{param.plex}}", "-o", "{{out.normalized}}"],
  when: (cfg) => cfg.normalize,
  resources: { cpus: 1, memoryMb: 2048 },
  params: z.object({
    accType: z.enum(FEATURE_TYPES),
    plex: z.enum(ISOBARIC_PLEXES)
  })
});

export const deqmsTask = defineTask({
  name: "deqms",
  version: "v1",
  description: "Differential expression (DEqMS) over a merged isobaric table.",
  inputs: ["table", "sampletable"],
  outputs: [{ name: "deqms", path: "deqms.txt" }],
  command: ["deqms.R", "--table", "{{in.table}}", "--sampletable", "{{in.sampletable}}", "--feattype", "{{param.accType}}", "--out", "{{out.deqms}}"],
  when: (cfg) => cfg.deqms,
  resources: { cpus: 1, memoryMb: 4096 },
  params: z.object({
    accType: z.enum(FEATURE_TYPES)
  })
});
