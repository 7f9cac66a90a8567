import * as z from "zod/v4";
import { defineTask } from "../types.js";

export const softwareVersionsTask = defineTask({
  name: "software_versions",
  version: "v1",
  description: "Reports the version of every external tool.",
  inputs: [],
  outputs: [{ name: "versions", path: "software_versions.txt" }],
  command: [
    "sh",
    "-c",
    "{ echo msgf_plus: $(msgf_plus -version 2>&1 | head -n1); echo percolator: $(percolator -h 2>&1 | head -n1); echo msstitch: $(msstitch --version); } > {{out.versions}}"
  ],
  tolerateFailure: true,
  resources: { cpus: 1, memoryMb: 256 },
  params: z.object({})
});

export const qcPsmsTask = defineTask({
  name: "qc_psms",
  version: "v1",
  description: "PSM-level QC over one plate partition (or all sets when not fractionated).",
  inputs: ["psmtables"],
  outputs: [{ name: "qc", path: "psm_qc.json" }],
  command: ["qc_psms.R", "--partition", "{{param.partition}}", "--out", "{{out.qc}}", "{{in.psmtables}}"],
  resources: { cpus: 1, memoryMb: 2048 },
  params: z.object({
    partition: z.string().min(1),
    sets: z.array(z.string().min(1)).min(1)
  })
});

export const qcReportTask = defineTask({
  name: "qc_report",
  version: "v1",
  description: "Final QC report over the output tables, PSM QC and collected warnings.",
  inputs: ["tables", "psmqc", "warnings", "versions"],
  outputs: [{ name: "report", path: "qc_report.html" }],
  command: [
    "qc_report.R",
    "--tables",
    "{{in.tables}}",
    "--psmqc",
    "{{in.psmqc}}",
    "--warnings",
    "{{in.warnings}}",
    ["--versions", "{{in.versions}}"],
    "--feattypes",
    "{{param.featureTypes}}",
    "--out",
    "{{out.report}}"
  ],
  resources: { cpus: 1, memoryMb: 2048 },
  params: z.object({
    featureTypes: z.array(z.string().min(1)).min(1),
    partitions: z.array(z.string().min(1)).min(1)
  })
});
