import * as z from "zod/v4";
import { defineTask } from "../types.js";

const zSetName = z.string().regex(/^[A-Za-z0-9_.-]+$/);

export const createDecoyDbTask = defineTask({
  name: "create_decoy_db",
  version: "v1",
  description: "Tryptic-reverse decoy database and concatenated target+decoy FASTA.",
  inputs: ["tdb"],
  outputs: [
    { name: "decoy", path: "decoy.fa" },
    { name: "concat", path: "td_concat.fa" }
  ],
  command: ["sh", "-c", "msstitch makedecoy -i {{in.tdb}} --scramble tryp_rev -o {{out.decoy}} && cat {{in.tdb}} {{out.decoy}} > {{out.concat}}"],
  resources: { cpus: 1, memoryMb: 2048 },
  params: z.object({})
});

export const msgfSearchTask = defineTask({
  name: "msgf_search",
  version: "v1",
  description: "MSGF+ database search of one mzML file against the concatenated database.",
  inputs: ["mzml", "db", "mods"],
  outputs: [{ name: "mzid", path: "search.mzid" }],
  command: [
    "msgf_plus",
    "-s",
    "{{in.mzml}}",
    "-d",
    "{{in.db}}",
    "-mod",
    "{{in.mods}}",
    "-inst",
    "{{param.instrument}}",
    "-m",
    "{{param.fragmentation}}",
    "-e",
    "{{param.enzyme}}",
    ["-protocol", "{{param.protocol}}"],
    "-tda",
    "0",
    "-addFeatures",
    "1",
    "-thread",
    "{{param.threads}}",
    "-o",
    "{{out.mzid}}"
  ],
  resources: { cpus: 2, memoryMb: 8192 },
  params: z.object({
    sample: z.string().min(1),
    setName: zSetName,
    instrument: z.number().int().min(0),
    fragmentation: z.number().int().min(0),
    enzyme: z.number().int().min(0),
    /** MSGF+ protocol code: 4 for TMT, 2 for iTRAQ, absent otherwise. */
    protocol: z.number().int().nullable(),
    threads: z.number().int().min(1)
  })
});

export const percolatorTask = defineTask({
  name: "percolator",
  version: "v1",
  description: "Percolator rescoring of all searches of one set.",
  inputs: ["mzids"],
  outputs: [{ name: "perco", path: "perco.xml" }],
  command: [
    "sh",
    "-c",
    "msgf2pin -o pin.tab -e {{param.enzyme}} {{in.mzids}} && percolator -j pin.tab -X {{out.perco}} -N 500000 --decoy-xml-output"
  ],
  resources: { cpus: 1, memoryMb: 4096 },
  params: z.object({
    setName: zSetName,
    enzyme: z.string().min(1)
  })
});

export const svmToTsvTask = defineTask({
  name: "svm_to_tsv",
  version: "v1",
  description: "Splits Percolator output of one set into target and decoy PSM tables.",
  inputs: ["mzids", "perco"],
  outputs: [
    { name: "target", path: "target.tsv" },
    { name: "decoy", path: "decoy.tsv" }
  ],
  command: [
    "msstitch",
    "perco2psm",
    "--perco",
    "{{in.perco}}",
    "--mzids",
    "{{in.mzids}}",
    "--targetout",
    "{{out.target}}",
    "--decoyout",
    "{{out.decoy}}"
  ],
  resources: { cpus: 1, memoryMb: 2048 },
  params: z.object({ setName: zSetName })
});
