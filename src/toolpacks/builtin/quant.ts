import * as z from "zod/v4";
import { quantMode } from "../../config/runConfig.js";
import { ISOBARIC_PLEXES } from "../../config/enums.js";
import { defineTask } from "../types.js";

export const quantIsobaricTask = defineTask({
  name: "quant_isobaric",
  version: "v1",
  description: "Reporter-ion extraction (OpenMS IsobaricAnalyzer) for one mzML file.",
  inputs: ["mzml"],
  outputs: [{ name: "isobaric", path: "isobaric.consensusXML" }],
  command: [
    "IsobaricAnalyzer",
    "-type",
    "{{param.plex}}",
    "-in",
    "{{in.mzml}}",
    "-out",
    "{{out.isobaric}}",
    "-extraction:select_activation",
    "{{param.activation}}",
    "-threads",
    "{{param.threads}}"
  ],
  when: (cfg) => cfg.isobaric !== null && quantMode(cfg) === "quant",
  resources: { cpus: 1, memoryMb: 4096 },
  params: z.object({
    sample: z.string().min(1),
    plex: z.enum(ISOBARIC_PLEXES),
    activation: z.string().min(1),
    threads: z.number().int().min(1)
  })
});

export const quantMs1Task = defineTask({
  name: "quant_ms1",
  version: "v1",
  description: "MS1 feature detection (Dinosaur) for one mzML file.",
  inputs: ["mzml"],
  outputs: [{ name: "features", path: "features.features.tsv" }],
  command: ["dinosaur", "--outName=features", "--concurrency={{param.threads}}", "{{in.mzml}}"],
  when: (cfg) => quantMode(cfg) === "quant",
  resources: { cpus: 1, memoryMb: 4096 },
  params: z.object({
    sample: z.string().min(1),
    threads: z.number().int().min(1)
  })
});

export const createSpectraLookupTask = defineTask({
  name: "create_spectra_lookup",
  version: "v1",
  description: "Builds the spectra/quant lookup database from all mzML files and their quant outputs.",
  inputs: ["mzml", "ms1", "isobaric"],
  outputs: [{ name: "lookup", path: "quant_lookup.sqlite" }],
  command: [
    "msstitch",
    "storespectra",
    "--spectra",
    "{{in.mzml}}",
    "--setnames",
    "{{param.setNames}}",
    ["--dinos", "{{in.ms1}}"],
    ["--isobaric", "{{in.isobaric}}"],
    "-o",
    "{{out.lookup}}"
  ],
  when: (cfg) => quantMode(cfg) !== "prebuilt",
  resources: { cpus: 1, memoryMb: 4096 },
  params: z.object({
    /** One set name per mzML file, in the same order. */
    setNames: z.array(z.string().min(1)).min(1)
  })
});

export const loadQuantLookupTask = defineTask({
  name: "load_quant_lookup",
  version: "v1",
  description: "Passthrough that loads a pre-built quant lookup instead of building one.",
  inputs: ["lookup"],
  outputs: [{ name: "lookup", path: "quant_lookup.sqlite" }],
  command: ["cp", "{{in.lookup}}", "{{out.lookup}}"],
  when: (cfg) => quantMode(cfg) === "prebuilt",
  resources: { cpus: 1, memoryMb: 512 },
  params: z.object({})
});
