import { promises as fs } from "fs";
import path from "path";
import type { FeatureType, IsobaricPlex } from "../config/enums.js";
import { msgfEnzymeCode, msgfFragmentationCode, msgfInstrumentCode, msgfProtocolCode } from "../config/enums.js";
import { accessionTypes, quantMode, type RunConfig } from "../config/runConfig.js";
import type { SampleRecord } from "../config/sampleSheet.js";
import { ConfigurationError, MissingKeyError, ThresholdEmptyError, TopologyError } from "../core/errors.js";
import type { Stream, Value } from "../dataflow/channel.js";
import type { Flow, FlowEdge, FlowNodeKind } from "../dataflow/flow.js";
import {
  broadcast,
  choice,
  cross,
  filter,
  fromList,
  groupTuple,
  join,
  map,
  mix,
  single,
  toList,
  transpose
} from "../dataflow/operators.js";
import { sortWarnings } from "../runs/runLog.js";
import { resolveResources } from "../scheduler/taskRunner.js";
import { createBuiltinRegistry } from "../toolpacks/builtin/index.js";
import { pickedFdrTask, proteinFdrTask } from "../toolpacks/builtin/fdr.js";
import { createSpectraLookupTask, loadQuantLookupTask, quantIsobaricTask, quantMs1Task } from "../toolpacks/builtin/quant.js";
import { qcPsmsTask, qcReportTask, softwareVersionsTask } from "../toolpacks/builtin/qc.js";
import { createDecoyDbTask, msgfSearchTask, percolatorTask, svmToTsvTask } from "../toolpacks/builtin/search.js";
import {
  createPeptideTableTask,
  createPsmTableTask,
  deqmsTask,
  mergeSetTablesTask,
  normalizeTableTask,
  piAnnotationTask,
  splitPsmPlatesTask
} from "../toolpacks/builtin/tables.js";
import type { TaskSpec } from "../toolpacks/types.js";
import { chooseScoreColumns, pairTargetDecoy, TARGET_DECOY, type FdrCandidate, type TargetDecoy } from "./fdr.js";
import { maybeOutputFile, outputFile, processNode, type PipelineContext } from "./process.js";

export interface PsmTable {
  setName: string;
  td: TargetDecoy;
  table: string;
}

export interface FeatureTable {
  featureType: FeatureType;
  setName: string;
  table: string;
}

export interface MergedTable {
  featureType: FeatureType;
  table: string;
}

export interface PsmQc {
  partition: string;
  qc: string;
}

interface SampleQuant {
  sample: SampleRecord;
  ms1: string | null;
  isobaric: string | null;
}

interface ReportInputs {
  tables: MergedTable[];
  psmQc: PsmQc[];
  warnings: string;
  versions: string | null;
}

/** Values the publisher reads once the flow has finished. */
export interface PipelineSinks {
  psmTables: Value<PsmTable[]>;
  mergedTables: Value<MergedTable[]>;
  psmQc: Value<PsmQc[]>;
  report: Value<string>;
  versions: Value<string | null>;
}

export interface GraphDescription {
  nodes: Array<{ name: string; kind: FlowNodeKind; skipped: boolean }>;
  edges: FlowEdge[];
}

export interface PipelineGraph {
  flow: Flow;
  sinks: PipelineSinks;
  describe(): GraphDescription;
}

export const NOPLATES = "noplates";
const MS1_QUANT_COLUMN = "MS1 area";

/**
 * Denominator channels of one set. Null when the run has no isobaric ratios
 * or uses a median sweep; a set absent from `denoms` is an error.
 */
export function resolveDenoms(cfg: RunConfig, setName: string): string[] | null {
  if (cfg.isobaric === null || cfg.denomsBySet === null) return null;
  if (!Object.prototype.hasOwnProperty.call(cfg.denomsBySet, setName)) {
    throw new MissingKeyError("denoms", setName);
  }
  return [...cfg.denomsBySet[setName]];
}

function requireNode<T>(stream: Stream<T> | null, task: TaskSpec): Stream<T> {
  if (!stream) throw new TopologyError(`${task.name} is required by this configuration but its predicate is false`, task.name);
  return stream;
}

function requirePlex(cfg: RunConfig, option: string): IsobaricPlex {
  if (cfg.isobaric === null) throw new ConfigurationError(`${option} requires isobaric`);
  return cfg.isobaric;
}

function requirePath(value: string | null, option: string): string {
  if (value === null) throw new ConfigurationError(`${option} is not set`);
  return value;
}

/** Plates of one set in sample-sheet order. */
export function platesOf(samples: readonly SampleRecord[], setName: string): string[] {
  const out: string[] = [];
  for (const s of samples) {
    if (s.setName === setName && s.plate !== null && !out.includes(s.plate)) out.push(s.plate);
  }
  return out;
}

function plateOfFile(file: string): string {
  const m = /^(.+)_psms\.txt$/.exec(path.basename(file));
  if (!m?.[1]) throw new TopologyError(`unexpected plate table name: ${file}`, splitPsmPlatesTask.name);
  return m[1];
}

function byName(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Declares the whole pipeline for one configuration and sample sheet. The
 * shape is decided here, once; nothing runs until `flow.run()`.
 */
export function buildPipelineGraph(ctx: PipelineContext, samples: readonly SampleRecord[]): PipelineGraph {
  const { flow, config: cfg, log } = ctx;
  const mode = quantMode(cfg);
  const accTypes = accessionTypes(cfg);
  const threads = (task: TaskSpec): number => resolveResources(task, cfg.tasks).cpus;

  const registry = createBuiltinRegistry();
  for (const name of Object.keys(cfg.tasks)) {
    if (!registry.has(name)) throw new ConfigurationError(`tasks.${name}: unknown task`);
  }

  const versions = single(
    requireNode(
      processNode(ctx, softwareVersionsTask, fromList(flow, "versions.request", ["versions"]), {
        call: () => ({ tag: "versions", inputs: {}, params: {} }),
        output: (_r, outputs) => maybeOutputFile(outputs, "versions")
      }),
      softwareVersionsTask
    ),
    "versions.value"
  );

  const db = single(
    requireNode(
      processNode(ctx, createDecoyDbTask, fromList(flow, "db.target", [cfg.tdb]), {
        call: (tdb) => ({ tag: "db", inputs: { tdb: [tdb] }, params: {} }),
        output: (_tdb, outputs) => ({
          decoy: outputFile(outputs, "decoy", createDecoyDbTask.name),
          concat: outputFile(outputs, "concat", createDecoyDbTask.name)
        })
      }),
      createDecoyDbTask
    ),
    "db.value"
  );

  const sampleOutlets = broadcast(
    fromList(flow, "samples", samples),
    mode === "prebuilt" ? ["search"] : ["search", "quant"],
    "samples.fanout"
  );

  // Search, one invocation per mzML file.
  const searches = requireNode(
    processNode(ctx, msgfSearchTask, cross(sampleOutlets.get("search"), db, (sample, d) => ({ sample, db: d.concat }), "search.withDb"), {
      call: ({ sample, db: concat }) => ({
        tag: sample.fileName,
        inputs: { mzml: [sample.mzml], db: [concat], mods: [cfg.mods] },
        params: {
          sample: sample.fileName,
          setName: sample.setName,
          instrument: msgfInstrumentCode(sample.instrument),
          fragmentation: msgfFragmentationCode(cfg.activation),
          enzyme: msgfEnzymeCode(cfg.enzyme),
          protocol: msgfProtocolCode(cfg.isobaric),
          threads: threads(msgfSearchTask)
        }
      }),
      output: ({ sample }, outputs) => ({ sample, mzid: outputFile(outputs, "mzid", `msgf_search ${sample.fileName}`) })
    }),
    msgfSearchTask
  );

  const lookup = single(buildLookup(), "lookup.value");

  function buildLookup(): Stream<string> {
    if (mode === "prebuilt") {
      return requireNode(
        processNode(ctx, loadQuantLookupTask, fromList(flow, "lookup.prebuilt", [requirePath(cfg.quantlookup, "quantlookup")]), {
          call: (file) => ({ tag: "lookup", inputs: { lookup: [file] }, params: {} }),
          output: (_f, outputs) => outputFile(outputs, "lookup", loadQuantLookupTask.name)
        }),
        loadQuantLookupTask
      );
    }

    const quantSource = sampleOutlets.get("quant");
    let quant: Stream<SampleQuant>;
    if (mode === "noquant") {
      quant = map(quantSource, (sample) => ({ sample, ms1: null, isobaric: null }), "quant.passthrough");
    } else {
      const plex = cfg.isobaric;
      const fan = plex ? broadcast(quantSource, ["ms1", "isobaric"], "quant.fanout") : null;
      const ms1 = requireNode(
        processNode(ctx, quantMs1Task, fan ? fan.get("ms1") : quantSource, {
          call: (sample) => ({
            tag: sample.fileName,
            inputs: { mzml: [sample.mzml] },
            params: { sample: sample.fileName, threads: threads(quantMs1Task) }
          }),
          output: (sample, outputs) => ({ sample, ms1: outputFile(outputs, "features", `quant_ms1 ${sample.fileName}`) })
        }),
        quantMs1Task
      );
      if (plex && fan) {
        const iso = requireNode(
          processNode(ctx, quantIsobaricTask, fan.get("isobaric"), {
            call: (sample) => ({
              tag: sample.fileName,
              inputs: { mzml: [sample.mzml] },
              params: { sample: sample.fileName, plex, activation: cfg.activation, threads: threads(quantIsobaricTask) }
            }),
            output: (sample, outputs) => ({
              sample,
              isobaric: outputFile(outputs, "isobaric", `quant_isobaric ${sample.fileName}`)
            })
          }),
          quantIsobaricTask
        );
        const byFile = (r: { sample: SampleRecord }): string => r.sample.fileName;
        quant = map(
          join(ms1, iso, byFile, byFile, { name: "quant.joinByFile" }),
          (j) => ({ sample: j.left.sample, ms1: j.left.ms1, isobaric: j.right.isobaric }),
          "quant.records"
        );
      } else {
        quant = map(ms1, (r) => ({ sample: r.sample, ms1: r.ms1, isobaric: null }), "quant.records");
      }
    }

    const all = groupTuple(quant, () => "all", { name: "lookup.collect", sortBy: (r) => r.sample.fileName });
    return requireNode(
      processNode(ctx, createSpectraLookupTask, all, {
        call: (g) => ({
          tag: "lookup",
          inputs: {
            mzml: g.items.map((r) => r.sample.mzml),
            ms1: g.items.flatMap((r) => (r.ms1 === null ? [] : [r.ms1])),
            isobaric: g.items.flatMap((r) => (r.isobaric === null ? [] : [r.isobaric]))
          },
          params: { setNames: g.items.map((r) => r.sample.setName) }
        }),
        output: (_g, outputs) => outputFile(outputs, "lookup", createSpectraLookupTask.name)
      }),
      createSpectraLookupTask
    );
  }

  // Rescoring and PSM tables, one per set and arm.
  const perSet = groupTuple(searches, (r) => r.sample.setName, {
    name: "search.groupBySet",
    sortBy: (r) => r.sample.fileName
  });
  const rescored = requireNode(
    processNode(ctx, percolatorTask, perSet, {
      call: (g) => ({ tag: g.key, inputs: { mzids: g.items.map((r) => r.mzid) }, params: { setName: g.key, enzyme: cfg.enzyme } }),
      output: (g, outputs) => ({
        setName: g.key,
        mzids: g.items.map((r) => r.mzid),
        perco: outputFile(outputs, "perco", `percolator ${g.key}`)
      })
    }),
    percolatorTask
  );
  const splitArms = requireNode(
    processNode(ctx, svmToTsvTask, rescored, {
      call: (r) => ({ tag: r.setName, inputs: { mzids: r.mzids, perco: [r.perco] }, params: { setName: r.setName } }),
      output: (r, outputs) => ({
        setName: r.setName,
        target: outputFile(outputs, "target", `svm_to_tsv ${r.setName}`),
        decoy: outputFile(outputs, "decoy", `svm_to_tsv ${r.setName}`)
      })
    }),
    svmToTsvTask
  );
  const setPsms = transpose(
    splitArms,
    () => [TARGET_DECOY],
    (r, i) => {
      const td = TARGET_DECOY[i];
      return { setName: r.setName, td, psms: td === "target" ? r.target : r.decoy };
    },
    "psms.perArm"
  );

  let psmTables = requireNode(
    processNode(ctx, createPsmTableTask, cross(setPsms, lookup, (r, lookupFile) => ({ ...r, lookup: lookupFile }), "psmtable.withLookup"), {
      call: (r) => ({
        tag: `${r.setName}/${r.td}`,
        inputs: { psms: [r.psms], lookup: [r.lookup], db: [cfg.tdb] },
        params: {
          setName: r.setName,
          td: r.td,
          psmconflvl: cfg.psmconflvl,
          pepconflvl: cfg.pepconflvl,
          isobaric: cfg.isobaric,
          denoms: resolveDenoms(cfg, r.setName),
          medianSweep: cfg.isobaric !== null && cfg.denomsBySet === null,
          fractions: cfg.fractions
        },
        onEmpty: () => new ThresholdEmptyError(r.setName, r.td, cfg.psmconflvl, cfg.pepconflvl)
      }),
      output: (r, outputs): PsmTable => ({
        setName: r.setName,
        td: r.td,
        table: outputFile(outputs, "psmtable", `create_psm_table ${r.setName}/${r.td}`)
      })
    }),
    createPsmTableTask
  );

  const annotated = processNode(ctx, piAnnotationTask, psmTables, {
    call: (r) => ({
      tag: `${r.setName}/${r.td}`,
      inputs: { psmtable: [r.table], pitable: [requirePath(cfg.hirief, "hirief")] },
      params: { setName: r.setName, td: r.td }
    }),
    output: (r, outputs): PsmTable => ({ ...r, table: outputFile(outputs, "annotated", `pi_annotation ${r.setName}/${r.td}`) })
  });
  psmTables = annotated ?? psmTables;

  const psmOutlets = broadcast(psmTables, ["publish", "peptides", "qc"], "psmtables.fanout");
  const publishedPsms = toList(psmOutlets.get("publish"), "psmtables.collect");

  // PSM QC per plate partition.
  const targetPsms = filter(psmOutlets.get("qc"), (r) => r.td === "target", "qc.targets");
  const plated = processNode(ctx, splitPsmPlatesTask, targetPsms, {
    call: (r) => ({
      tag: r.setName,
      inputs: { psmtable: [r.table] },
      params: { setName: r.setName, plates: platesOf(samples, r.setName) }
    }),
    output: (r, outputs) => ({ setName: r.setName, files: [...(outputs.plates ?? [])] })
  });
  const partitioned = plated
    ? transpose(
        plated,
        (r) => [r.files],
        (r, i) => {
          const file = r.files[i];
          return { partition: `${r.setName}_${plateOfFile(file)}`, setName: r.setName, table: file };
        },
        "qc.perPlate"
      )
    : map(targetPsms, (r) => ({ partition: NOPLATES, setName: r.setName, table: r.table }), "qc.noplates");
  const psmQc = toList(
    requireNode(
      processNode(
        ctx,
        qcPsmsTask,
        groupTuple(partitioned, (r) => r.partition, { name: "qc.groupByPartition", sortBy: (r) => r.setName }),
        {
          call: (g) => ({
            tag: g.key,
            inputs: { psmtables: g.items.map((r) => r.table) },
            params: { partition: g.key, sets: g.items.map((r) => r.setName) }
          }),
          output: (g, outputs): PsmQc => ({ partition: g.key, qc: outputFile(outputs, "qc", `qc_psms ${g.key}`) })
        }
      ),
      qcPsmsTask
    ),
    "qc.collect"
  );

  // Peptide tables, then the competition subgraph per accession type.
  const peptides = requireNode(
    processNode(ctx, createPeptideTableTask, psmOutlets.get("peptides"), {
      call: (r) => ({
        tag: `${r.setName}/${r.td}`,
        inputs: { psmtable: [r.table] },
        params: {
          setName: r.setName,
          td: r.td,
          isobaric: cfg.isobaric,
          ms1Quant: mode === "noquant" ? null : MS1_QUANT_COLUMN
        }
      }),
      output: (r, outputs): PsmTable => ({ ...r, table: outputFile(outputs, "peptides", `create_peptide_table ${r.setName}/${r.td}`) })
    }),
    createPeptideTableTask
  );
  const pepOutlets = broadcast(peptides, accTypes.length > 0 ? ["merge", "fdr"] : ["merge"], "peptides.fanout");
  const features: Array<Stream<FeatureTable>> = [
    map(
      filter(pepOutlets.get("merge"), (r) => r.td === "target", "peptides.targets"),
      (r): FeatureTable => ({ featureType: "peptide", setName: r.setName, table: r.table }),
      "peptides.features"
    )
  ];

  if (accTypes.length > 0) {
    const candidates = transpose(
      pepOutlets.get("fdr"),
      () => [accTypes],
      (r, i): FdrCandidate => ({ setName: r.setName, accType: accTypes[i], td: r.td, table: r.table }),
      "fdr.perAccession"
    );
    const competitions = choice(chooseScoreColumns(log, pairTargetDecoy(log, candidates)), accTypes, (r) => r.accType, "fdr.byAccession");

    for (const acc of accTypes) {
      if (acc === "protein") {
        features.push(
          requireNode(
            processNode(ctx, proteinFdrTask, competitions.get(acc), {
              call: (r) => ({
                tag: `${r.setName}/${acc}`,
                inputs: { target: [r.target], decoy: [r.decoy] },
                params: { setName: r.setName, scoreColumn: r.scoreColumn, logScore: r.logScore, accType: acc }
              }),
              output: (r, outputs): FeatureTable => ({
                featureType: acc,
                setName: r.setName,
                table: outputFile(outputs, "table", `protein_fdr ${r.setName}`)
              })
            }),
            proteinFdrTask
          )
        );
        continue;
      }
      const withDb = cross(competitions.get(acc), db, (r, d) => ({ ...r, decoyDb: d.decoy }), `fdr.${acc}.withDb`);
      features.push(
        requireNode(
          processNode(ctx, pickedFdrTask, withDb, {
            call: (r) => ({
              tag: `${r.setName}/${acc}`,
              inputs: { target: [r.target], decoy: [r.decoy], tdb: [cfg.tdb], decoydb: [r.decoyDb] },
              params: { setName: r.setName, scoreColumn: r.scoreColumn, logScore: r.logScore, accType: acc }
            }),
            output: (r, outputs): FeatureTable => ({
              featureType: acc,
              setName: r.setName,
              table: outputFile(outputs, "table", `picked_fdr ${r.setName}/${acc}`)
            })
          }),
          pickedFdrTask
        )
      );
    }
  }

  // Merged tables per feature type; normalization and DEqMS sit between merge and QC.
  const perType = groupTuple(mix(features, "features.mix"), (r) => r.featureType, {
    name: "merge.groupByType",
    sortBy: (r) => r.setName
  });
  let merged = requireNode(
    processNode(ctx, mergeSetTablesTask, cross(perType, lookup, (g, lookupFile) => ({ ...g, lookup: lookupFile }), "merge.withLookup"), {
      call: (g) => ({
        tag: g.key,
        inputs: { tables: g.items.map((r) => r.table), lookup: [g.lookup] },
        params: { accType: g.key, setNames: g.items.map((r) => r.setName), isobaric: cfg.isobaric }
      }),
      output: (g, outputs): MergedTable => ({ featureType: g.key, table: outputFile(outputs, "merged", `merge_set_tables ${g.key}`) })
    }),
    mergeSetTablesTask
  );
  const normalized = processNode(ctx, normalizeTableTask, merged, {
    call: (r) => ({
      tag: r.featureType,
      inputs: { table: [r.table] },
      params: { accType: r.featureType, plex: requirePlex(cfg, "normalize") }
    }),
    output: (r, outputs): MergedTable => ({ ...r, table: outputFile(outputs, "normalized", `normalize_table ${r.featureType}`) })
  });
  merged = normalized ?? merged;
  const tested = processNode(ctx, deqmsTask, merged, {
    call: (r) => ({
      tag: r.featureType,
      inputs: { table: [r.table], sampletable: [requirePath(cfg.sampletable, "sampletable")] },
      params: { accType: r.featureType }
    }),
    output: (r, outputs): MergedTable => ({ ...r, table: outputFile(outputs, "deqms", `deqms ${r.featureType}`) })
  });
  merged = tested ?? merged;
  const mergedTables = toList(merged, "merge.collect");

  // Warnings snapshot and the report, once every table exists.
  const reportNode = flow.nodeName("qc.reportInputs");
  const reportInputs = flow.stream<ReportInputs>(`${reportNode}.out`, reportNode);
  flow.declare(
    { kind: "operator", name: reportNode, inputs: [mergedTables, psmQc, versions], outputs: [reportInputs] },
    async () => {
      const [tables, qc, versionsFile] = await Promise.all([mergedTables.get(), psmQc.get(), versions.get()]);
      if (versionsFile === null) {
        log.warn("branch_skipped", "software versions are unavailable; QC report is built without them", {
          task: softwareVersionsTask.name
        });
      }
      await fs.mkdir(ctx.stagingDir, { recursive: true });
      const warningsFile = path.join(ctx.stagingDir, "warnings.json");
      await fs.writeFile(warningsFile, JSON.stringify(sortWarnings(log.warnings), null, 2) + "\n");
      reportInputs.emit({ tables, psmQc: qc, warnings: warningsFile, versions: versionsFile });
    }
  );
  const report = single(
    requireNode(
      processNode(ctx, qcReportTask, reportInputs, {
        call: (r) => {
          const tables = [...r.tables].sort((a, b) => byName(a.featureType, b.featureType));
          const qc = [...r.psmQc].sort((a, b) => byName(a.partition, b.partition));
          return {
            tag: "report",
            inputs: {
              tables: tables.map((t) => t.table),
              psmqc: qc.map((q) => q.qc),
              warnings: [r.warnings],
              versions: r.versions === null ? [] : [r.versions]
            },
            params: { featureTypes: tables.map((t) => t.featureType), partitions: qc.map((q) => q.partition) }
          };
        },
        output: (_r, outputs) => outputFile(outputs, "report", qcReportTask.name)
      }),
      qcReportTask
    ),
    "qc.report"
  );

  return {
    flow,
    sinks: { psmTables: publishedPsms, mergedTables, psmQc, report, versions },
    describe: () => ({
      nodes: flow.nodes.map((n) => ({ name: n.name, kind: n.kind, skipped: n.skipped })),
      edges: flow.edges()
    })
  };
}
