import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";

import { Flow } from "../src/dataflow/flow.js";
import { fromList, toList } from "../src/dataflow/operators.js";
import {
  chooseScoreColumns,
  pairTargetDecoy,
  selectScoreColumn,
  type CompetitionPair,
  type FdrCandidate
} from "../src/pipeline/fdr.js";
import type { PipelineLog } from "../src/pipeline/process.js";
import type { PipelineWarning } from "../src/runs/runLog.js";

function collectingLog(): PipelineLog {
  const warnings: PipelineWarning[] = [];
  return {
    warnings,
    warn: (code, message, data = null) => {
      warnings.push({ code, message, data });
    },
    note: () => undefined
  };
}

describe("target/decoy pairing", () => {
  it("admits only groups with exactly one target and one decoy", async () => {
    const candidates: FdrCandidate[] = [
      { setName: "A", accType: "protein", td: "decoy", table: "A.protein.decoy" },
      { setName: "B", accType: "protein", td: "target", table: "B.protein.target" },
      { setName: "A", accType: "gene", td: "target", table: "A.gene.target" },
      { setName: "A", accType: "protein", td: "target", table: "A.protein.target" },
      { setName: "C", accType: "protein", td: "target", table: "C.protein.target.1" },
      { setName: "C", accType: "protein", td: "target", table: "C.protein.target.2" },
      { setName: "A", accType: "gene", td: "decoy", table: "A.gene.decoy" }
    ];
    const flow = new Flow();
    const log = collectingLog();
    const pairs = toList(pairTargetDecoy(log, fromList(flow, "candidates", candidates)));
    await flow.run();

    expect(await pairs.get()).toEqual([
      { setName: "A", accType: "gene", target: "A.gene.target", decoy: "A.gene.decoy" },
      { setName: "A", accType: "protein", target: "A.protein.target", decoy: "A.protein.decoy" }
    ]);
    expect(log.warnings).toEqual([
      {
        code: "unpaired_target_decoy",
        message: "no protein competition for set B: arms present [target]",
        data: { set: "B", acc_type: "protein", present: ["target"] }
      },
      {
        code: "unpaired_target_decoy",
        message: "no protein competition for set C: arms present [target, target]",
        data: { set: "C", acc_type: "protein", present: ["target", "target"] }
      }
    ]);
  });
});

describe("score column selection", () => {
  let dir: string;

  async function table(name: string, header: string[], rows: string[][]): Promise<string> {
    const file = path.join(dir, name);
    await writeFile(file, [header, ...rows].map((r) => r.join("\t")).join("\n") + "\n");
    return file;
  }

  beforeAll(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "proteoflow-fdr-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const HEADER = ["Peptide", "Protein", "percolator svm-score", "q-value", "MSGFScore"];

  it("uses the svm score when both arms vary", async () => {
    const t = await table("t1.txt", HEADER, [["PEPK", "P1", "1.2", "0.001", "120"]]);
    const d = await table("d1.txt", HEADER, [["KPEP", "decoy_P1", "-0.4", "0.2", "40"]]);
    expect(await selectScoreColumn(t, d)).toEqual({
      kind: "primary",
      column: "percolator svm-score",
      logScore: false,
      rejected: null
    });
  });

  it("falls back to MSGFScore when one arm's primary score is all zero", async () => {
    const t = await table("t2.txt", HEADER, [["PEPK", "P1", "0.8", "0.001", "120"]]);
    const d = await table("d2.txt", HEADER, [
      ["KPEP", "decoy_P1", "0", "0.2", "40"],
      ["KPER", "decoy_P2", "0.0000", "0.3", "35"]
    ]);
    expect(await selectScoreColumn(t, d)).toEqual({
      kind: "fallback",
      column: "MSGFScore",
      logScore: false,
      rejected: "percolator svm-score"
    });
  });

  it("ranks by q-value on a log scale when there is no svm column", async () => {
    const header = ["Peptide", "q-value", "MSGFScore"];
    const t = await table("t3.txt", header, [["PEPK", "0.001", "120"]]);
    const d = await table("d3.txt", header, [["KPEP", "0.2", "40"]]);
    expect(await selectScoreColumn(t, d)).toEqual({ kind: "primary", column: "q-value", logScore: true, rejected: null });
  });

  it("reports an arm without rows as empty", async () => {
    const t = await table("t4.txt", HEADER, []);
    const d = await table("d4.txt", HEADER, [["KPEP", "decoy_P1", "-0.4", "0.2", "40"]]);
    expect(await selectScoreColumn(t, d)).toEqual({ kind: "empty", arm: "target" });
  });

  it("reports a pair as unusable when neither the primary nor the fallback score varies", async () => {
    const t = await table("t5.txt", HEADER, [["PEPK", "P1", "0", "0.001", ""]]);
    const d = await table("d5.txt", HEADER, [["KPEP", "decoy_P1", "0", "0.2", ""]]);
    expect(await selectScoreColumn(t, d)).toEqual({ kind: "unusable", primary: "percolator svm-score" });
  });

  it("skips an unusable pair with a warning and keeps the others", async () => {
    const badT = await table("t6.txt", HEADER, [["PEPK", "P1", "0", "0.001", ""]]);
    const badD = await table("d6.txt", HEADER, [["KPEP", "decoy_P1", "0", "0.2", ""]]);
    const goodT = await table("t7.txt", HEADER, [["PEPK", "P1", "1.2", "0.001", "120"]]);
    const goodD = await table("d7.txt", HEADER, [["KPEP", "decoy_P1", "-0.4", "0.2", "40"]]);
    const pairs: CompetitionPair[] = [
      { setName: "A", accType: "protein", target: badT, decoy: badD },
      { setName: "B", accType: "protein", target: goodT, decoy: goodD }
    ];
    const flow = new Flow();
    const log = collectingLog();
    const scored = toList(chooseScoreColumns(log, fromList(flow, "pairs", pairs)));
    await flow.run();

    expect(await scored.get()).toEqual([
      { setName: "B", accType: "protein", target: goodT, decoy: goodD, scoreColumn: "percolator svm-score", logScore: false }
    ]);
    expect(log.warnings).toEqual([
      {
        code: "no_usable_score",
        message: "set A protein: neither percolator svm-score nor MSGFScore varies in both arms; competition skipped",
        data: { set: "A", acc_type: "protein", primary: "percolator svm-score", fallback: "MSGFScore" }
      }
    ]);
  });
});
