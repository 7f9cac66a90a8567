import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";

import { sha256Prefixed } from "../src/core/canonicalJson.js";
import { newRunId, type Sha256 } from "../src/core/ids.js";
import { verifyOutputDir, zOutputManifestV1 } from "../src/publish/manifest.js";
import { mergedTableName, psmTableName, publishOutputs } from "../src/publish/publishOutputs.js";
import { sortWarnings, type PipelineWarning } from "../src/runs/runLog.js";

const CONFIG_HASH: Sha256 = `sha256:${"a".repeat(64)}`;

describe("publishing", () => {
  let dir: string;
  let outDir: string;

  async function source(name: string, text: string): Promise<string> {
    const file = path.join(dir, "work", name);
    await writeFile(file, text);
    return file;
  }

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "proteoflow-publish-"));
    outDir = path.join(dir, "out");
    await mkdir(path.join(dir, "work"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("names published tables", () => {
    expect(psmTableName({ setName: "setA", td: "decoy" })).toBe("setA_decoy_psms.txt");
    expect(mergedTableName("peptide")).toBe("peptides_table.txt");
    expect(mergedTableName("symbol")).toBe("symbols_table.txt");
  });

  async function publishSample(warnings: PipelineWarning[] = [{ code: "score_fallback", message: "set setA protein: fallback", data: null }]) {
    const runId = newRunId();
    const published = await publishOutputs({
      outDir,
      runId,
      configHash: CONFIG_HASH,
      psmTables: [{ setName: "setA", td: "target", table: await source("psms.txt", "Peptide\nPEPK\n") }],
      mergedTables: [{ featureType: "protein", table: await source("proteins.txt", "Protein\tsetA_q-value\nP1\t0.001\n") }],
      psmQc: [{ partition: "noplates", qc: await source("qc.json", "{}\n") }],
      report: await source("report.html", "<html></html>\n"),
      versions: null,
      warnings,
      logText: "{}\n"
    });
    return { runId, published };
  }

  it("copies the outputs and lists them in a sorted manifest", async () => {
    const { runId, published } = await publishSample();
    expect(published.files.map((f) => f.path)).toEqual([
      "pipeline.log",
      "proteins_table.txt",
      "qc/psm_qc_noplates.json",
      "qc/qc_report.html",
      "setA_target_psms.txt",
      "warnings.json"
    ]);
    expect(published.files.find((f) => f.path === "setA_target_psms.txt")).toEqual({
      path: "setA_target_psms.txt",
      sha256: sha256Prefixed("Peptide\nPEPK\n"),
      size_bytes: 13
    });
    expect(JSON.parse(await readFile(path.join(outDir, "warnings.json"), "utf8"))).toEqual([
      { code: "score_fallback", message: "set setA protein: fallback", data: null }
    ]);

    const manifestBytes = await readFile(path.join(outDir, "manifest.json"));
    expect(published.manifestSha256).toBe(sha256Prefixed(manifestBytes));
    expect(await readFile(path.join(outDir, "manifest.sha256"), "utf8")).toBe(`${published.manifestSha256}  manifest.json\n`);

    const manifest = await verifyOutputDir(outDir);
    expect(manifest.run_id).toBe(runId);
    expect(manifest.schema_id).toBe("proteoflow:outputs:manifest:v1");
    expect(manifest.config_hash).toBe(CONFIG_HASH);
  });

  it("writes warnings ordered by code and message regardless of arrival order", async () => {
    const arrived: PipelineWarning[] = [
      { code: "unpaired_target_decoy", message: "no gene competition for set setB: arms present [decoy]", data: null },
      { code: "score_fallback", message: "set setA protein: fallback", data: null },
      { code: "unpaired_target_decoy", message: "no gene competition for set setA: arms present [target]", data: null }
    ];
    await publishSample(arrived);
    const written: unknown = JSON.parse(await readFile(path.join(outDir, "warnings.json"), "utf8"));
    expect(written).toEqual([arrived[1], arrived[2], arrived[0]]);
    expect(sortWarnings([...arrived].reverse())).toEqual(sortWarnings(arrived));
  });

  it("detects a modified output file", async () => {
    await publishSample();
    await writeFile(path.join(outDir, "proteins_table.txt"), "Protein\tsetA_q-value\nP2\t0.001\n");
    await expect(verifyOutputDir(outDir)).rejects.toThrow(/^sha256 mismatch for proteins_table\.txt/);
  });

  it("detects a rewritten manifest", async () => {
    const { published } = await publishSample();
    const manifestPath = path.join(outDir, "manifest.json");
    const manifest = zOutputManifestV1.parse(JSON.parse(await readFile(manifestPath, "utf8")));
    await writeFile(manifestPath, JSON.stringify({ ...manifest, files: manifest.files.filter((f) => f.path !== "pipeline.log") }));
    expect(published.files).toHaveLength(6);
    await expect(verifyOutputDir(outDir)).rejects.toThrow("manifest.sha256 does not match manifest.json digest");
  });
});
