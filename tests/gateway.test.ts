import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { writeFile } from "fs/promises";
import path from "path";

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, ListToolsResultSchema } from "@modelcontextprotocol/sdk/types.js";

import { errorMessage } from "../src/core/errors.js";
import { newRunId } from "../src/core/ids.js";
import type { DatabaseHandle } from "../src/db/connection.js";
import { InSilicoAdapter } from "../src/execution/inSilico.js";
import { createGatewayServer } from "../src/mcp/gatewayServer.js";
import { zPipelinePlanOutput, zPipelineRunOutput, zRunGetOutput } from "../src/mcp/toolSchemas.js";
import { baseOptions, createWorkspace, openMemoryStore, TWO_SETS, type Workspace } from "./fixtures.js";

describe.sequential("gateway (in-memory)", () => {
  let ws: Workspace;
  let database: DatabaseHandle;
  let client: Client;
  let serverTransport: InMemoryTransport;
  let clientTransport: InMemoryTransport;

  async function callTool(name: string, args: Record<string, unknown>) {
    return client.request(
      { method: "tools/call", params: { name, arguments: args } },
      CallToolResultSchema,
      { timeout: 60_000 }
    );
  }

  /** Error text of a failing call, whether the server reports it as a protocol error or a tool error. */
  async function callToolError(name: string, args: Record<string, unknown>): Promise<string> {
    try {
      const result = await callTool(name, args);
      if (!result.isError) throw new Error(`${name} unexpectedly succeeded`);
      return result.content.map((c) => (c.type === "text" ? c.text : c.type)).join("\n");
    } catch (err) {
      return errorMessage(err);
    }
  }

  beforeAll(async () => {
    ws = await createWorkspace(TWO_SETS);
    const opened = await openMemoryStore();
    database = opened.database;
    const server = createGatewayServer({ store: opened.store, adapter: new InSilicoAdapter() });

    [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    client = new Client({ name: "proteoflow-test-client", version: "0.0.0" });
    await client.connect(clientTransport);
  });

  afterAll(async () => {
    await clientTransport.close();
    await serverTransport.close();
    await database.close();
    await ws.cleanup();
  });

  it("lists tools", async () => {
    const result = await client.request({ method: "tools/list", params: {} }, ListToolsResultSchema);
    expect(result.tools.map((t) => t.name).sort()).toEqual(["pipeline_plan", "pipeline_run", "run_get"]);
  });

  it("plans an inline configuration", async () => {
    const result = await callTool("pipeline_plan", {
      config: { kind: "inline", options: baseOptions({ genes: true }), base_dir: ws.dir }
    });
    expect(result.isError).toBeFalsy();
    const plan = zPipelinePlanOutput.parse(result.structuredContent);
    expect(plan.sets).toEqual(["setA", "setB"]);
    expect(plan.nodes.filter((n) => n.skipped).map((n) => n.name)).toEqual([
      "pi_annotation",
      "split_psm_plates",
      "normalize_table",
      "deqms"
    ]);
    expect(plan.nodes.some((n) => n.kind === "task" && n.name === "picked_fdr")).toBe(true);
    expect(plan.warnings).toEqual([]);
  });

  it("runs a configuration file and returns the run record", async () => {
    const file = path.join(ws.dir, "run.yaml");
    await writeFile(file, "mzmldef: samples.tsv\ntdb: target.fasta\nmods: mods.txt\noutdir: out\nworkdir: work\n");

    const ran = await callTool("pipeline_run", { config: { kind: "file", path: file } });
    expect(ran.isError).toBeFalsy();
    const run = zPipelineRunOutput.parse(ran.structuredContent);
    expect(run.out_dir).toBe(path.join(ws.dir, "out"));
    expect(run.cache).toEqual({ hits: 0, misses: 27, executed: 27 });
    expect(run.published).toContain("proteins_table.txt");
    expect(run.warnings).toEqual([]);

    const got = await callTool("run_get", { run_id: run.provenance_run_id });
    const record = zRunGetOutput.parse(got.structuredContent);
    expect(record.run.status).toBe("succeeded");
    expect(record.run.config_hash).toBe(run.config_hash);
    expect(record.run.result?.provenance_run_id).toBe(run.provenance_run_id);
    expect(record.tasks).toHaveLength(27);
    expect(record.tasks.every((t) => t.status === "succeeded")).toBe(true);
    expect(record.events[0]?.kind).toBe("run.started");
    expect(record.events.at(-1)?.kind).toBe("run.succeeded");
  });

  it("reports configuration problems as invalid params", async () => {
    const message = await callToolError("pipeline_plan", {
      config: { kind: "inline", options: baseOptions({ normalize: true }), base_dir: ws.dir }
    });
    expect(message).toContain("normalize requires isobaric");
  });

  it("rejects an unknown run id", async () => {
    const runId = newRunId();
    expect(await callToolError("run_get", { run_id: runId })).toContain(`unknown run_id: ${runId}`);
  });
});
