import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type * as z from "zod/v4";
import { loadRunConfig, parseRunConfig, type RunConfig } from "../config/runConfig.js";
import { ConfigurationError, errorMessage, PipelineError } from "../core/errors.js";
import { isRunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { ToolAdapter } from "../execution/backends/types.js";
import { planPipeline, runPipeline } from "../pipeline/runPipeline.js";
import type { PipelineWarning } from "../runs/runLog.js";
import type { CacheStore, RunStore } from "../store/postgresStore.js";
import { envSnapshot } from "./envSnapshot.js";
import {
  zPipelinePlanInput,
  zPipelinePlanOutput,
  zPipelineRunInput,
  zPipelineRunOutput,
  zRunGetInput,
  zRunGetOutput,
  type zConfigSource
} from "./toolSchemas.js";

export interface GatewayDeps {
  store: RunStore & CacheStore;
  adapter: ToolAdapter;
  /** Mirror run events of pipeline_run to stderr. */
  echo?: boolean;
  /** Keep cache entries under each run's workdir (no PostgreSQL configured). */
  cacheInWorkdir?: boolean;
}

async function loadConfig(source: z.infer<typeof zConfigSource>): Promise<RunConfig> {
  if (source.kind === "file") return loadRunConfig(source.path);
  return parseRunConfig(source.options, source.base_dir);
}

function warningsJson(warnings: readonly PipelineWarning[]): JsonObject[] {
  return warnings.map((w) => ({ code: w.code, message: w.message, data: w.data }));
}

/** Configuration problems are the caller's; anything else is ours. */
function toMcpError(e: unknown): McpError {
  if (e instanceof McpError) return e;
  if (e instanceof ConfigurationError) return new McpError(ErrorCode.InvalidParams, e.message);
  if (e instanceof PipelineError) return new McpError(ErrorCode.InternalError, `${e.name}: ${e.message}`);
  return new McpError(ErrorCode.InternalError, errorMessage(e));
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "proteoflow-gateway",
    version: "0.1.0"
  });

  mcp.registerTool(
    "pipeline_plan",
    {
      description: "Build the task graph for a run configuration and describe its nodes and edges without executing.",
      inputSchema: zPipelinePlanInput,
      outputSchema: zPipelinePlanOutput
    },
    async (args) => {
      try {
        const cfg = await loadConfig(args.config);
        const plan = await planPipeline(cfg);
        const tasks = plan.graph.nodes.filter((n) => n.kind === "task");
        const structured: JsonObject = {
          config_hash: plan.configHash,
          sets: plan.sets,
          nodes: plan.graph.nodes.map((n) => ({ name: n.name, kind: n.kind, skipped: n.skipped })),
          edges: plan.graph.edges.map((e) => ({ from: e.from, to: e.to, channel: e.channel })),
          warnings: warningsJson(plan.warnings)
        };
        return {
          content: [
            {
              type: "text",
              text: `Planned ${tasks.filter((n) => !n.skipped).length} task nodes (${tasks.filter((n) => n.skipped).length} skipped) for ${plan.sets.length} sets`
            }
          ],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "pipeline_run",
    {
      description: "Execute the pipeline for a run configuration; returns published files, warnings and cache statistics.",
      inputSchema: zPipelineRunInput,
      outputSchema: zPipelineRunOutput
    },
    async (args) => {
      try {
        const cfg = await loadConfig(args.config);
        const result = await runPipeline(cfg, {
          store: deps.store,
          adapter: deps.adapter,
          echo: deps.echo ?? false,
          environment: envSnapshot(deps.adapter.kind),
          cacheInWorkdir: deps.cacheInWorkdir ?? false
        });
        const structured: JsonObject = {
          provenance_run_id: result.runId,
          config_hash: result.configHash,
          out_dir: result.outDir,
          manifest_sha256: result.manifestSha256,
          published: result.published,
          warnings: warningsJson(result.warnings),
          cache: { hits: result.cache.hits, misses: result.cache.misses, executed: result.cache.executed }
        };
        return {
          content: [
            {
              type: "text",
              text: `Run ${result.runId}: published ${result.published.length} files, ${result.warnings.length} warnings, ${result.cache.executed} tasks executed`
            }
          ],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "run_get",
    {
      description: "Fetch a pipeline run record with its events and task invocations.",
      inputSchema: zRunGetInput,
      outputSchema: zRunGetOutput
    },
    async (args) => {
      try {
        if (!isRunId(args.run_id)) throw new McpError(ErrorCode.InvalidParams, `invalid run_id: ${args.run_id}`);
        const run = await deps.store.getRun(args.run_id);
        if (!run) throw new McpError(ErrorCode.InvalidParams, `unknown run_id: ${args.run_id}`);
        const events = await deps.store.listRunEvents(run.runId);
        const tasks = await deps.store.listTaskRuns(run.runId);

        const structured: JsonObject = {
          run: {
            run_id: run.runId,
            config_hash: run.configHash,
            status: run.status,
            created_at: run.createdAt,
            started_at: run.startedAt,
            finished_at: run.finishedAt,
            error: run.error,
            result: run.resultJson
          },
          events: events.map((e) => ({ ts: e.ts, kind: e.kind, message: e.message, data: e.data })),
          tasks: tasks.map((t) => ({
            task: t.taskName,
            tag: t.tag,
            signature: t.signature,
            status: t.status,
            exit_code: t.exitCode,
            error: t.error
          }))
        };
        return {
          content: [{ type: "text", text: `${run.runId}: ${run.status} (${tasks.length} task invocations)` }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  return mcp;
}
