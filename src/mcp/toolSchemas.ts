import * as z from "zod/v4";

const ulid26 = "[0-9A-HJKMNP-TV-Z]{26}";

export const zRunId = z.string().regex(new RegExp(`^run_${ulid26}$`), "invalid run_id");
export const zSha256 = z.string().regex(/^sha256:[a-f0-9]{64}$/);

export const zConfigSource = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("file"), path: z.string().min(1) }),
  z.object({
    kind: z.literal("inline"),
    options: z.record(z.string(), z.unknown()),
    /** Relative paths in `options` resolve against this directory. */
    base_dir: z.string().min(1)
  })
]);

export const zWarning = z.object({
  code: z.string(),
  message: z.string(),
  data: z.record(z.string(), z.unknown()).nullable()
});

export const zCacheStats = z.object({
  hits: z.number().int().min(0),
  misses: z.number().int().min(0),
  executed: z.number().int().min(0)
});

export const zPipelinePlanInput = z.object({
  config: zConfigSource
});

export const zPipelinePlanOutput = z.object({
  config_hash: zSha256,
  sets: z.array(z.string()),
  nodes: z.array(z.object({ name: z.string(), kind: z.enum(["source", "operator", "task", "sink"]), skipped: z.boolean() })),
  edges: z.array(z.object({ from: z.string(), to: z.string(), channel: z.string() })),
  warnings: z.array(zWarning)
});

export const zPipelineRunInput = z.object({
  config: zConfigSource
});

export const zPipelineRunOutput = z.object({
  provenance_run_id: zRunId,
  config_hash: zSha256,
  out_dir: z.string(),
  manifest_sha256: zSha256,
  published: z.array(z.string()),
  warnings: z.array(zWarning),
  cache: zCacheStats
});

export const zRunGetInput = z.object({
  run_id: zRunId
});

export const zRunGetOutput = z.object({
  run: z.object({
    run_id: zRunId,
    config_hash: zSha256,
    status: z.enum(["running", "succeeded", "failed"]),
    created_at: z.string(),
    started_at: z.string().nullable(),
    finished_at: z.string().nullable(),
    error: z.string().nullable(),
    result: z.record(z.string(), z.unknown()).nullable()
  }),
  events: z.array(
    z.object({
      ts: z.string(),
      kind: z.string(),
      message: z.string().nullable(),
      data: z.record(z.string(), z.unknown()).nullable()
    })
  ),
  tasks: z.array(
    z.object({
      task: z.string(),
      tag: z.string(),
      signature: zSha256,
      status: z.enum(["succeeded", "cached", "failed", "tolerated", "dropped", "cancelled"]),
      exit_code: z.number().int().nullable(),
      error: z.string().nullable()
    })
  )
});
