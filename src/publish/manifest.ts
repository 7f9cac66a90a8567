import { promises as fs } from "fs";
import path from "path";
import * as z from "zod/v4";
import { sha256File } from "../core/canonicalJson.js";

export const OUTPUT_MANIFEST_V1_SCHEMA_ID = "proteoflow:outputs:manifest:v1" as const;

const zSha256 = z.string().regex(/^sha256:[a-f0-9]{64}$/);

export const zOutputFileEntry = z.object({
  path: z.string().min(1),
  sha256: zSha256,
  size_bytes: z.number().int().min(0)
});

export const zOutputManifestV1 = z.object({
  schema_id: z.literal(OUTPUT_MANIFEST_V1_SCHEMA_ID),
  manifest_version: z.literal(1),
  run_id: z.string().min(1),
  config_hash: zSha256,
  files: z.array(zOutputFileEntry).min(1)
});

export type OutputFileEntry = z.infer<typeof zOutputFileEntry>;
export type OutputManifestV1 = z.infer<typeof zOutputManifestV1>;

/** Checks every file listed in `manifest.json` against its recorded digest and size. */
export async function verifyOutputDir(outDir: string): Promise<OutputManifestV1> {
  const manifestPath = path.join(outDir, "manifest.json");
  const parsed = zOutputManifestV1.safeParse(JSON.parse(await fs.readFile(manifestPath, "utf8")));
  if (!parsed.success) throw new Error(`invalid manifest.json: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  const manifest = parsed.data;

  for (const entry of manifest.files) {
    const full = path.join(outDir, entry.path);
    const { sha256, sizeBytes } = await sha256File(full);
    if (sha256 !== entry.sha256) throw new Error(`sha256 mismatch for ${entry.path} (expected ${entry.sha256}, got ${sha256})`);
    if (sizeBytes !== entry.size_bytes) {
      throw new Error(`size mismatch for ${entry.path} (expected ${entry.size_bytes}, got ${sizeBytes})`);
    }
  }

  const digest = await sha256File(manifestPath);
  const onDisk = await fs.readFile(path.join(outDir, "manifest.sha256"), "utf8");
  if (onDisk !== `${digest.sha256}  manifest.json\n`) throw new Error("manifest.sha256 does not match manifest.json digest");
  return manifest;
}
