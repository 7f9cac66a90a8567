import { promises as fs } from "fs";
import path from "path";
import { ulid } from "ulid";
import * as z from "zod/v4";
import type { Sha256 } from "../core/ids.js";
import type { CacheEntry } from "../core/run.js";
import { zCachedOutputs, type CacheStore } from "./postgresStore.js";

const zCacheEntryFile = z.object({
  signature: z.string(),
  task_name: z.string().min(1),
  outputs: zCachedOutputs,
  created_at: z.string()
});

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

/**
 * Cache entries as JSON files, `<root>/<hex[0:2]>/<hex>.json`, for runs
 * without a PostgreSQL database. Entries are write-once like the objects
 * they point at.
 */
export class FileCacheStore implements CacheStore {
  constructor(private readonly rootDir: string) {}

  entryPath(signature: Sha256): string {
    const hex = signature.slice("sha256:".length);
    return path.join(this.rootDir, hex.slice(0, 2), `${hex}.json`);
  }

  async getCacheEntry(signature: Sha256): Promise<CacheEntry | null> {
    let text: string;
    try {
      text = await fs.readFile(this.entryPath(signature), "utf8");
    } catch (err) {
      if (isErrno(err, "ENOENT")) return null;
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      return null;
    }
    // A malformed entry cannot be replayed; callers treat it as a miss.
    const parsed = zCacheEntryFile.safeParse(raw);
    if (!parsed.success || parsed.data.signature !== signature) return null;

    return {
      signature,
      taskName: parsed.data.task_name,
      outputs: parsed.data.outputs,
      createdAt: parsed.data.created_at
    };
  }

  async putCacheEntry(entry: Omit<CacheEntry, "createdAt">): Promise<boolean> {
    const finalPath = this.entryPath(entry.signature);
    await fs.mkdir(path.dirname(finalPath), { recursive: true });
    const tmpPath = path.join(this.rootDir, `.incoming-${ulid()}`);
    const body = {
      signature: entry.signature,
      task_name: entry.taskName,
      outputs: entry.outputs,
      created_at: new Date().toISOString()
    };
    await fs.writeFile(tmpPath, JSON.stringify(body, null, 2) + "\n");
    try {
      await fs.link(tmpPath, finalPath);
      return true;
    } catch (err) {
      if (isErrno(err, "EEXIST")) return false;
      throw err;
    } finally {
      await fs.rm(tmpPath, { force: true });
    }
  }

  async deleteCacheEntry(signature: Sha256): Promise<void> {
    await fs.rm(this.entryPath(signature), { force: true });
  }
}
