import path from "path";
import type { LocalObjectStore } from "../artifacts/localObjectStore.js";
import type { Sha256 } from "../core/ids.js";
import type { CachedFile, CachedOutputs, CacheEntry } from "../core/run.js";
import type { CacheStore } from "../store/postgresStore.js";
import type { TaskOutputs } from "../toolpacks/types.js";

/** Serializes work on one key; later callers wait for earlier ones. */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const mine = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => mine);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }
}

export class TaskCache {
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly store: CacheStore,
    private readonly objects: LocalObjectStore
  ) {}

  /** The signature is the exclusive write key: lookup, execution and store happen under its lock. */
  withSignature<T>(signature: Sha256, fn: () => Promise<T>): Promise<T> {
    return this.locks.run(signature, fn);
  }

  /**
   * Returns the entry only when every recorded object is still present with
   * the recorded checksum. Anything else is a miss.
   */
  async lookup(signature: Sha256): Promise<CacheEntry | null> {
    const entry = await this.store.getCacheEntry(signature);
    if (!entry) return null;
    for (const files of Object.values(entry.outputs)) {
      for (const f of files) {
        if (!(await this.objects.has(f.sha256, f.sizeBytes))) {
          await this.store.deleteCacheEntry(signature);
          return null;
        }
      }
    }
    return entry;
  }

  /** Rebuilds the outputs of a hit inside `workDir`. */
  async restore(entry: CacheEntry, workDir: string): Promise<TaskOutputs> {
    const out: Record<string, string[]> = {};
    for (const [name, files] of Object.entries(entry.outputs)) {
      const paths: string[] = [];
      for (const f of files) {
        const dest = path.join(workDir, f.relpath);
        await this.objects.materializeToPath(f.sha256, dest);
        paths.push(dest);
      }
      out[name] = paths;
    }
    return out;
  }

  async save(taskName: string, signature: Sha256, workDir: string, outputs: TaskOutputs): Promise<CachedOutputs> {
    const recorded: CachedOutputs = {};
    for (const [name, files] of Object.entries(outputs)) {
      const list: CachedFile[] = [];
      for (const f of files) {
        const put = await this.objects.putFromLocalPath(f);
        list.push({ relpath: path.relative(workDir, f).split(path.sep).join("/"), sha256: put.sha256, sizeBytes: put.sizeBytes });
      }
      recorded[name] = list;
    }
    await this.store.putCacheEntry({ signature, taskName, outputs: recorded });
    return recorded;
  }
}
