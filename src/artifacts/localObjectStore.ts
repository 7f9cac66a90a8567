import { createHash } from "crypto";
import { createReadStream, createWriteStream, promises as fs } from "fs";
import path from "path";
import { Transform } from "stream";
import { pipeline } from "stream/promises";
import { ulid } from "ulid";
import type { Sha256 } from "../core/ids.js";
import type { ContentHashIndex } from "../cache/contentHashIndex.js";

export interface PutResult {
  sha256: Sha256;
  sizeBytes: number;
  objectPath: string;
}

/**
 * Write-once blob store addressed by the sha256 of the bytes:
 * `<root>/<hex[0:2]>/<hex>`.
 */
export class LocalObjectStore {
  constructor(
    private readonly rootDir: string,
    private readonly hashes: ContentHashIndex
  ) {}

  async init(): Promise<void> {
    await fs.mkdir(this.rootDir, { recursive: true });
  }

  objectPath(sha256: Sha256): string {
    const hex = sha256.slice("sha256:".length);
    return path.join(this.rootDir, hex.slice(0, 2), hex);
  }

  async putFromLocalPath(sourcePath: string): Promise<PutResult> {
    await this.init();
    const tmpPath = path.join(this.rootDir, `.incoming-${ulid()}`);
    const hash = createHash("sha256");
    let total = 0;

    const hasher = new Transform({
      transform(chunk: Buffer, _enc, cb) {
        total += chunk.byteLength;
        hash.update(chunk);
        cb(null, chunk);
      }
    });

    try {
      await pipeline(createReadStream(sourcePath), hasher, createWriteStream(tmpPath));
      const sha256: Sha256 = `sha256:${hash.digest("hex")}`;
      const objectPath = this.objectPath(sha256);

      if (await this.has(sha256, total)) {
        await fs.rm(tmpPath, { force: true });
      } else {
        await fs.mkdir(path.dirname(objectPath), { recursive: true });
        await fs.rename(tmpPath, objectPath);
        await fs.chmod(objectPath, 0o444);
      }
      return { sha256, sizeBytes: total, objectPath };
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      throw err;
    }
  }

  /** True when the object exists and its bytes still hash to `sha256`. */
  async has(sha256: Sha256, sizeBytes: number): Promise<boolean> {
    const objectPath = this.objectPath(sha256);
    const st = await fs.stat(objectPath).catch(() => null);
    if (!st?.isFile() || st.size !== sizeBytes) return false;
    const actual = await this.hashes.hashFile(objectPath);
    return actual.sha256 === sha256;
  }

  /** Copies the object to `destPath` unless an identical file is already there. */
  async materializeToPath(sha256: Sha256, destPath: string): Promise<void> {
    const existing = await fs.stat(destPath).catch(() => null);
    if (existing?.isFile()) {
      const current = await this.hashes.hashFile(destPath);
      if (current.sha256 === sha256) return;
      await fs.rm(destPath, { force: true });
    }
    await fs.mkdir(path.dirname(destPath), { recursive: true });
    await fs.copyFile(this.objectPath(sha256), destPath);
    await fs.chmod(destPath, 0o644);
  }
}
