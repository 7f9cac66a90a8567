import { promises as fs } from "fs";
import path from "path";
import { sha256File } from "../core/canonicalJson.js";
import type { Sha256 } from "../core/ids.js";

export interface FileHash {
  sha256: Sha256;
  sizeBytes: number;
}

interface IndexEntry {
  sizeBytes: number;
  mtimeMs: number;
  ino: number;
  pending: Promise<FileHash>;
}

/**
 * Process-wide memo of file content hashes, keyed by absolute path and
 * invalidated when size, mtime or inode change.
 */
export class ContentHashIndex {
  private readonly entries = new Map<string, IndexEntry>();
  private computed = 0;

  /** Number of files actually read and hashed (memo misses). */
  get hashedCount(): number {
    return this.computed;
  }

  async hashFile(filePath: string): Promise<FileHash> {
    const abs = path.resolve(filePath);
    const st = await fs.stat(abs);
    const cached = this.entries.get(abs);
    if (cached && cached.sizeBytes === st.size && cached.mtimeMs === st.mtimeMs && cached.ino === st.ino) {
      return cached.pending;
    }

    this.computed++;
    const pending = sha256File(abs);
    this.entries.set(abs, { sizeBytes: st.size, mtimeMs: st.mtimeMs, ino: st.ino, pending });
    try {
      return await pending;
    } catch (err) {
      this.entries.delete(abs);
      throw err;
    }
  }
}
