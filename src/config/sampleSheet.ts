import { promises as fs } from "fs";
import path from "path";
import { ConfigurationError } from "../core/errors.js";
import { requireInstrument, type Instrument } from "./enums.js";

export interface SampleRecord {
  mzml: string;
  fileName: string;
  instrument: Instrument;
  setName: string;
  plate: string | null;
  fraction: string | null;
}

const SET_NAME_RE = /^[A-Za-z0-9_.-]+$/;

/**
 * Reads the tab-separated mzML definition: `path  instrument  set  [plate  fraction]`.
 * A first line starting with "mzmlfile" is treated as a header.
 */
export async function readSampleSheet(
  filePath: string,
  opts: { fractions: boolean }
): Promise<SampleRecord[]> {
  const text = await fs.readFile(filePath, "utf8");
  const baseDir = path.dirname(filePath);
  const lines = text.split(/\r?\n/);

  const samples: SampleRecord[] = [];
  const fileNames = new Set<string>();

  lines.forEach((line, idx) => {
    const lineNo = idx + 1;
    if (line.trim().length === 0 || line.startsWith("#")) return;
    if (idx === 0 && line.toLowerCase().startsWith("mzmlfile")) return;

    const cols = line.split("\t").map((c) => c.trim());
    const [mzml, instrument, setName, plate, fraction] = cols;
    const context = `${path.basename(filePath)}:${lineNo}`;
    if (!mzml || !instrument || !setName) {
      throw new ConfigurationError(`${context}: expected at least 3 tab-separated columns (mzml, instrument, set)`);
    }
    if (!SET_NAME_RE.test(setName)) {
      throw new ConfigurationError(`${context}: set name "${setName}" may only contain letters, digits, "_", "." and "-"`);
    }
    if (opts.fractions && (!plate || !fraction)) {
      throw new ConfigurationError(`${context}: fractions mode needs plate and fraction columns`);
    }

    const fileName = path.basename(mzml);
    if (fileNames.has(fileName)) {
      throw new ConfigurationError(`${context}: duplicate mzML file name ${fileName}`);
    }
    fileNames.add(fileName);

    samples.push({
      mzml: path.resolve(baseDir, mzml),
      fileName,
      instrument: requireInstrument(instrument, context),
      setName,
      plate: opts.fractions && plate ? plate : null,
      fraction: opts.fractions && fraction ? fraction : null
    });
  });

  if (samples.length === 0) throw new ConfigurationError(`${filePath}: no mzML files listed`);
  for (const s of samples) {
    const st = await fs.stat(s.mzml).catch(() => null);
    if (!st?.isFile()) throw new ConfigurationError(`mzML input not found: ${s.mzml}`);
  }
  return samples;
}

/** Set names in first-seen order. */
export function setNames(samples: readonly SampleRecord[]): string[] {
  const seen: string[] = [];
  for (const s of samples) if (!seen.includes(s.setName)) seen.push(s.setName);
  return seen;
}
