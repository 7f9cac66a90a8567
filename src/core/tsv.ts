import { createReadStream } from "fs";
import { createInterface } from "readline";

async function* lines(filePath: string): AsyncGenerator<string, void, undefined> {
  const rl = createInterface({ input: createReadStream(filePath, { encoding: "utf8" }), crlfDelay: Infinity });
  try {
    for await (const line of rl) yield line;
  } finally {
    rl.close();
  }
}

/** Non-blank lines after the header. */
export async function countDataRows(filePath: string): Promise<number> {
  let n = 0;
  let header = true;
  for await (const line of lines(filePath)) {
    if (header) {
      header = false;
      continue;
    }
    if (line.trim().length > 0) n++;
  }
  return n;
}

export async function readHeader(filePath: string): Promise<string[]> {
  for await (const line of lines(filePath)) return line.split("\t");
  return [];
}

/** Values of one column by header name; null when the column is absent. */
export async function readColumn(filePath: string, column: string): Promise<string[] | null> {
  let idx = -1;
  let header = true;
  const values: string[] = [];
  for await (const line of lines(filePath)) {
    const cells = line.split("\t");
    if (header) {
      header = false;
      idx = cells.indexOf(column);
      if (idx < 0) return null;
      continue;
    }
    if (line.trim().length === 0) continue;
    values.push(cells[idx] ?? "");
  }
  return header ? null : values;
}
