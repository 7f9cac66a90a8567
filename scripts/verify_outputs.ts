import path from "path";
import { verifyOutputDir } from "../src/publish/manifest.js";

function usage(): string {
  return ["usage:", "  tsx scripts/verify_outputs.ts --out <dir>", ""].join("\n");
}

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (key === "help") {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }
  const out = args.out;
  if (typeof out !== "string") throw new Error(`--out is required\n\n${usage()}`);
  const manifest = await verifyOutputDir(path.resolve(out));
  process.stdout.write(`ok ${manifest.run_id} (${manifest.files.length} files)\n`);
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
