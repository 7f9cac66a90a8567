import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import { ConfigurationError } from "../core/errors.js";
import type { Sha256 } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import { ACTIVATIONS, ENZYMES, ISOBARIC_PLEXES, isobaricChannels, type AccessionType, type IsobaricPlex } from "./enums.js";

const zPath = z.string().min(1);
const zConfLvl = z.number().gt(0).lte(1);

const zTaskResources = z.object({
  cpus: z.number().int().min(1).optional(),
  memory_mb: z.number().int().min(1).optional()
});

export const zRunConfigFile = z.object({
  mzmldef: zPath,
  tdb: zPath,
  mods: zPath,
  outdir: zPath.default("results"),
  workdir: zPath.default("work"),
  isobaric: z.enum(ISOBARIC_PLEXES).nullable().default(null),
  activation: z.enum(ACTIVATIONS).default("hcd"),
  enzyme: z.enum(ENZYMES).default("trypsin"),
  fractions: z.boolean().default(false),
  hirief: zPath.nullable().default(null),
  genes: z.boolean().default(false),
  symbols: z.boolean().default(false),
  onlypeptides: z.boolean().default(false),
  noquant: z.boolean().default(false),
  quantlookup: zPath.nullable().default(null),
  normalize: z.boolean().default(false),
  deqms: z.boolean().default(false),
  sampletable: zPath.nullable().default(null),
  psmconflvl: zConfLvl.default(0.01),
  pepconflvl: zConfLvl.default(0.01),
  denoms: z.string().min(1).nullable().default(null),
  resources: z
    .object({
      max_cpus: z.number().int().min(1).default(4),
      max_memory_mb: z.number().int().min(1).default(16384)
    })
    .default({ max_cpus: 4, max_memory_mb: 16384 }),
  tasks: z.record(z.string(), zTaskResources).default({})
});

export type RunConfigFile = z.input<typeof zRunConfigFile>;
type ParsedRunConfig = z.output<typeof zRunConfigFile>;

/** Immutable run configuration. Every conditional edge of the graph is a function of this object. */
export type RunConfig = Readonly<
  Omit<ParsedRunConfig, "resources" | "tasks"> & {
    resources: Readonly<ParsedRunConfig["resources"]>;
    tasks: Readonly<Record<string, Readonly<{ cpus?: number; memory_mb?: number }>>>;
    /** Denominator channels per set, parsed from `denoms`. */
    denomsBySet: Readonly<Record<string, readonly string[]>> | null;
    configHash: Sha256;
  }
>;

const PATH_OPTIONS = ["mzmldef", "tdb", "mods", "outdir", "workdir", "hirief", "quantlookup", "sampletable"] as const;

function expandEnvToken(value: string): string | null {
  const trimmed = value.trim();

  const m1 = /^\$\{([A-Z0-9_]+)\}(.*)$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)(\/.*)?$/.exec(trimmed);
  if (m1) {
    const varName = m1[1];
    if (!varName) return null;
    const v = process.env[varName]?.trim();
    return v ? `${v}${m1[2] ?? ""}` : null;
  }

  return value;
}

export function parseDenoms(raw: string, plex: IsobaricPlex): Record<string, readonly string[]> {
  const channels = new Set(isobaricChannels(plex));
  const out: Record<string, readonly string[]> = {};
  for (const entry of raw.trim().split(/\s+/)) {
    const [setName, ...denoms] = entry.split(":");
    if (!setName || denoms.length === 0) {
      throw new ConfigurationError(`denoms: malformed entry "${entry}" (expected set:channel[:channel...])`);
    }
    if (Object.prototype.hasOwnProperty.call(out, setName)) {
      throw new ConfigurationError(`denoms: set ${setName} is listed twice`);
    }
    for (const d of denoms) {
      if (!channels.has(d)) throw new ConfigurationError(`denoms: channel ${d} for set ${setName} is not part of ${plex}`);
    }
    out[setName] = Object.freeze([...denoms]);
  }
  return Object.freeze(out);
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.length ? i.path.join(".") : "(root)"}: ${i.message}`).join("; ");
}

function checkCombinations(cfg: ParsedRunConfig): void {
  if (cfg.hirief && !cfg.fractions) {
    throw new ConfigurationError("hirief requires fractions");
  }
  if (!cfg.isobaric) {
    if (cfg.normalize) throw new ConfigurationError("normalize requires isobaric");
    if (cfg.deqms) throw new ConfigurationError("deqms requires isobaric");
    if (cfg.denoms) throw new ConfigurationError("denoms requires isobaric");
  }
  if (cfg.deqms && !cfg.sampletable) {
    throw new ConfigurationError("deqms requires sampletable");
  }
  if (cfg.onlypeptides && (cfg.genes || cfg.symbols)) {
    throw new ConfigurationError("genes/symbols cannot be combined with onlypeptides");
  }
  for (const [task, res] of Object.entries(cfg.tasks)) {
    if (res.cpus !== undefined && res.cpus > cfg.resources.max_cpus) {
      throw new ConfigurationError(`tasks.${task}.cpus=${res.cpus} exceeds resources.max_cpus=${cfg.resources.max_cpus}`);
    }
    if (res.memory_mb !== undefined && res.memory_mb > cfg.resources.max_memory_mb) {
      throw new ConfigurationError(
        `tasks.${task}.memory_mb=${res.memory_mb} exceeds resources.max_memory_mb=${cfg.resources.max_memory_mb}`
      );
    }
  }
}

async function assertFileExists(option: string, filePath: string | null): Promise<void> {
  if (filePath === null) return;
  try {
    const st = await fs.stat(filePath);
    if (!st.isFile()) throw new ConfigurationError(`${option}: not a file: ${filePath}`);
  } catch (err) {
    if (err instanceof ConfigurationError) throw err;
    throw new ConfigurationError(`${option}: required input file not found: ${filePath}`);
  }
}

/**
 * Validates a raw option mapping into a frozen RunConfig. Relative paths are
 * resolved against `baseDir`; input files must exist.
 */
export async function parseRunConfig(raw: unknown, baseDir: string): Promise<RunConfig> {
  const result = zRunConfigFile.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`invalid run configuration: ${formatIssues(result.error)}`);
  }
  const cfg = result.data;

  for (const option of PATH_OPTIONS) {
    const value = cfg[option];
    if (value === null) continue;
    const expanded = expandEnvToken(value);
    if (expanded === null) throw new ConfigurationError(`${option}: environment variable in "${value}" is not set`);
    cfg[option] = path.resolve(baseDir, expanded);
  }

  checkCombinations(cfg);

  await assertFileExists("mzmldef", cfg.mzmldef);
  await assertFileExists("tdb", cfg.tdb);
  await assertFileExists("mods", cfg.mods);
  await assertFileExists("hirief", cfg.hirief);
  await assertFileExists("quantlookup", cfg.quantlookup);
  await assertFileExists("sampletable", cfg.sampletable);

  const denomsBySet = cfg.isobaric && cfg.denoms ? parseDenoms(cfg.denoms, cfg.isobaric) : null;

  const tasks: Record<string, Readonly<{ cpus?: number; memory_mb?: number }>> = {};
  for (const [name, res] of Object.entries(cfg.tasks)) tasks[name] = Object.freeze({ ...res });

  return Object.freeze({
    ...cfg,
    resources: Object.freeze({ ...cfg.resources }),
    tasks: Object.freeze(tasks),
    denomsBySet,
    configHash: sha256Prefixed(stableJsonStringify(cfg))
  });
}

export async function loadRunConfig(filePath: string): Promise<RunConfig> {
  const raw = await fs.readFile(filePath, "utf8");
  const parsed: unknown = YAML.parse(raw);
  return parseRunConfig(parsed, path.dirname(path.resolve(filePath)));
}

/** Accession types whose FDR/merge branches exist for this configuration. */
export function accessionTypes(cfg: RunConfig): AccessionType[] {
  if (cfg.onlypeptides) return [];
  const out: AccessionType[] = ["protein"];
  if (cfg.genes) out.push("gene");
  if (cfg.symbols) out.push("symbol");
  return out;
}

/** Output of the quant/lookup branch: build it, or load a pre-built lookup. */
export function quantMode(cfg: RunConfig): "prebuilt" | "noquant" | "quant" {
  if (cfg.quantlookup) return "prebuilt";
  if (cfg.noquant) return "noquant";
  return "quant";
}

/** JSON form of the configuration, stored with the run record. */
export function configSnapshot(cfg: RunConfig): JsonObject {
  const tasks: JsonObject = {};
  for (const [name, res] of Object.entries(cfg.tasks)) {
    tasks[name] = { cpus: res.cpus ?? null, memory_mb: res.memory_mb ?? null };
  }
  const denoms: JsonObject | null = cfg.denomsBySet ? {} : null;
  if (denoms && cfg.denomsBySet) {
    for (const [set, channels] of Object.entries(cfg.denomsBySet)) denoms[set] = [...channels];
  }
  return {
    mzmldef: cfg.mzmldef,
    tdb: cfg.tdb,
    mods: cfg.mods,
    outdir: cfg.outdir,
    workdir: cfg.workdir,
    isobaric: cfg.isobaric,
    activation: cfg.activation,
    enzyme: cfg.enzyme,
    fractions: cfg.fractions,
    hirief: cfg.hirief,
    genes: cfg.genes,
    symbols: cfg.symbols,
    onlypeptides: cfg.onlypeptides,
    noquant: cfg.noquant,
    quantlookup: cfg.quantlookup,
    normalize: cfg.normalize,
    deqms: cfg.deqms,
    sampletable: cfg.sampletable,
    psmconflvl: cfg.psmconflvl,
    pepconflvl: cfg.pepconflvl,
    denoms,
    resources: { max_cpus: cfg.resources.max_cpus, max_memory_mb: cfg.resources.max_memory_mb },
    tasks,
    config_hash: cfg.configHash
  };
}
