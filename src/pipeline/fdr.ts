import type { AccessionType } from "../config/enums.js";
import { readColumn, readHeader } from "../core/tsv.js";
import type { Stream } from "../dataflow/channel.js";
import { choice, filter, groupTuple, join, map, mapAsync, ungroup } from "../dataflow/operators.js";
import type { PipelineLog } from "./process.js";

export const TARGET_DECOY = ["target", "decoy"] as const;
export type TargetDecoy = (typeof TARGET_DECOY)[number];

/** Peptide table of one set and arm, tagged with the accession type it will be competed at. */
export interface FdrCandidate {
  setName: string;
  accType: AccessionType;
  td: TargetDecoy;
  table: string;
}

export interface CompetitionPair {
  setName: string;
  accType: AccessionType;
  target: string;
  decoy: string;
}

export interface CompetitionInput extends CompetitionPair {
  scoreColumn: string;
  /** The score is a q-value (lower is better). */
  logScore: boolean;
}

export interface PairKey {
  setName: string;
  accType: AccessionType;
}

const PRIMARY_SCORE_PATTERNS: readonly RegExp[] = [/svm/i, /q-value/i];
export const FALLBACK_SCORE_COLUMN = "MSGFScore";

function pairKey(r: { setName: string; accType: AccessionType }): PairKey {
  return { setName: r.setName, accType: r.accType };
}

/**
 * Competition only happens for keys that have exactly one target and one
 * decoy table. Groups of any other shape are dropped with a warning.
 */
export function pairTargetDecoy(log: PipelineLog, src: Stream<FdrCandidate>): Stream<CompetitionPair> {
  const grouped = groupTuple(src, pairKey, { name: "fdr.groupBySetAccession", sortBy: (r) => r.td });
  const complete = filter(
    grouped,
    (g) => {
      const arms = g.items.map((r) => r.td);
      const paired = arms.length === 2 && arms.includes("target") && arms.includes("decoy");
      if (!paired) {
        log.warn(
          "unpaired_target_decoy",
          `no ${g.key.accType} competition for set ${g.key.setName}: arms present [${arms.join(", ")}]`,
          { set: g.key.setName, acc_type: g.key.accType, present: arms }
        );
      }
      return paired;
    },
    "fdr.requirePair"
  );
  const arms = choice(ungroup(complete, "fdr.ungroup"), TARGET_DECOY, (r) => r.td, "fdr.splitArms");
  const joined = join(arms.get("target"), arms.get("decoy"), pairKey, pairKey, { name: "fdr.joinArms" });
  return map(
    joined,
    (j) => ({ setName: j.key.setName, accType: j.key.accType, target: j.left.table, decoy: j.right.table }),
    "fdr.pairs"
  );
}

function informative(values: readonly string[] | null): boolean {
  if (!values) return false;
  return values.some((v) => {
    const n = Number(v);
    return v.trim().length > 0 && Number.isFinite(n) && n !== 0;
  });
}

export type ScoreSelection =
  | { kind: "empty"; arm: TargetDecoy }
  | { kind: "unusable"; primary: string | null }
  | { kind: "primary" | "fallback"; column: string; logScore: boolean; rejected: string | null };

/**
 * Picks the score column the competition ranks by. The primary column is
 * used unless it is missing, all zero or all blank in either arm; then the raw
 * search-engine score is used instead.
 */
export async function selectScoreColumn(target: string, decoy: string): Promise<ScoreSelection> {
  const header = await readHeader(target);
  const targetScores = new Map<string, string[] | null>();
  const decoyScores = new Map<string, string[] | null>();
  const columnIn = async (cache: Map<string, string[] | null>, file: string, column: string): Promise<string[] | null> => {
    const cached = cache.get(column);
    if (cached !== undefined) return cached;
    const values = await readColumn(file, column);
    cache.set(column, values);
    return values;
  };

  let primary: string | null = null;
  for (const pattern of PRIMARY_SCORE_PATTERNS) {
    primary = header.find((h) => pattern.test(h)) ?? null;
    if (primary) break;
  }

  const first = primary ?? FALLBACK_SCORE_COLUMN;
  const t = await columnIn(targetScores, target, first);
  const d = await columnIn(decoyScores, decoy, first);
  if (t !== null && t.length === 0) return { kind: "empty", arm: "target" };
  if (d !== null && d.length === 0) return { kind: "empty", arm: "decoy" };

  if (primary && informative(t) && informative(d)) {
    return { kind: "primary", column: primary, logScore: /q-value/i.test(primary), rejected: null };
  }
  const ft = await columnIn(targetScores, target, FALLBACK_SCORE_COLUMN);
  const fd = await columnIn(decoyScores, decoy, FALLBACK_SCORE_COLUMN);
  if (informative(ft) && informative(fd)) {
    return { kind: "fallback", column: FALLBACK_SCORE_COLUMN, logScore: false, rejected: primary };
  }
  return { kind: "unusable", primary };
}

/** Attaches the score column to every pair; pairs with an empty arm or no usable score are dropped with a warning. */
export function chooseScoreColumns(log: PipelineLog, pairs: Stream<CompetitionPair>): Stream<CompetitionInput> {
  const scored = mapAsync(
    pairs,
    async (p): Promise<CompetitionInput | null> => {
      const sel = await selectScoreColumn(p.target, p.decoy);
      if (sel.kind === "empty") {
        log.warn("empty_table", `${sel.arm} ${p.accType} input of set ${p.setName} has no rows; competition skipped`, {
          set: p.setName,
          acc_type: p.accType,
          arm: sel.arm
        });
        return null;
      }
      if (sel.kind === "unusable") {
        log.warn(
          "no_usable_score",
          `set ${p.setName} ${p.accType}: neither ${sel.primary ?? "a primary score"} nor ${FALLBACK_SCORE_COLUMN} varies in both arms; competition skipped`,
          { set: p.setName, acc_type: p.accType, primary: sel.primary, fallback: FALLBACK_SCORE_COLUMN }
        );
        return null;
      }
      if (sel.kind === "fallback") {
        log.warn(
          "score_fallback",
          `set ${p.setName} ${p.accType}: score column ${sel.rejected ?? "(none)"} has no variance; using ${sel.column}`,
          { set: p.setName, acc_type: p.accType, primary: sel.rejected, fallback: sel.column }
        );
      }
      return { ...p, scoreColumn: sel.column, logScore: sel.logScore };
    },
    "fdr.scoreColumn"
  );
  return filter(scored, (r): r is CompetitionInput => r !== null, "fdr.dropEmpty");
}
