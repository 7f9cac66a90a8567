import { stableJsonStringify } from "../core/canonicalJson.js";
import { TopologyError } from "../core/errors.js";
import { Stream, Value } from "./channel.js";
import type { Flow } from "./flow.js";

export interface Group<K, T> {
  key: K;
  items: T[];
}

export interface Joined<K, L, R> {
  key: K;
  left: L;
  right: R;
}

/** Named streams produced by `choice` and `broadcast`. */
export class Outlets<N extends string, T> {
  constructor(private readonly byName: ReadonlyMap<N, Stream<T>>) {}

  get(name: N): Stream<T> {
    const s = this.byName.get(name);
    if (!s) throw new TopologyError(`unknown outlet: ${name}`);
    return s;
  }
}

function keyString(key: unknown): string {
  return stableJsonStringify(key);
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function fromList<T>(flow: Flow, name: string, items: readonly T[]): Stream<T> {
  const node = flow.nodeName(name);
  const out = flow.stream<T>(`${node}.out`, node);
  flow.declare({ kind: "source", name: node, inputs: [], outputs: [out] }, async () => {
    for (const item of items) out.emit(item);
  });
  return out;
}

export function map<T, U>(src: Stream<T>, fn: (record: T) => U, name = "map"): Stream<U> {
  const flow = src.flow;
  const node = flow.nodeName(name);
  const input = src.subscribe(node);
  const out = flow.stream<U>(`${node}.out`, node);
  flow.declare({ kind: "operator", name: node, inputs: [src], outputs: [out] }, async () => {
    for await (const r of input) out.emit(fn(r));
  });
  return out;
}

/** Order-preserving async map; one record is in flight at a time. */
export function mapAsync<T, U>(src: Stream<T>, fn: (record: T) => Promise<U>, name = "mapAsync"): Stream<U> {
  const flow = src.flow;
  const node = flow.nodeName(name);
  const input = src.subscribe(node);
  const out = flow.stream<U>(`${node}.out`, node);
  flow.declare({ kind: "operator", name: node, inputs: [src], outputs: [out] }, async () => {
    for await (const r of input) out.emit(await fn(r));
  });
  return out;
}

export function filter<T, S extends T>(src: Stream<T>, predicate: (record: T) => record is S, name?: string): Stream<S>;
export function filter<T>(src: Stream<T>, predicate: (record: T) => boolean, name?: string): Stream<T>;
export function filter<T>(src: Stream<T>, predicate: (record: T) => boolean, name = "filter"): Stream<T> {
  const flow = src.flow;
  const node = flow.nodeName(name);
  const input = src.subscribe(node);
  const out = flow.stream<T>(`${node}.out`, node);
  flow.declare({ kind: "operator", name: node, inputs: [src], outputs: [out] }, async () => {
    for await (const r of input) {
      if (predicate(r)) out.emit(r);
    }
  });
  return out;
}

/** Drops records whose projected key was already seen; first arrival wins. */
export function unique<T>(src: Stream<T>, keyOf: (record: T) => unknown, name = "unique"): Stream<T> {
  const flow = src.flow;
  const node = flow.nodeName(name);
  const input = src.subscribe(node);
  const out = flow.stream<T>(`${node}.out`, node);
  flow.declare({ kind: "operator", name: node, inputs: [src], outputs: [out] }, async () => {
    const seen = new Set<string>();
    for await (const r of input) {
      const k = keyString(keyOf(r));
      if (seen.has(k)) continue;
      seen.add(k);
      out.emit(r);
    }
  });
  return out;
}

/**
 * Buckets the whole channel by key and emits one group per key in first-seen
 * key order. `sortBy` orders the items inside each group; without it items
 * keep arrival order. With `size`, a group is emitted as soon as it holds that
 * many items, and incomplete groups are dropped at close unless `remainder`.
 */
export function groupTuple<T, K>(
  src: Stream<T>,
  keyOf: (record: T) => K,
  opts: { name?: string; sortBy?: (record: T) => string; size?: number; remainder?: boolean } = {}
): Stream<Group<K, T>> {
  const flow = src.flow;
  const node = flow.nodeName(opts.name ?? "groupTuple");
  const size = opts.size;
  if (size !== undefined && (!Number.isInteger(size) || size < 1)) {
    throw new TopologyError(`${node}: size must be a positive integer`, node);
  }
  const input = src.subscribe(node);
  const out = flow.stream<Group<K, T>>(`${node}.out`, node);
  const sortBy = opts.sortBy;
  const sorted = (items: T[]): T[] =>
    sortBy ? [...items].sort((a, b) => compareStrings(sortBy(a), sortBy(b))) : items;

  flow.declare({ kind: "operator", name: node, inputs: [src], outputs: [out] }, async () => {
    const groups = new Map<string, Group<K, T>>();
    for await (const r of input) {
      const key = keyOf(r);
      const k = keyString(key);
      let g = groups.get(k);
      if (!g) {
        g = { key, items: [] };
        groups.set(k, g);
      }
      g.items.push(r);
      if (size !== undefined && g.items.length === size) {
        out.emit({ key: g.key, items: sorted(g.items) });
        groups.delete(k);
      }
    }
    for (const g of groups.values()) {
      if (size !== undefined && !opts.remainder) continue;
      out.emit({ key: g.key, items: sorted(g.items) });
    }
  });
  return out;
}

/**
 * Emits one record per index across parallel list fields. All lists returned
 * by `lists` must have the same length.
 */
export function transpose<R, O>(
  src: Stream<R>,
  lists: (record: R) => ReadonlyArray<readonly unknown[]>,
  build: (record: R, index: number) => O,
  name = "transpose"
): Stream<O> {
  const flow = src.flow;
  const node = flow.nodeName(name);
  const input = src.subscribe(node);
  const out = flow.stream<O>(`${node}.out`, node);
  flow.declare({ kind: "operator", name: node, inputs: [src], outputs: [out] }, async () => {
    for await (const r of input) {
      const fields = lists(r);
      const lengths = fields.map((f) => f.length);
      const n = lengths[0] ?? 0;
      if (lengths.some((l) => l !== n)) {
        throw new TopologyError(`${node}: parallel list fields have mismatched lengths [${lengths.join(", ")}]`, node);
      }
      for (let i = 0; i < n; i++) out.emit(build(r, i));
    }
  });
  return out;
}

/** Inverse of `groupTuple`. */
export function ungroup<K, T>(src: Stream<Group<K, T>>, name = "ungroup"): Stream<T> {
  return transpose(
    src,
    (g) => [g.items],
    (g, i) => g.items[i],
    name
  );
}

async function materializeByKey<T, K>(
  input: AsyncIterable<T>,
  keyOf: (record: T) => K
): Promise<Map<string, { key: K; records: T[] }>> {
  const byKey = new Map<string, { key: K; records: T[] }>();
  for await (const r of input) {
    const key = keyOf(r);
    const k = keyString(key);
    const entry = byKey.get(k);
    if (entry) entry.records.push(r);
    else byKey.set(k, { key, records: [r] });
  }
  return byKey;
}

export type UnmatchedHandler<K> = (key: K, presentOn: "left" | "right") => void;

/**
 * Emits one record per key present on both sides, ordered by key. Keys found
 * on only one side are dropped and reported to `onUnmatched`. A key that
 * occurs more than once on either side is a topology error.
 */
export function join<L, R, K>(
  left: Stream<L>,
  right: Stream<R>,
  keyOfLeft: (record: L) => K,
  keyOfRight: (record: R) => K,
  opts: { name?: string; onUnmatched?: UnmatchedHandler<K> } = {}
): Stream<Joined<K, L, R>> {
  const flow = left.flow;
  const node = flow.nodeName(opts.name ?? "join");
  const leftIn = left.subscribe(node);
  const rightIn = right.subscribe(node);
  const out = flow.stream<Joined<K, L, R>>(`${node}.out`, node);
  flow.declare({ kind: "operator", name: node, inputs: [left, right], outputs: [out] }, async () => {
    const [l, r] = await Promise.all([
      materializeByKey(leftIn, keyOfLeft),
      materializeByKey(rightIn, keyOfRight)
    ]);
    const keys = new Set<string>([...l.keys(), ...r.keys()]);
    for (const k of [...keys].sort(compareStrings)) {
      const le = l.get(k);
      const re = r.get(k);
      if (le && le.records.length > 1) throw new TopologyError(`${node}: duplicate key on left side: ${k}`, node);
      if (re && re.records.length > 1) throw new TopologyError(`${node}: duplicate key on right side: ${k}`, node);
      const lr = le?.records[0];
      const rr = re?.records[0];
      if (le && re && lr !== undefined && rr !== undefined) {
        out.emit({ key: le.key, left: lr, right: rr });
      } else if (le) {
        opts.onUnmatched?.(le.key, "left");
      } else if (re) {
        opts.onUnmatched?.(re.key, "right");
      }
    }
  });
  return out;
}

/** Every left record paired with every right record sharing its key, ordered by key then arrival. */
export function combine<L, R, K>(
  left: Stream<L>,
  right: Stream<R>,
  keyOfLeft: (record: L) => K,
  keyOfRight: (record: R) => K,
  name = "combine"
): Stream<Joined<K, L, R>> {
  const flow = left.flow;
  const node = flow.nodeName(name);
  const leftIn = left.subscribe(node);
  const rightIn = right.subscribe(node);
  const out = flow.stream<Joined<K, L, R>>(`${node}.out`, node);
  flow.declare({ kind: "operator", name: node, inputs: [left, right], outputs: [out] }, async () => {
    const [l, r] = await Promise.all([
      materializeByKey(leftIn, keyOfLeft),
      materializeByKey(rightIn, keyOfRight)
    ]);
    for (const k of [...l.keys()].sort(compareStrings)) {
      const le = l.get(k);
      const re = r.get(k);
      if (!le || !re) continue;
      for (const lr of le.records) {
        for (const rr of re.records) out.emit({ key: le.key, left: lr, right: rr });
      }
    }
  });
  return out;
}

/** Pairs every record with a singleton value (keyless combine). */
export function cross<T, V, O>(src: Stream<T>, value: Value<V>, build: (record: T, value: V) => O, name = "cross"): Stream<O> {
  const flow = src.flow;
  const node = flow.nodeName(name);
  const input = src.subscribe(node);
  const out = flow.stream<O>(`${node}.out`, node);
  flow.declare({ kind: "operator", name: node, inputs: [src, value], outputs: [out] }, async () => {
    const v = await value.get();
    for await (const r of input) out.emit(build(r, v));
  });
  return out;
}

/** Interleaves sources in arrival order; each source keeps its own order. */
export function mix<T>(sources: Array<Stream<T>>, name = "mix"): Stream<T> {
  const first = sources[0];
  if (!first) throw new TopologyError(`${name}: needs at least one source`);
  const flow = first.flow;
  const node = flow.nodeName(name);
  const inputs = sources.map((s) => s.subscribe(node));
  const out = flow.stream<T>(`${node}.out`, node);
  flow.declare({ kind: "operator", name: node, inputs: sources, outputs: [out] }, async () => {
    await Promise.all(
      inputs.map(async (input) => {
        for await (const r of input) out.emit(r);
      })
    );
  });
  return out;
}

/** Drains sources one after the other. */
export function concat<T>(sources: Array<Stream<T>>, name = "concat"): Stream<T> {
  const first = sources[0];
  if (!first) throw new TopologyError(`${name}: needs at least one source`);
  const flow = first.flow;
  const node = flow.nodeName(name);
  const inputs = sources.map((s) => s.subscribe(node));
  const out = flow.stream<T>(`${node}.out`, node);
  flow.declare({ kind: "operator", name: node, inputs: sources, outputs: [out] }, async () => {
    for (const input of inputs) {
      for await (const r of input) out.emit(r);
    }
  });
  return out;
}

export function toList<T>(src: Stream<T>, name = "toList"): Value<T[]> {
  const flow = src.flow;
  const node = flow.nodeName(name);
  const input = src.subscribe(node);
  const out = flow.value<T[]>(`${node}.out`, node);
  flow.declare({ kind: "operator", name: node, inputs: [src], outputs: [out] }, async () => {
    const all: T[] = [];
    for await (const r of input) all.push(r);
    out.set(all);
  });
  return out;
}

export function count<T>(src: Stream<T>, name = "count"): Value<number> {
  const flow = src.flow;
  const node = flow.nodeName(name);
  const input = src.subscribe(node);
  const out = flow.value<number>(`${node}.out`, node);
  flow.declare({ kind: "operator", name: node, inputs: [src], outputs: [out] }, async () => {
    let n = 0;
    for await (const _record of input) n++;
    out.set(n);
  });
  return out;
}

/** Keyed dispatch: each record goes to the outlet named by its tag. */
export function choice<T, N extends string>(
  src: Stream<T>,
  tags: readonly N[],
  tagOf: (record: T) => N,
  name = "choice"
): Outlets<N, T> {
  const flow = src.flow;
  const node = flow.nodeName(name);
  const input = src.subscribe(node);
  const outs = new Map<N, Stream<T>>();
  for (const t of tags) outs.set(t, flow.stream<T>(`${node}.${t}`, node));
  flow.declare({ kind: "operator", name: node, inputs: [src], outputs: [...outs.values()] }, async () => {
    for await (const r of input) {
      const tag = tagOf(r);
      const target = outs.get(tag);
      if (!target) throw new TopologyError(`${node}: record tag "${tag}" has no outlet`, node);
      target.emit(r);
    }
  });
  return new Outlets(outs);
}

/** Explicit fan-out: every outlet receives every record, pulled independently. */
export function broadcast<T, N extends string>(src: Stream<T>, names: readonly N[], name = "broadcast"): Outlets<N, T> {
  const flow = src.flow;
  const node = flow.nodeName(name);
  const input = src.subscribe(node);
  const outs = new Map<N, Stream<T>>();
  for (const n of names) outs.set(n, flow.stream<T>(`${node}.${n}`, node));
  flow.declare({ kind: "operator", name: node, inputs: [src], outputs: [...outs.values()] }, async () => {
    for await (const r of input) {
      for (const o of outs.values()) o.emit(r);
    }
  });
  return new Outlets(outs);
}

/** Singleton from a stream that must carry exactly one record. */
export function single<T>(src: Stream<T>, name = "single"): Value<T> {
  const flow = src.flow;
  const node = flow.nodeName(name);
  const input = src.subscribe(node);
  const out = flow.value<T>(`${node}.out`, node);
  flow.declare({ kind: "operator", name: node, inputs: [src], outputs: [out] }, async () => {
    const all: T[] = [];
    for await (const r of input) all.push(r);
    const [only] = all;
    if (all.length !== 1 || only === undefined) {
      throw new TopologyError(`${node}: expected exactly one record from ${src.name}, got ${all.length}`, node);
    }
    out.set(only);
  });
  return out;
}
