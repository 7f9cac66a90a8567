import { describe, it, expect } from "vitest";

import { TopologyError } from "../src/core/errors.js";
import { Flow } from "../src/dataflow/flow.js";
import {
  broadcast,
  choice,
  combine,
  concat,
  count,
  cross,
  filter,
  fromList,
  groupTuple,
  join,
  map,
  mix,
  single,
  toList,
  transpose,
  ungroup,
  unique
} from "../src/dataflow/operators.js";

interface Psm {
  setName: string;
  td: "target" | "decoy";
  file: string;
}

const PSMS: Psm[] = [
  { setName: "B", td: "target", file: "b1" },
  { setName: "A", td: "target", file: "a2" },
  { setName: "A", td: "decoy", file: "a1" },
  { setName: "B", td: "decoy", file: "b2" },
  { setName: "A", td: "target", file: "a3" }
];

function recordKey(p: Psm): string {
  return `${p.setName}/${p.td}/${p.file}`;
}

describe("channels", () => {
  it("allows one consumer per stream", () => {
    const flow = new Flow();
    const src = fromList(flow, "src", [1, 2]);
    map(src, (n) => n + 1);
    expect(() => map(src, (n) => n * 2)).toThrow(TopologyError);
  });

  it("replays a value to every consumer", async () => {
    const flow = new Flow();
    const total = count(fromList(flow, "src", ["x", "y", "z"]));
    const doubled = toList(cross(fromList(flow, "a", [1, 2]), total, (n, c) => n * c));
    const tripled = toList(cross(fromList(flow, "b", [10]), total, (n, c) => n + c));
    await flow.run();
    expect(await total.get()).toBe(3);
    expect(await doubled.get()).toEqual([3, 6]);
    expect(await tripled.get()).toEqual([13]);
  });

  it("records the declared topology before running", () => {
    const flow = new Flow();
    const src = fromList(flow, "src", [1]);
    toList(map(src, (n) => n, "inc"));
    expect(flow.nodes.map((n) => [n.name, n.kind])).toEqual([
      ["src", "source"],
      ["inc", "operator"],
      ["toList", "operator"]
    ]);
    expect(flow.edges()).toEqual([
      { from: "src", to: "inc", channel: "src.out" },
      { from: "inc", to: "toList", channel: "inc.out" }
    ]);
  });
});

describe("operators", () => {
  it("map and filter preserve order", async () => {
    const flow = new Flow();
    const out = toList(filter(map(fromList(flow, "src", [5, 1, 4, 2, 3]), (n) => n * 10), (n) => n > 15));
    await flow.run();
    expect(await out.get()).toEqual([50, 40, 20, 30]);
  });

  it("unique keeps the first record for each key", async () => {
    const flow = new Flow();
    const out = toList(unique(fromList(flow, "src", PSMS), (p) => p.setName));
    await flow.run();
    expect((await out.get()).map((p) => p.file)).toEqual(["b1", "a2"]);
  });

  it("groupTuple emits groups in first-seen key order with sorted items", async () => {
    const flow = new Flow();
    const out = toList(groupTuple(fromList(flow, "src", PSMS), (p) => p.setName, { sortBy: (p) => p.file }));
    await flow.run();
    const groups = await out.get();
    expect(groups.map((g) => g.key)).toEqual(["B", "A"]);
    expect(groups[1].items.map((p) => p.file)).toEqual(["a1", "a2", "a3"]);
  });

  it("groupTuple followed by ungroup returns the same multiset", async () => {
    const flow = new Flow();
    const grouped = groupTuple(fromList(flow, "src", PSMS), (p) => ({ set: p.setName, td: p.td }));
    const out = toList(ungroup(grouped));
    await flow.run();
    const back = (await out.get()).map(recordKey).sort();
    expect(back).toEqual(PSMS.map(recordKey).sort());
  });

  it("groupTuple followed by transpose over the grouped lists returns the same multiset", async () => {
    const flow = new Flow();
    const grouped = map(
      groupTuple(fromList(flow, "src", PSMS), (p) => p.setName),
      (g) => ({ setName: g.key, tds: g.items.map((p) => p.td), files: g.items.map((p) => p.file) })
    );
    const out = toList(
      transpose(
        grouped,
        (g) => [g.tds, g.files],
        (g, i): Psm => ({ setName: g.setName, td: g.tds[i], file: g.files[i] })
      )
    );
    await flow.run();
    expect((await out.get()).map(recordKey).sort()).toEqual(PSMS.map(recordKey).sort());
  });

  it("groupTuple with size emits full groups and drops the remainder", async () => {
    const flow = new Flow();
    const out = toList(groupTuple(fromList(flow, "src", PSMS), (p) => p.setName, { size: 2 }));
    await flow.run();
    const groups = await out.get();
    expect(groups.map((g) => [g.key, g.items.map((p) => p.file)])).toEqual([
      ["A", ["a2", "a1"]],
      ["B", ["b1", "b2"]]
    ]);
  });

  it("groupTuple with size and remainder keeps incomplete groups", async () => {
    const flow = new Flow();
    const out = toList(groupTuple(fromList(flow, "src", PSMS), (p) => p.setName, { size: 2, remainder: true }));
    await flow.run();
    expect((await out.get()).map((g) => g.items.length)).toEqual([2, 2, 1]);
  });

  it("transpose rejects mismatched list lengths", async () => {
    const flow = new Flow();
    const src = fromList(flow, "src", [{ files: ["a", "b"], tds: ["target"] }]);
    toList(
      transpose(
        src,
        (r) => [r.files, r.tds],
        (r, i) => `${r.files[i]}:${r.tds[i]}`
      )
    );
    await expect(flow.run()).rejects.toThrow(/mismatched lengths \[2, 1\]/);
  });

  it("join keeps only keys on both sides, sorted by key", async () => {
    const flow = new Flow();
    const left = fromList(flow, "left", [
      { k: "c", v: 1 },
      { k: "a", v: 2 },
      { k: "b", v: 3 }
    ]);
    const right = fromList(flow, "right", [
      { k: "a", w: "x" },
      { k: "d", w: "y" },
      { k: "c", w: "z" }
    ]);
    const unmatched: string[] = [];
    const out = toList(
      join(
        left,
        right,
        (l) => l.k,
        (r) => r.k,
        { onUnmatched: (key, side) => unmatched.push(`${key}:${side}`) }
      )
    );
    await flow.run();
    expect((await out.get()).map((j) => [j.key, j.left.v, j.right.w])).toEqual([
      ["a", 2, "x"],
      ["c", 1, "z"]
    ]);
    expect(unmatched).toEqual(["b:left", "d:right"]);
  });

  it("join rejects a duplicated key", async () => {
    const flow = new Flow();
    const left = fromList(flow, "left", ["a", "a"]);
    const right = fromList(flow, "right", ["a"]);
    toList(join(left, right, (l) => l, (r) => r));
    await expect(flow.run()).rejects.toThrow(/duplicate key on left side/);
  });

  it("combine pairs every left record with every right record of the same key", async () => {
    const flow = new Flow();
    const left = fromList(flow, "left", PSMS);
    const right = fromList(flow, "right", [
      { setName: "A", denom: "126" },
      { setName: "A", denom: "131" }
    ]);
    const out = toList(combine(left, right, (l) => l.setName, (r) => r.setName));
    await flow.run();
    expect((await out.get()).map((j) => `${j.left.file}-${j.right.denom}`)).toEqual([
      "a2-126",
      "a2-131",
      "a1-126",
      "a1-131",
      "a3-126",
      "a3-131"
    ]);
  });

  it("choice routes each record to its tagged outlet", async () => {
    const flow = new Flow();
    const outlets = choice(fromList(flow, "src", PSMS), ["target", "decoy"] as const, (p) => p.td);
    const targets = toList(outlets.get("target"));
    const decoys = toList(outlets.get("decoy"));
    await flow.run();
    expect((await targets.get()).map((p) => p.file)).toEqual(["b1", "a2", "a3"]);
    expect((await decoys.get()).map((p) => p.file)).toEqual(["a1", "b2"]);
  });

  it("broadcast delivers every record to every outlet", async () => {
    const flow = new Flow();
    const outlets = broadcast(fromList(flow, "src", [1, 2, 3]), ["left", "right"] as const);
    const left = toList(outlets.get("left"));
    const right = count(outlets.get("right"));
    await flow.run();
    expect(await left.get()).toEqual([1, 2, 3]);
    expect(await right.get()).toBe(3);
  });

  it("concat drains sources in order", async () => {
    const flow = new Flow();
    const out = toList(concat([fromList(flow, "a", [1, 2]), fromList(flow, "b", [3]), fromList(flow, "c", [4, 5])]));
    await flow.run();
    expect(await out.get()).toEqual([1, 2, 3, 4, 5]);
  });

  it("mix forwards every record of every source", async () => {
    const flow = new Flow();
    const out = toList(mix([fromList(flow, "a", ["a1", "a2"]), fromList(flow, "b", ["b1"])]));
    await flow.run();
    expect([...(await out.get())].sort()).toEqual(["a1", "a2", "b1"]);
  });

  it("single requires exactly one record", async () => {
    const flow = new Flow();
    single(fromList(flow, "src", ["db1", "db2"]), "db");
    await expect(flow.run()).rejects.toThrow("db: expected exactly one record from src.out, got 2");
  });

  it("a failing node fails the run with its own error", async () => {
    const flow = new Flow();
    const out = toList(
      map(fromList(flow, "src", [1, 2]), (n) => {
        if (n === 2) throw new Error("boom at 2");
        return n;
      })
    );
    await expect(flow.run()).rejects.toThrow("boom at 2");
    await expect(out.get()).rejects.toThrow("boom at 2");
    expect(flow.signal.aborted).toBe(true);
  });
});
