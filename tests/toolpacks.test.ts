import { describe, it, expect } from "vitest";
import * as z from "zod/v4";

import { ConfigurationError } from "../src/core/errors.js";
import { builtinTaskDefinitions, createBuiltinRegistry } from "../src/toolpacks/builtin/index.js";
import { createPsmTableTask } from "../src/toolpacks/builtin/tables.js";
import { msgfSearchTask } from "../src/toolpacks/builtin/search.js";
import { placeholdersOf, renderCommand } from "../src/toolpacks/commandTemplate.js";
import { TaskRegistry, validateTaskSpec } from "../src/toolpacks/register.js";
import { defineTask, type TaskSpec } from "../src/toolpacks/types.js";

function spec(overrides: Partial<TaskSpec> = {}): TaskSpec {
  return {
    name: "sort_table",
    version: "v1",
    description: "test task",
    inputs: ["table"],
    outputs: [{ name: "sorted", path: "sorted.tsv" }],
    command: ["sort", "{{in.table}}", "-o", "{{out.sorted}}"],
    resources: { cpus: 1, memoryMb: 64 },
    ...overrides
  };
}

describe("command templates", () => {
  const template = [
    "tool",
    "-i",
    "{{in.files}}",
    "--name={{param.name}}",
    ["--plex", "{{param.plex}}"],
    ["--sweep", "{{param.sweep}}"],
    ["--denoms", "{{param.denoms}}"],
    "-o",
    "{{out.table}}"
  ];

  it("expands list placeholders and keeps complete optional groups", () => {
    const argv = renderCommand(
      template,
      {
        inputs: { files: ["/in/a.mzid", "/in/b.mzid"] },
        params: { name: "setA", plex: "tmt10plex", sweep: true, denoms: ["126", "131"] },
        outputs: { table: "out.tsv" }
      },
      "task:test"
    );
    expect(argv).toEqual([
      "tool",
      "-i",
      "/in/a.mzid",
      "/in/b.mzid",
      "--name=setA",
      "--plex",
      "tmt10plex",
      "--sweep",
      "--denoms",
      "126",
      "131",
      "-o",
      "out.tsv"
    ]);
  });

  it("drops optional groups whose placeholders are null, false or empty", () => {
    const argv = renderCommand(
      template,
      {
        inputs: { files: ["/in/a.mzid"] },
        params: { name: "setA", plex: null, sweep: false, denoms: [] },
        outputs: { table: "out.tsv" }
      },
      "task:test"
    );
    expect(argv).toEqual(["tool", "-i", "/in/a.mzid", "--name=setA", "-o", "out.tsv"]);
  });

  it("fails when a required token resolves to nothing", () => {
    expect(() =>
      renderCommand(
        template,
        { inputs: { files: [] }, params: { name: "setA", plex: null, sweep: false, denoms: null }, outputs: { table: "out.tsv" } },
        "task:test"
      )
    ).toThrow(new ConfigurationError('task:test: required argument "{{in.files}}" resolved to nothing'));
  });

  it("fails on an unset param", () => {
    expect(() =>
      renderCommand(["tool", "{{param.missing}}"], { inputs: {}, params: {}, outputs: {} }, "task:test")
    ).toThrow(new ConfigurationError("task:test: param missing is not set"));
  });

  it("lists placeholders inside groups", () => {
    expect(placeholdersOf(["a {{in.x}}", ["--p", "{{param.y}}"], "{{out.z}}"])).toEqual([
      { scope: "in", name: "x" },
      { scope: "param", name: "y" },
      { scope: "out", name: "z" }
    ]);
  });

  it("renders the search command with and without an isobaric protocol", () => {
    const bindings = (protocol: number | null) => ({
      inputs: { mzml: ["/d/s.mzML"], db: ["/d/td.fa"], mods: ["/d/mods.txt"] },
      params: { sample: "s", setName: "setA", instrument: 3, fragmentation: 3, enzyme: 1, protocol, threads: 2 },
      outputs: { mzid: "search.mzid" }
    });
    const labelled = renderCommand(msgfSearchTask.command, bindings(4), "task:msgf_search");
    const unlabelled = renderCommand(msgfSearchTask.command, bindings(null), "task:msgf_search");
    expect(labelled.slice(labelled.indexOf("-e"), labelled.indexOf("-tda"))).toEqual(["-e", "1", "-protocol", "4"]);
    expect(unlabelled.slice(unlabelled.indexOf("-e"), unlabelled.indexOf("-tda"))).toEqual(["-e", "1"]);
  });
});

describe("task specs", () => {
  it.each<[Partial<TaskSpec>, string]>([
    [{ name: "Sort-Table" }, "task: invalid name: Sort-Table"],
    [{ version: "1.0" }, "task:sort_table: invalid version: 1.0"],
    [{ tolerateFailure: true, bestEffort: true }, "task:sort_table: tolerateFailure and bestEffort are exclusive"],
    [{ inputs: ["table", "table"] }, "task:sort_table: duplicate input: table"],
    [
      { outputs: [{ name: "sorted", path: "../sorted.tsv" }] },
      "task:sort_table: output sorted must be a safe relative path: ../sorted.tsv"
    ],
    [
      { outputs: [{ name: "sorted", path: "*/x_*.tsv" }] },
      'task:sort_table: output sorted may use one "*" in its file name only: */x_*.tsv'
    ],
    [
      { outputs: [{ name: "sorted", path: "x_*_*.tsv" }] },
      'task:sort_table: output sorted may use one "*" in its file name only: x_*_*.tsv'
    ],
    [{ command: ["sort", "{{in.other}}", "{{out.sorted}}"] }, "task:sort_table: command references undeclared input other"],
    [{ command: [] }, "task:sort_table: command must not be empty"]
  ])("rejects %j", (overrides, message) => {
    expect(() => validateTaskSpec(spec(overrides))).toThrow(new ConfigurationError(message));
  });

  it("accepts a single glob in the file name", () => {
    expect(() => validateTaskSpec(spec({ outputs: [{ name: "sorted", path: "plates/*_psms.txt" }] }))).not.toThrow();
  });

  it("keeps task names unique in a registry", () => {
    const registry = new TaskRegistry([spec()]);
    expect(() => registry.register(spec())).toThrow(new ConfigurationError("task: duplicate name: sort_table"));
    expect(() => registry.get("unknown")).toThrow(new ConfigurationError("task: unknown task unknown"));
    expect(registry.has("sort_table")).toBe(true);
  });

  it("validates every built-in task", () => {
    const registry = createBuiltinRegistry();
    expect(registry.list().map((t) => t.name)).toEqual(builtinTaskDefinitions.map((t) => t.name));
    expect(registry.has("percolator")).toBe(true);
    expect(registry.has("picked_fdr")).toBe(true);
  });

  it("validates params with the task's schema", () => {
    const ok = createPsmTableTask.params.safeParse({
      setName: "setA",
      td: "target",
      psmconflvl: 0.01,
      pepconflvl: 0.01,
      isobaric: null,
      denoms: null,
      medianSweep: false,
      fractions: false
    });
    expect(ok.success).toBe(true);
    expect(createPsmTableTask.params.safeParse({ setName: "set A", td: "both" }).success).toBe(false);
  });

  it("returns the definition it is given", () => {
    const def = defineTask({ ...spec(), params: z.object({ column: z.string() }) });
    expect(def.name).toBe("sort_table");
    expect(def.params.safeParse({ column: "Peptide" }).success).toBe(true);
  });
});
