import fs from "fs";
import os from "os";
import path from "path";
import { afterAll, describe, expect, it } from "vitest";
import { axisAnnot } from "../axis_annot.js";
import { FigureBuilder, ready, type FigureElement } from "../figure_builder.js";
import { genomeTree } from "../genome_tree.js";
import { memoryLogger } from "../log.js";

const dir = fs.mkdtempSync(path.join(os.tmpdir(), "gigmap-tree-"));
afterAll(() => fs.rmSync(dir, { recursive: true, force: true }));

function file(name: string, body: string): string {
  const p = path.join(dir, name);
  fs.writeFileSync(p, body);
  return p;
}

const genomes = file("genomes.csv", "genome_id,name\ng1,One\ng2,Two\ng3,Three\ng4,Four\ng5,Five\n");
const distmat = file(
  "distmat.csv",
  ["genome,g1,g2,g3,g4,g6", "g1,0,2,6,6,9", "g2,2,0,6,6,9", "g3,6,6,0,2,9", "g4,6,6,2,0,9", "g6,9,9,9,9,0", ""].join("\n"),
);

describe("genomeTree", () => {
  it("fixes the genome axis to the leaves shared with the annotations", () => {
    const attempts: boolean[] = [];
    const late: FigureElement = {
      id: "late",
      args: [],
      read(fb) {
        attempts.push(fb.axis("genome").setOrder(["g5", "g4", "g3", "g2", "g1"]));
        return ready;
      },
      plot() {},
    };
    const fb = new FigureBuilder({
      logger: memoryLogger(),
      elements: [
        axisAnnot({ id: "genomeAnnot", axisLabel: "genome", orient: "v", xIndex: 2, yIndex: 0 }),
        genomeTree({ xIndex: 0, yIndex: 0 }),
        late,
      ],
    });
    fb.setParams({ "genomeAnnot-csv": genomes, "genomeAnnot-label-col": "name", "genomeTree-distmat": distmat });
    fb.readData();

    const ax = fb.axis("genome");
    expect(ax.order()).toEqual(["g1", "g2", "g3", "g4"]);
    expect(ax.isFixed).toBe(true);
    expect(attempts).toEqual([false]);

    fb.makePlots();
    const panel = fb.subplots.panel("genomeTree");
    expect(panel.options).toEqual({ shareY: true });
    expect(panel.traces.map((t) => (t.type === "lines" ? t.name : t.type))).toEqual(["Neighbor Joining Tree", undefined]);
    expect(panel.yaxis.ticktext).toEqual(["One", "Two", "Three", "Four"]);
    expect(panel.xaxis.showticklabels).toBe(false);
    const range = panel.xaxis.range ?? [0, 0];
    expect(range[0]).toBeCloseTo(-0.075);
    expect(range[1]).toBeCloseTo(3.075);
    expect(fb.subplots.yAnchor(0)).toBe("right");
  });

  it("keeps an order fixed by an earlier element and logs the rejected one", () => {
    const order = file("order.txt", "g4\ng3\ng2\ng1\n");
    const log = memoryLogger();
    const fb = new FigureBuilder({
      logger: log,
      elements: [
        axisAnnot({ id: "genomeAnnot", axisLabel: "genome", orient: "v", xIndex: 2, yIndex: 0 }),
        genomeTree(),
      ],
    });
    fb.setParams({ "genomeAnnot-csv": genomes, "genomeAnnot-order": order, "genomeTree-distmat": distmat });
    fb.readData();

    const ax = fb.axis("genome");
    expect(ax.order()).toEqual(["g4", "g3", "g2", "g1"]);
    expect(fb.status("genomeTree")).toBe("ready");
    expect(log.lines).toContain("WARNING Axis 'genome' is fixed; ignoring a new order of 4 member(s)");

    fb.makePlots();
    expect(fb.subplots.panel("genomeTree").yaxis.ticktext).toEqual(["g4", "g3", "g2", "g1"]);
  });

  it("is disabled without a distance matrix", () => {
    const fb = new FigureBuilder({ logger: memoryLogger(), elements: [genomeTree()] });
    fb.setParams({});
    fb.readData();
    expect(fb.readResult("genomeTree")).toEqual({
      status: "disabled",
      reason: "no --genomeTree-distmat provided, skipping genome tree",
    });
    expect(fb.axis("genome").exists).toBe(false);
  });
});
