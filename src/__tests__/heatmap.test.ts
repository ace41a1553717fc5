import fs from "fs";
import os from "os";
import path from "path";
import { afterAll, describe, expect, it } from "vitest";
import { axisAnnot } from "../axis_annot.js";
import { heatmapColorbar } from "../colorbar.js";
import { FigureBuilder } from "../figure_builder.js";
import { heatmap, pivotLong } from "../heatmap.js";
import { memoryLogger } from "../log.js";

const dir = fs.mkdtempSync(path.join(os.tmpdir(), "gigmap-heatmap-"));
afterAll(() => fs.rmSync(dir, { recursive: true, force: true }));

function file(name: string, body: string): string {
  const p = path.join(dir, name);
  fs.writeFileSync(p, body);
  return p;
}

const alignments = file(
  "alignments.csv",
  ["sseqid,genome,pident", "gA,g1,100", "gA,g2,100", "gB,g1,10", "gB,g2,20", "gC,g1,95", "gC,g3,90", ""].join("\n"),
);
const genomes = file("genomes.csv", "genome_id\ng1\ng2\ng3\n");
const genomeOrder = file("genome_order.txt", "g2\ng1\ng3\n");

function build() {
  const log = memoryLogger();
  const heat = heatmap({
    id: "heat",
    xAxis: "gene",
    xCol: "sseqid",
    yAxis: "genome",
    yCol: "genome",
    valCol: "pident",
    fillValue: 0,
    xIndex: 1,
    yIndex: 0,
  });
  const fb = new FigureBuilder({
    logger: log,
    elements: [
      axisAnnot({ id: "genomeAnnot", axisLabel: "genome", orient: "v", xIndex: 2, yIndex: 0 }),
      heat,
      heatmapColorbar({ id: "cb", heatmap: heat, xIndex: 2, yIndex: -1, label: "Percent Identity" }),
    ],
  });
  return { fb, heat, log };
}

describe("pivotLong", () => {
  it("spreads long rows into a sorted wide table", () => {
    const m = pivotLong(
      [
        { x: "b", y: "r2", v: "1" },
        { x: "a", y: "r1", v: "2" },
      ],
      { x: "x", y: "y", val: "v" },
      0,
      "test.csv",
    );
    expect(m).toEqual({
      rows: ["r1", "r2"],
      columns: ["a", "b"],
      values: [
        [2, 0],
        [0, 1],
      ],
    });
  });

  it("rejects repeated pairs", () => {
    expect(() =>
      pivotLong(
        [
          { x: "a", y: "r1", v: "1" },
          { x: "a", y: "r1", v: "2" },
        ],
        { x: "x", y: "y", val: "v" },
        0,
        "test.csv",
      ),
    ).toThrow("test.csv contains more than one value for 'a' / 'r1'");
  });
});

describe("heatmap", () => {
  it("orders the free axis by clustering and keeps a fixed one", () => {
    const { fb, heat, log } = build();
    fb.setParams({ "genomeAnnot-csv": genomes, "genomeAnnot-order": genomeOrder, "heat-csv": alignments });
    fb.readData();

    expect(fb.axis("genome").order()).toEqual(["g2", "g1", "g3"]);
    expect(fb.axis("gene").order()).toEqual(["gC", "gB", "gA"]);
    expect(heat.scale()).toEqual({ minVal: 10, maxVal: 100, zmin: -80, colorscale: "blues" });
    expect(log.lines).toContain("INFO The genome axis is already fixed; heat keeps that order");

    fb.makePlots();
    const panel = fb.subplots.panel("heat");
    const [trace] = panel.traces;
    if (trace?.type !== "heatmap") throw new Error("expected a heatmap trace");
    expect(trace.z).toEqual([
      [0, 20, 100],
      [95, 10, 100],
      [90, 0, 0],
    ]);
    expect(trace.zmin).toBe(-80);
    expect(trace.zmax).toBe(100);
    expect(trace.hovertext?.[0]?.[0]).toBe("gC / g2: 0");
    expect(panel.xaxis.ticktext).toEqual(["gC", "gB", "gA"]);
    expect(panel.yaxis.ticktext).toEqual(["g2", "g1", "g3"]);
    expect(fb.subplots.yAnchor(0)).toBe("right");
  });

  it("orders both axes when neither is fixed", () => {
    const { fb } = build();
    fb.setParams({ "heat-csv": alignments });
    fb.readData();
    expect(fb.axis("gene").order()).toEqual(["gC", "gB", "gA"]);
    expect(fb.axis("genome").order()).toEqual(["g3", "g1", "g2"]);
    expect(fb.axis("genome").isFixed).toBe(false);
  });

  it("rejects an unknown colorscale", () => {
    const { fb } = build();
    fb.setParams({ "heat-csv": alignments, "heat-colorscale": "rainbow" });
    expect(() => fb.readData()).toThrow("Unknown colorscale 'rainbow' for --heat-colorscale");
  });

  it("requires its columns", () => {
    const { fb } = build();
    fb.setParams({ "heat-csv": alignments, "heat-val_col": "bitscore" });
    expect(() => fb.readData()).toThrow(`Column 'bitscore' not found in header for ${alignments}`);
  });
});

describe("heatmapColorbar", () => {
  it("labels five evenly spaced values of the heatmap range", () => {
    const { fb } = build();
    fb.setParams({ "heat-csv": alignments, "heat-colorscale": "reds" });
    fb.readData();
    fb.makePlots();
    const panel = fb.subplots.panel("cb");
    expect(panel.options).toEqual({ height: 0.05, width: 0.25, padding: 0.05 });
    expect(panel.yaxis.ticktext).toEqual(["Percent Identity"]);
    expect(panel.xaxis.tickvals).toEqual([0, 25, 50, 74, 99]);
    expect(panel.xaxis.ticktext).toEqual(["10", "32.7", "55.5", "77.3", "100"]);
    const [trace] = panel.traces;
    if (trace?.type !== "heatmap") throw new Error("expected a heatmap trace");
    expect(trace.zmin).toBe(10);
    expect(trace.colorscale).toBe("reds");
    expect(trace.z[0]).toHaveLength(100);
  });
});
