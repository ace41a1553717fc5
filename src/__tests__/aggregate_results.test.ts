import { describe, expect, it } from "vitest";
import {
  aggregateResults,
  chunkFrame,
  indexHits,
  reindexDistances,
  summarizeAlignments,
  tableToFrame,
} from "../aggregate_results.js";
import type { KeyValueStore } from "../kv_store.js";
import { memoryLogger } from "../log.js";
import { parseCsv, type NumericMatrix } from "../util.js";

class MemoryStore implements KeyValueStore {
  readonly values = new Map<string, unknown>();
  closed = false;

  async set(key: string, value: unknown): Promise<void> {
    this.values.set(key, value);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

const alignments = parseCsv(
  [
    "qseqid,sseqid,genome,pident,qstart,qend,sstart,send,slen",
    "contig1,geneB,gX,98.5,1001,1500,1,500,1000",
    "contig2,geneB,gX,99,2001,2250,1,250,1000",
    "contig3,geneA,gY,100,1,1000,1,1000,1000",
    "contig4,geneA,gX,90,5,100,1,100,400",
  ].join("\n"),
  "alignments.csv",
);

const dists: NumericMatrix = {
  rows: ["gY", "gZ"],
  columns: ["gY", "gZ"],
  values: [
    [0, 0.1],
    [0.1, 0],
  ],
};

const tsne = parseCsv("gene,x,y\ngeneA,0.5,1\ngeneB,-2,3\n", "tsne.csv");

describe("summarizeAlignments", () => {
  it("condenses alignments per gene and genome", () => {
    expect(summarizeAlignments(alignments, "alignments.csv")).toEqual([
      {
        sseqid: "geneA",
        genome: "gX",
        pident: 90,
        coverage: 25,
        description: "contig4: 5 - 100; 90% identity / 25% coverage",
      },
      {
        sseqid: "geneA",
        genome: "gY",
        pident: 100,
        coverage: 100,
        description: "contig3: 1 - 1,000; 100% identity / 100% coverage",
      },
      {
        sseqid: "geneB",
        genome: "gX",
        pident: 99,
        coverage: 50,
        description:
          "contig1: 1,001 - 1,500; 98.5% identity / 50% coverage\ncontig2: 2,001 - 2,250; 99% identity / 25% coverage",
      },
    ]);
  });

  it("sorts gene and genome ids by code point", () => {
    const t = parseCsv(
      [
        "qseqid,sseqid,genome,pident,qstart,qend,sstart,send,slen",
        "c1,geneA,b,90,1,10,1,10,10",
        "c2,geneA,C,90,1,10,1,10,10",
        "c3,gene_a,b,90,1,10,1,10,10",
      ].join("\n"),
    );
    expect(summarizeAlignments(t).map((h) => `${h.sseqid}/${h.genome}`)).toEqual(["geneA/C", "geneA/b", "gene_a/b"]);
  });

  it("requires the alignment columns", () => {
    const t = parseCsv("sseqid,genome\ngeneA,gX\n", "short.csv");
    expect(() => summarizeAlignments(t, "short.csv")).toThrow("Column 'qseqid' not found in header for short.csv");
  });
});

describe("indexHits", () => {
  it("fails on genes missing from the gene order", () => {
    const hits = summarizeAlignments(alignments);
    expect(() => indexHits(hits, ["geneA"], ["gX", "gY"])).toThrow("Gene 'geneB' is missing from the gene order");
  });
});

describe("reindexDistances", () => {
  it("fills missing genomes with null", () => {
    expect(reindexDistances(dists, ["gX", "gY"])).toEqual({
      index: ["gX", "gY"],
      columns: ["gX", "gY"],
      data: [
        [null, null],
        [null, 0],
      ],
    });
  });
});

describe("chunkFrame", () => {
  it("splits rows into chunks of the requested size", () => {
    const frame = { index: ["a", "b", "c"], columns: ["v"], data: [[1], [2], [3]] };
    expect(chunkFrame(frame, 2)).toEqual([
      { index: ["a", "b"], columns: ["v"], data: [[1], [2]] },
      { index: ["c"], columns: ["v"], data: [[3]] },
    ]);
    expect(() => chunkFrame(frame, 0)).toThrow("Chunk size must be a positive integer, got 0");
  });
});

describe("tableToFrame", () => {
  it("uses the first column as the index", () => {
    expect(tableToFrame(tsne, "tsne.csv")).toEqual({
      index: ["geneA", "geneB"],
      columns: ["x", "y"],
      data: [
        [0.5, 1],
        [-2, 3],
      ],
    });
  });
});

describe("aggregateResults", () => {
  it("writes every table under its key", async () => {
    const store = new MemoryStore();
    const log = memoryLogger();
    const keys = await aggregateResults(
      { alignments, geneOrder: ["geneB", "geneA"], dists, tsne, source: "alignments.csv" },
      store,
      { distsNRows: 1, logger: log },
    );

    expect(keys).toEqual(["distances_0", "distances_1"]);
    expect(Array.from(store.values.keys())).toEqual([
      "alignments",
      "gene_ix",
      "genome_ix",
      "distances_0",
      "distances_1",
      "distances_keys",
      "tsne",
    ]);
    expect(store.values.get("genome_ix")).toEqual(["gX", "gY"]);
    expect(store.values.get("gene_ix")).toEqual(["geneB", "geneA"]);
    expect(store.values.get("alignments")).toEqual([
      { pident: 90, coverage: 25, description: "contig4: 5 - 100; 90% identity / 25% coverage", gene_ix: 1, genome_ix: 0 },
      { pident: 100, coverage: 100, description: "contig3: 1 - 1,000; 100% identity / 100% coverage", gene_ix: 1, genome_ix: 1 },
      {
        pident: 99,
        coverage: 50,
        description:
          "contig1: 1,001 - 1,500; 98.5% identity / 50% coverage\ncontig2: 2,001 - 2,250; 99% identity / 25% coverage",
        gene_ix: 0,
        genome_ix: 0,
      },
    ]);
    expect(store.values.get("distances_1")).toEqual({ index: ["gY"], columns: ["gX", "gY"], data: [[null, 0]] });
    expect(store.values.get("distances_keys")).toEqual(["distances_0", "distances_1"]);
    expect(log.lines).toContain("INFO Read in a list of 2 genomes");
    expect(log.lines).toContain("INFO Wrote 2 chunks of distances");
    expect(store.closed).toBe(false);
  });
});
