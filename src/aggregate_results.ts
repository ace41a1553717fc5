#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { pathToFileURL } from "url";
import { RedisStore, type KeyValueStore } from "./kv_store.js";
import { createLogger, type Logger } from "./log.js";
import { die, numericCell, readCsv, readLines, readSquareMatrix, requireColumn, type NumericMatrix, type Table } from "./util.js";

/** One gene/genome pair after all of its alignments have been condensed. */
export type GeneGenomeHit = {
  sseqid: string;
  genome: string;
  pident: number;
  coverage: number;
  description: string;
};

export type IndexedHit = Omit<GeneGenomeHit, "sseqid" | "genome"> & {
  gene_ix: number;
  genome_ix: number;
};

/** Row-oriented frame as written to the store. */
export type Frame<T> = {
  index: string[];
  columns: string[];
  data: T[][];
};

export type AggregateInputs = {
  alignments: Table;
  geneOrder: string[];
  dists: NumericMatrix;
  tsne: Table;
  source?: string;
};

const ALIGNMENT_COLS = ["qseqid", "sseqid", "genome", "pident", "qstart", "qend", "sstart", "send", "slen"];

function byCodePoint(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function round(v: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(v * f) / f;
}

export function summarizeAlignments(table: Table, source = "alignments"): GeneGenomeHit[] {
  for (const c of ALIGNMENT_COLS) requireColumn(table, c, source);
  const groups = new Map<string, Array<{ row: Record<string, string>; coverage: number; pident: number }>>();
  for (const row of table.rows) {
    const sstart = numericCell(row, "sstart", source);
    const send = numericCell(row, "send", source);
    const slen = numericCell(row, "slen", source);
    if (slen <= 0) die(`Non-positive slen for '${row.sseqid}' in ${source}`);
    const entry = { row, coverage: (100 * (send - sstart + 1)) / slen, pident: numericCell(row, "pident", source) };
    const key = JSON.stringify([row.sseqid ?? "", row.genome ?? ""]);
    const list = groups.get(key) ?? [];
    list.push(entry);
    groups.set(key, list);
  }
  const hits: GeneGenomeHit[] = [];
  for (const list of groups.values()) {
    const first = list[0].row;
    hits.push({
      sseqid: first.sseqid ?? "",
      genome: first.genome ?? "",
      pident: Math.max(...list.map((e) => e.pident)),
      coverage: round(Math.max(...list.map((e) => e.coverage)), 4),
      description: list
        .map((e) => {
          const qstart = numericCell(e.row, "qstart", source).toLocaleString("en-US");
          const qend = numericCell(e.row, "qend", source).toLocaleString("en-US");
          return `${e.row.qseqid ?? ""}: ${qstart} - ${qend}; ${e.pident}% identity / ${round(e.coverage, 4)}% coverage`;
        })
        .join("\n"),
    });
  }
  return hits.sort((a, b) => byCodePoint(a.sseqid, b.sseqid) || byCodePoint(a.genome, b.genome));
}

export function uniqueInOrder(values: string[]): string[] {
  return Array.from(new Set(values));
}

export function indexHits(hits: GeneGenomeHit[], genes: string[], genomes: string[]): IndexedHit[] {
  const geneIx = new Map(genes.map((g, i) => [g, i]));
  const genomeIx = new Map(genomes.map((g, i) => [g, i]));
  return hits.map(({ sseqid, genome, ...rest }) => ({
    ...rest,
    gene_ix: geneIx.get(sseqid) ?? die(`Gene '${sseqid}' is missing from the gene order`),
    genome_ix: genomeIx.get(genome) ?? die(`Genome '${genome}' is missing from the genome list`),
  }));
}

/** Distances for `genomes` x `genomes`; pairs absent from `m` are null. */
export function reindexDistances(m: NumericMatrix, genomes: string[]): Frame<number | null> {
  const rowIx = new Map(m.rows.map((r, i) => [r, i]));
  const colIx = new Map(m.columns.map((c, j) => [c, j]));
  return {
    index: genomes,
    columns: genomes,
    data: genomes.map((a) =>
      genomes.map((b) => {
        const i = rowIx.get(a);
        const j = colIx.get(b);
        return i === undefined || j === undefined ? null : m.values[i][j];
      }),
    ),
  };
}

/** Splits a frame into consecutive row chunks of at most `size` rows. */
export function chunkFrame<T>(frame: Frame<T>, size: number): Array<Frame<T>> {
  if (!Number.isInteger(size) || size < 1) die(`Chunk size must be a positive integer, got ${size}`);
  const out: Array<Frame<T>> = [];
  for (let start = 0; start < frame.index.length; start += size) {
    out.push({
      index: frame.index.slice(start, start + size),
      columns: frame.columns,
      data: frame.data.slice(start, start + size),
    });
  }
  return out;
}

export function tableToFrame(table: Table, source: string): Frame<number> {
  const [indexCol, ...columns] = table.columns;
  if (indexCol === undefined) die(`No columns found in ${source}`);
  return {
    index: table.rows.map((r) => r[indexCol] ?? ""),
    columns,
    data: table.rows.map((r) => columns.map((c) => numericCell(r, c, source))),
  };
}

export async function aggregateResults(
  inputs: AggregateInputs,
  store: KeyValueStore,
  opts: { distsNRows?: number; logger?: Logger } = {},
): Promise<string[]> {
  const log = opts.logger;
  const hits = summarizeAlignments(inputs.alignments, inputs.source);
  const genomes = uniqueInOrder(hits.map((h) => h.genome));
  log?.info(`Read in a list of ${genomes.length.toLocaleString("en-US")} genomes`);
  log?.info(`Read in a list of ${inputs.geneOrder.length.toLocaleString("en-US")} genes`);
  const alignments = indexHits(hits, inputs.geneOrder, genomes);
  const dists = reindexDistances(inputs.dists, genomes);
  const tsne = tableToFrame(inputs.tsne, "t-SNE coordinates");

  log?.info("Saving alignments");
  await store.set("alignments", alignments);
  log?.info("Saving gene_ix");
  await store.set("gene_ix", inputs.geneOrder);
  log?.info("Saving genome_ix");
  await store.set("genome_ix", genomes);

  log?.info("Saving distances");
  const keys: string[] = [];
  for (const chunk of chunkFrame(dists, opts.distsNRows ?? 1000)) {
    const key = `distances_${keys.length}`;
    await store.set(key, chunk);
    keys.push(key);
    log?.info(`Wrote ${keys.length.toLocaleString("en-US")} chunks of distances`);
  }
  await store.set("distances_keys", keys);

  log?.info("Saving tsne");
  await store.set("tsne", tsne);
  log?.info("Done writing aggregated results");
  return keys;
}

async function main(): Promise<void> {
  const argv = yargs(hideBin(process.argv))
    .usage("Aggregate all results of the gig-map processing for rapid visualization")
    .option("alignments", { type: "string", demandOption: true, describe: "Alignments of genes across genomes in CSV format" })
    .option("gene-order", { type: "string", demandOption: true, describe: "Ordering of genes by presence across genomes" })
    .option("dists", { type: "string", demandOption: true, describe: "Pairwise ANI values for all genomes" })
    .option("tsne-coords", { type: "string", demandOption: true, describe: "t-SNE coordinates for all genes in two dimensions" })
    .option("host", { type: "string", default: "localhost", describe: "Redis host used for writing output" })
    .option("port", { type: "number", default: 6379, describe: "Redis port used for writing output" })
    .option("dists-n-rows", { type: "number", default: 1000, describe: "Number of rows to use for each chunk of distances" })
    .strict()
    .parseSync();

  const logger = createLogger("aggregate_results");
  logger.info(`Reading from ${argv.alignments}`);
  const alignments = readCsv(argv.alignments);
  logger.info(`Reading from ${argv["tsne-coords"]}`);
  const tsne = readCsv(argv["tsne-coords"]);
  logger.info(`Reading from ${argv.dists}`);
  const dists = readSquareMatrix(argv.dists);
  logger.info(`Read in ${dists.rows.length.toLocaleString("en-US")} rows and ${dists.columns.length.toLocaleString("en-US")} columns`);
  const geneOrder = readLines(argv["gene-order"]);

  const store = new RedisStore(argv.host, argv.port, logger);
  try {
    await aggregateResults(
      { alignments, geneOrder, dists, tsne, source: argv.alignments },
      store,
      { distsNRows: argv["dists-n-rows"], logger },
    );
  } finally {
    await store.close();
  }
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain) {
  main().catch((e) => {
    console.error(e instanceof Error ? e.message : String(e));
    process.exit(1);
  });
}
