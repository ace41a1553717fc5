import { colorscaleNames, isColorscale } from "./colors.js";
import {
  disabled,
  figureArgument,
  paramNumber,
  paramString,
  ready,
  type FigureBuilder,
  type FigureElement,
} from "./figure_builder.js";
import { isDistanceMetric, isLinkageMethod, orderByLinkage, type LinkageOptions } from "./order_by_linkage.js";
import { die, numericCell, readCsv, requireColumn, transposeMatrix, type NumericMatrix } from "./util.js";

export type HeatmapOptions = {
  id: string;
  /** Name of the horizontal axis, and the CSV column holding it by default. */
  xAxis: string;
  xCol: string;
  yAxis: string;
  yCol: string;
  valCol: string;
  /** Value used for axis pairs absent from the CSV. */
  fillValue: number;
  xIndex: number;
  yIndex: number;
};

/** What a colorbar needs to know about the heatmap it annotates. */
export type HeatmapScale = {
  minVal: number;
  maxVal: number;
  zmin: number;
  colorscale: string;
};

export type HeatmapElement = FigureElement & {
  readonly xAxis: string;
  readonly yAxis: string;
  /** Defined once the heatmap has been read and is enabled. */
  scale(): HeatmapScale | undefined;
};

/** Wide table (rows on the y axis, columns on the x axis) built from a long CSV. */
export function pivotLong(
  rows: Record<string, string>[],
  cols: { x: string; y: string; val: string },
  fillValue: number,
  source: string,
): NumericMatrix {
  const cells = new Map<string, Map<string, number>>();
  const xs = new Set<string>();
  for (const r of rows) {
    const x = r[cols.x] ?? "";
    const y = r[cols.y] ?? "";
    const v = numericCell(r, cols.val, source);
    const row = cells.get(y) ?? new Map<string, number>();
    if (row.has(x)) die(`${source} contains more than one value for '${x}' / '${y}'`);
    row.set(x, v);
    cells.set(y, row);
    xs.add(x);
  }
  const rowIds = Array.from(cells.keys()).sort();
  const colIds = Array.from(xs).sort();
  return {
    rows: rowIds,
    columns: colIds,
    values: rowIds.map((y) => colIds.map((x) => cells.get(y)?.get(x) ?? fillValue)),
  };
}

function subsetMatrix(m: NumericMatrix, keepRows: Set<string> | undefined, keepCols: Set<string> | undefined): NumericMatrix {
  const ri = m.rows.map((_, i) => i).filter((i) => !keepRows || keepRows.has(m.rows[i]));
  const ci = m.columns.map((_, j) => j).filter((j) => !keepCols || keepCols.has(m.columns[j]));
  return {
    rows: ri.map((i) => m.rows[i]),
    columns: ci.map((j) => m.columns[j]),
    values: ri.map((i) => ci.map((j) => m.values[i][j])),
  };
}

function suggestOrder(fb: FigureBuilder, axisName: string, matrix: NumericMatrix, linkage: LinkageOptions, id: string): void {
  // an earlier element may have fixed the axis since this one started reading
  if (fb.axis(axisName).isFixed) {
    fb.log(`The ${axisName} axis is already fixed; ${id} keeps that order`);
    return;
  }
  if (matrix.rows.length < 2) {
    die(`${id}: fewer than two ${axisName}s remain to be ordered (found ${matrix.rows.length})`);
  }
  fb.axis(axisName).setOrder(orderByLinkage(matrix, linkage));
}

export function heatmap(opts: HeatmapOptions): HeatmapElement {
  const { id, xAxis, yAxis } = opts;
  let wide: NumericMatrix | undefined;
  let scale: HeatmapScale | undefined;

  return {
    id,
    xAxis,
    yAxis,
    args: [
      figureArgument({ key: "csv", description: `File containing ${xAxis}-${yAxis} data` }),
      figureArgument({ key: `${xAxis}_col`, default: opts.xCol, description: `Column in CSV containing ${xAxis} data` }),
      figureArgument({ key: `${yAxis}_col`, default: opts.yCol, description: `Column in CSV containing ${yAxis} data` }),
      figureArgument({ key: "val_col", default: opts.valCol, description: "Column in CSV used to populate values" }),
      figureArgument({
        key: "colorscale",
        default: "blues",
        description: `Color scale used for values in heatmap (${colorscaleNames().join(", ")})`,
      }),
      figureArgument({ key: "method", default: "ward", description: "Linkage method used to order rows and columns" }),
      figureArgument({ key: "metric", default: "euclidean", description: "Distance metric used to order rows and columns" }),
      figureArgument({ key: "fill_value", type: "number", default: opts.fillValue, description: "Value used where no data is present" }),
    ],

    scale: () => scale,

    read(fb, params) {
      const csv = paramString(params, "csv");
      if (!csv) return disabled(`User did not provide --${id}-csv, omitting display`);

      const xCol = paramString(params, `${xAxis}_col`) ?? opts.xCol;
      const yCol = paramString(params, `${yAxis}_col`) ?? opts.yCol;
      const valCol = paramString(params, "val_col") ?? opts.valCol;
      const colorscale = paramString(params, "colorscale") ?? "blues";
      const method = paramString(params, "method") ?? "ward";
      const metric = paramString(params, "metric") ?? "euclidean";
      if (!isColorscale(colorscale)) die(`Unknown colorscale '${colorscale}' for --${id}-colorscale`);
      if (!isLinkageMethod(method)) die(`Unknown linkage method '${method}' for --${id}-method`);
      if (!isDistanceMetric(metric)) die(`Unknown distance metric '${metric}' for --${id}-metric`);

      fb.log(`Reading in ${csv}`);
      const table = readCsv(csv);
      for (const c of [xCol, yCol, valCol]) requireColumn(table, c, csv);
      if (table.rows.length === 0) die(`${csv} contains no rows`);

      const vals = table.rows.map((r) => numericCell(r, valCol, csv));
      const minVal = Math.min(...vals);
      const maxVal = Math.max(...vals);
      fb.log(`Minimum value: ${minVal}`);
      fb.log(`Maximum value: ${maxVal}`);

      fb.log("Pivoting to wide format");
      let m = pivotLong(table.rows, { x: xCol, y: yCol, val: valCol }, paramNumber(params, "fill_value") ?? opts.fillValue, csv);
      const xa = fb.axis(xAxis);
      const ya = fb.axis(yAxis);
      m = subsetMatrix(m, ya.exists ? ya.memberSet() : undefined, xa.exists ? xa.memberSet() : undefined);
      fb.log(`Heatmap has ${m.rows.length} ${yAxis}s and ${m.columns.length} ${xAxis}s`);

      const linkage: LinkageOptions = { method, metric, logger: fb.logger };
      suggestOrder(fb, xAxis, transposeMatrix(m), linkage, id);
      suggestOrder(fb, yAxis, m, linkage, id);

      wide = m;
      // blues starts below the data so the lowest value sits mid-scale
      const zmin = colorscale === "blues" ? minVal - (maxVal - minVal) : minVal;
      scale = { minVal, maxVal, zmin, colorscale };
      return ready;
    },

    plot(fb) {
      const data = wide ?? die(`${id} has no data to plot`);
      const s = scale ?? die(`${id} has no color scale`);
      const xa = fb.axis(xAxis);
      const ya = fb.axis(yAxis);
      const xs = xa.order();
      const ys = ya.order();
      const rowIx = new Map(data.rows.map((r, i) => [r, i]));
      const colIx = new Map(data.columns.map((c, j) => [c, j]));
      const cell = (y: string, x: string): number | null => {
        const i = rowIx.get(y);
        const j = colIx.get(x);
        return i === undefined || j === undefined ? null : data.values[i][j];
      };

      fb.log(`Adding subplot for ${id} (x=${opts.xIndex}, y=${opts.yIndex})`);
      fb.subplots.add(id, opts.xIndex, opts.yIndex, { shareX: true, shareY: true });

      fb.log(`Plotting heatmap for ${id}`);
      fb.subplots.plot(id, {
        type: "heatmap",
        z: ys.map((y) => xs.map((x) => cell(y, x))),
        zmin: s.zmin,
        zmax: s.maxVal,
        colorscale: s.colorscale,
        hovertext: ys.map((y) => xs.map((x) => `${xa.label(x)} / ${ya.label(y)}: ${cell(y, x) ?? "n/a"}`)),
      });

      fb.log(`Formatting axes for ${id}`);
      fb.subplots.formatAxis(id, "y", { tickvals: ys.map((_, i) => i), ticktext: ya.labels(), showticklabels: true });
      fb.subplots.formatAxis(id, "x", { tickvals: xs.map((_, j) => j), ticktext: xa.labels(), showticklabels: true });
      fb.subplots.anchorXaxis(opts.xIndex, "bottom");
      fb.subplots.anchorYaxis(opts.yIndex, "right");
    },
  };
}
