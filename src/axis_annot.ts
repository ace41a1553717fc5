import { categoryPalette } from "./colors.js";
import {
  disabled,
  figureArgument,
  paramNumber,
  paramString,
  ready,
  type FigureElement,
} from "./figure_builder.js";
import { die, readCsv, readLines, requireColumn } from "./util.js";

export type AxisAnnotOptions = {
  id: string;
  /** Axis being annotated, e.g. `gene` or `genome`. */
  axisLabel: string;
  /** `v` draws the strip along the y axis, `h` along the x axis. */
  orient: "h" | "v";
  xIndex: number;
  yIndex: number;
  maxLabelLen?: number;
};

export function truncateLabel(label: string, maxLen: number): string {
  return label.slice(0, Math.max(0, Math.floor(maxLen)));
}

/**
 * Annotation table for one axis: supplies labels, optionally an explicit
 * (fixed) order, and optionally a categorical strip coloured by one column.
 */
export function axisAnnot(opts: AxisAnnotOptions): FigureElement {
  const { id, axisLabel, orient } = opts;
  let colorCol: string | undefined;
  const colorOf = new Map<string, string>();

  return {
    id,
    args: [
      figureArgument({ key: "csv", description: `File containing ${axisLabel} annotations (CSV)` }),
      figureArgument({
        key: "index-col",
        description: `Column from the CSV identifying each ${axisLabel}`,
        default: `${axisLabel}_id`,
      }),
      figureArgument({ key: "label-col", description: "Column from the CSV used for labeling" }),
      figureArgument({
        key: "max-label-len",
        description: `Maximum number of characters allowed for ${axisLabel} labels`,
        type: "number",
        default: opts.maxLabelLen ?? 60,
      }),
      figureArgument({
        key: "order",
        description: `Text file containing ordered list of ${axisLabel} names (no header)`,
      }),
      figureArgument({ key: "color-col", description: `Column from the CSV used to color a ${axisLabel} annotation strip` }),
    ],

    read(fb, params) {
      const csv = paramString(params, "csv");
      const labelCol = paramString(params, "label-col");
      const orderPath = paramString(params, "order");
      colorCol = paramString(params, "color-col");
      if (!csv) {
        for (const key of ["label-col", "order", "color-col"]) {
          const v = paramString(params, key);
          if (v) fb.warn(`--${id}-${key} was set to '${v}', but no --${id}-csv was provided`);
        }
        return disabled(`no --${id}-csv provided`);
      }

      fb.log(`Reading ${csv}`);
      const table = readCsv(csv);
      const indexCol = paramString(params, "index-col") ?? `${axisLabel}_id`;
      requireColumn(table, indexCol, csv);
      if (labelCol) requireColumn(table, labelCol, csv);
      if (colorCol) requireColumn(table, colorCol, csv);
      const maxLen = paramNumber(params, "max-label-len") ?? 60;

      let rows = table.rows;
      let order: string[] | undefined;
      if (orderPath) {
        fb.log(`Reading in ${orderPath}`);
        order = readLines(orderPath);
        fb.log(`Read in ${order.length.toLocaleString("en-US")} lines from ${orderPath}`);
        const byId = new Map(rows.map((r) => [r[indexCol] ?? "", r]));
        rows = order.map((v) => byId.get(v) ?? die(`Value '${v}' not found in column '${indexCol}' in '${csv}'`));
      }

      const ax = fb.axis(axisLabel);
      ax.set(
        rows.map((r) => {
          const key = r[indexCol] ?? "";
          return [key, truncateLabel(labelCol ? r[labelCol] ?? "" : key, maxLen)] as const;
        }),
      );
      if (colorCol) {
        for (const r of rows) {
          const v = r[colorCol] ?? "";
          if (v.length > 0) colorOf.set(r[indexCol] ?? "", v);
        }
      }
      if (order) {
        ax.setOrder(order);
        ax.fix();
      }

      fb.log(`Read in ${rows.length.toLocaleString("en-US")} ${axisLabel} annotations`);
      return ready;
    },

    plot(fb) {
      if (!colorCol) return;
      const ax = fb.axis(axisLabel);
      const ids = ax.order();
      const categories: string[] = [];
      for (const m of ids) {
        const v = colorOf.get(m);
        if (v !== undefined && !categories.includes(v)) categories.push(v);
      }
      const cell = (m: string): number | null => {
        const v = colorOf.get(m);
        return v === undefined ? null : categories.indexOf(v);
      };
      const hover = (m: string): string => `${ax.label(m)}: ${colorOf.get(m) ?? ""}`;
      const palette = categoryPalette(categories);

      fb.log(`Adding subplot for ${id} (x=${opts.xIndex}, y=${opts.yIndex})`);
      if (orient === "v") {
        fb.subplots.add(id, opts.xIndex, opts.yIndex, { shareY: true, width: 0.05 });
        fb.subplots.plot(id, {
          type: "heatmap",
          z: ids.map((m) => [cell(m)]),
          palette,
          hovertext: ids.map((m) => [hover(m)]),
        });
        fb.subplots.formatAxis(id, "x", { tickvals: [0], ticktext: [colorCol] });
      } else {
        fb.subplots.add(id, opts.xIndex, opts.yIndex, { shareX: true, height: 0.05 });
        fb.subplots.plot(id, {
          type: "heatmap",
          z: [ids.map(cell)],
          palette,
          hovertext: [ids.map(hover)],
        });
        fb.subplots.formatAxis(id, "y", { tickvals: [0], ticktext: [colorCol] });
      }
    },
  };
}
