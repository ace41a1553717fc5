import { defaultLayout, type FigureLayout } from "./config.js";
import { renderSvg } from "./render_svg.js";
import { die } from "./util.js";

export type AxisName = "x" | "y";
export type XSide = "top" | "bottom";
export type YSide = "left" | "right";

export type PanelOptions = {
  shareX?: boolean;
  shareY?: boolean;
  /** Relative width of the panel's column (default 1). */
  width?: number;
  /** Relative height of the panel's row (default 1). */
  height?: number;
  /** Inset on every side, as a fraction of the cell. */
  padding?: number;
};

export type AxisFormat = {
  range?: [number, number];
  tickvals?: number[];
  ticktext?: string[];
  showticklabels?: boolean;
};

export type LineTrace = {
  type: "lines";
  name?: string;
  x: Array<number | null>;
  y: Array<number | null>;
  text?: string[];
  line?: { color?: string; dash?: "solid" | "dot"; width?: number };
};

/**
 * Cell `z[r][c]` is drawn at x = c, y = r (rows count upwards). With a
 * `palette`, values are category indices; otherwise they map onto
 * `colorscale` between `zmin` and `zmax`.
 */
export type HeatmapTrace = {
  type: "heatmap";
  z: Array<Array<number | null>>;
  zmin?: number;
  zmax?: number;
  colorscale?: string;
  palette?: readonly string[];
  hovertext?: string[][];
};

export type Trace = LineTrace | HeatmapTrace;

export type Panel = {
  id: string;
  xIndex: number;
  yIndex: number;
  options: PanelOptions;
  traces: Trace[];
  xaxis: AxisFormat;
  yaxis: AxisFormat;
};

function traceRange(t: Trace, ax: AxisName): [number, number] | undefined {
  if (t.type === "heatmap") {
    const n = ax === "x" ? Math.max(0, ...t.z.map((r) => r.length)) : t.z.length;
    return n > 0 ? [-0.5, n - 0.5] : undefined;
  }
  const vals = (ax === "x" ? t.x : t.y).filter((v): v is number => v !== null && Number.isFinite(v));
  if (vals.length === 0) return undefined;
  return [Math.min(...vals), Math.max(...vals)];
}

function union(ranges: Array<[number, number] | undefined>): [number, number] | undefined {
  const defined = ranges.filter((r): r is [number, number] => r !== undefined);
  if (defined.length === 0) return undefined;
  return [Math.min(...defined.map((r) => r[0])), Math.max(...defined.map((r) => r[1]))];
}

/**
 * A grid of panels addressed by ordinal column (`xIndex`, ascending left to
 * right) and row (`yIndex`, descending top to bottom).
 */
export class SubplotCanvas {
  private panels = new Map<string, Panel>();
  private xAnchors = new Map<number, XSide>();
  private yAnchors = new Map<number, YSide>();
  private _layout: FigureLayout = { ...defaultLayout };

  add(id: string, xIndex: number, yIndex: number, options: PanelOptions = {}): Panel {
    if (this.panels.has(id)) die(`Subplot '${id}' was already added`);
    const panel: Panel = { id, xIndex, yIndex, options, traces: [], xaxis: {}, yaxis: {} };
    this.panels.set(id, panel);
    return panel;
  }

  panel(id: string): Panel {
    return this.panels.get(id) ?? die(`No subplot with id '${id}'`);
  }

  hasPanel(id: string): boolean {
    return this.panels.has(id);
  }

  allPanels(): Panel[] {
    return Array.from(this.panels.values());
  }

  plot(id: string, trace: Trace): void {
    this.panel(id).traces.push(trace);
  }

  formatAxis(id: string, ax: AxisName, fmt: AxisFormat): void {
    const p = this.panel(id);
    if (ax === "x") p.xaxis = { ...p.xaxis, ...fmt };
    else p.yaxis = { ...p.yaxis, ...fmt };
  }

  anchorXaxis(xIndex: number, side: XSide): void {
    this.xAnchors.set(xIndex, side);
  }

  anchorYaxis(yIndex: number, side: YSide): void {
    this.yAnchors.set(yIndex, side);
  }

  xAnchor(xIndex: number): XSide {
    return this.xAnchors.get(xIndex) ?? "bottom";
  }

  yAnchor(yIndex: number): YSide {
    return this.yAnchors.get(yIndex) ?? "left";
  }

  updateLayout(layout: Partial<FigureLayout>): void {
    this._layout = { ...this._layout, ...layout };
  }

  get layout(): FigureLayout {
    return { ...this._layout };
  }

  columns(): number[] {
    return Array.from(new Set(this.allPanels().map((p) => p.xIndex))).sort((a, b) => a - b);
  }

  rows(): number[] {
    return Array.from(new Set(this.allPanels().map((p) => p.yIndex))).sort((a, b) => b - a);
  }

  columnWeight(xIndex: number): number {
    return Math.max(...this.allPanels().filter((p) => p.xIndex === xIndex).map((p) => p.options.width ?? 1));
  }

  rowWeight(yIndex: number): number {
    return Math.max(...this.allPanels().filter((p) => p.yIndex === yIndex).map((p) => p.options.height ?? 1));
  }

  /** Data range of one axis of a panel, after sharing within its row or column. */
  range(id: string, ax: AxisName): [number, number] {
    const p = this.panel(id);
    const fmt = ax === "x" ? p.xaxis : p.yaxis;
    if (fmt.range) return fmt.range;
    const own = (q: Panel) => union(q.traces.map((t) => traceRange(t, ax)));
    const shared = ax === "x" ? p.options.shareX : p.options.shareY;
    let r = own(p);
    if (shared) {
      const peers = this.allPanels().filter((q) => {
        const explicit = ax === "x" ? q.xaxis.range : q.yaxis.range;
        if (explicit) return false;
        return ax === "x" ? q.options.shareX && q.xIndex === p.xIndex : q.options.shareY && q.yIndex === p.yIndex;
      });
      r = union(peers.map(own));
    }
    if (!r) return [0, 1];
    return r[0] === r[1] ? [r[0] - 0.5, r[1] + 0.5] : r;
  }

  render(cssPath?: string): string {
    return renderSvg(this, cssPath);
  }
}
