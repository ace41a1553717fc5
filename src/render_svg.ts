import fs from "fs";
import { scaleColor } from "./colors.js";
import type { HeatmapTrace, LineTrace, Panel, SubplotCanvas } from "./subplots.js";
import { esc } from "./util.js";

type Box = { x: number; y: number; w: number; h: number };

type Scale = {
  sx: (v: number) => number;
  sy: (v: number) => number;
};

function cls(s: string): string {
  return s.replace(/[^a-zA-Z0-9_-]+/g, "-").replace(/^-+|-+$/g, "").toLowerCase();
}

function num(v: number): string {
  return Number(v.toFixed(2)).toString();
}

function bands(keys: number[], weight: (k: number) => number, start: number, span: number, gap: number): Map<number, [number, number]> {
  const total = keys.reduce((s, k) => s + weight(k), 0);
  const unit = total > 0 ? Math.max(0, span - gap * (keys.length - 1)) / total : 0;
  const out = new Map<number, [number, number]>();
  let pos = start;
  for (const k of keys) {
    const size = weight(k) * unit;
    out.set(k, [pos, size]);
    pos += size + gap;
  }
  return out;
}

function panelBoxes(canvas: SubplotCanvas): Map<string, Box> {
  const l = canvas.layout;
  const cols = bands(canvas.columns(), (k) => canvas.columnWeight(k), l.margin_left, l.width - l.margin_left - l.margin_right, l.gap);
  const rows = bands(canvas.rows(), (k) => canvas.rowWeight(k), l.margin_top, l.height - l.margin_top - l.margin_bottom, l.gap);
  const out = new Map<string, Box>();
  for (const p of canvas.allPanels()) {
    const [x, w] = cols.get(p.xIndex) ?? [0, 0];
    const [y, h] = rows.get(p.yIndex) ?? [0, 0];
    const pad = Math.min(0.45, Math.max(0, p.options.padding ?? 0));
    out.set(p.id, { x: x + w * pad, y: y + h * pad, w: w * (1 - 2 * pad), h: h * (1 - 2 * pad) });
  }
  return out;
}

function scaleFor(canvas: SubplotCanvas, p: Panel, box: Box): Scale {
  const [x0, x1] = canvas.range(p.id, "x");
  const [y0, y1] = canvas.range(p.id, "y");
  return {
    sx: (v) => box.x + ((v - x0) / (x1 - x0)) * box.w,
    sy: (v) => box.y + box.h - ((v - y0) / (y1 - y0)) * box.h,
  };
}

function renderHeatmap(t: HeatmapTrace, s: Scale): string {
  const zs = t.z.flat().filter((v): v is number => v !== null);
  const zmin = t.zmin ?? Math.min(...zs);
  const zmax = t.zmax ?? Math.max(...zs);
  const cells: string[] = [];
  t.z.forEach((row, r) => {
    row.forEach((v, c) => {
      if (v === null) return;
      const fill = t.palette
        ? t.palette[Math.abs(Math.trunc(v)) % t.palette.length]
        : scaleColor(t.colorscale ?? "blues", zmax === zmin ? 1 : (v - zmin) / (zmax - zmin));
      const x = s.sx(c - 0.5);
      const y = s.sy(r + 0.5);
      const w = s.sx(c + 0.5) - x;
      const h = s.sy(r - 0.5) - y;
      const hover = t.hovertext?.[r]?.[c] ?? String(v);
      cells.push(`\n      <rect x="${num(x)}" y="${num(y)}" width="${num(w)}" height="${num(h)}" fill="${fill}"><title>${esc(hover)}</title></rect>`);
    });
  });
  return cells.join("");
}

function renderLines(t: LineTrace, s: Scale): string {
  const segs: string[] = [];
  let cur: string[] = [];
  const flush = () => {
    if (cur.length > 1) segs.push(cur.join(" "));
    cur = [];
  };
  t.x.forEach((xv, i) => {
    const yv = t.y[i] ?? null;
    if (xv === null || yv === null) {
      flush();
      return;
    }
    cur.push(`${cur.length === 0 ? "M" : "L"}${num(s.sx(xv))},${num(s.sy(yv))}`);
  });
  flush();
  const color = t.line?.color ?? "#1f2937";
  const width = t.line?.width ?? 1.5;
  const dash = t.line?.dash === "dot" ? ` stroke-dasharray="1,3"` : "";
  const name = t.name ? ` data-name="${esc(t.name)}"` : "";
  const path = segs.length > 0 ? `\n      <path class="line"${name} d="${segs.join(" ")}" stroke="${color}" stroke-width="${width}"${dash} fill="none"/>` : "";
  const seen = new Set<string>();
  const hovers: string[] = [];
  (t.text ?? []).forEach((text, i) => {
    const xv = t.x[i];
    const yv = t.y[i];
    if (!text || xv === null || yv === null || xv === undefined || yv === undefined) return;
    const key = `${xv}:${yv}:${text}`;
    if (seen.has(key)) return;
    seen.add(key);
    hovers.push(`\n      <circle class="hover" cx="${num(s.sx(xv))}" cy="${num(s.sy(yv))}" r="3"><title>${esc(text)}</title></circle>`);
  });
  return path + hovers.join("");
}

function tickSource(panels: Panel[], ax: "x" | "y"): Panel | undefined {
  return panels.find((p) => {
    const fmt = ax === "x" ? p.xaxis : p.yaxis;
    return fmt.showticklabels !== false && (fmt.ticktext?.length ?? 0) > 0;
  });
}

function renderRowTicks(canvas: SubplotCanvas, boxes: Map<string, Box>, yIndex: number): string {
  const side = canvas.yAnchor(yIndex);
  const inRow = canvas.allPanels().filter((p) => p.yIndex === yIndex).sort((a, b) => a.xIndex - b.xIndex);
  const ordered = side === "right" ? [...inRow].reverse() : inRow;
  const src = tickSource(ordered, "y");
  const edgePanel = ordered[0];
  const srcBox = src ? boxes.get(src.id) : undefined;
  const edgeBox = edgePanel ? boxes.get(edgePanel.id) : undefined;
  if (!src || !srcBox || !edgeBox) return "";
  const s = scaleFor(canvas, src, srcBox);
  const x = side === "right" ? edgeBox.x + edgeBox.w + 4 : edgeBox.x - 4;
  const anchor = side === "right" ? "start" : "end";
  const vals = src.yaxis.tickvals ?? [];
  return (src.yaxis.ticktext ?? []).map((text, i) => {
    const v = vals[i] ?? i;
    return `\n    <text class="tickLabel y" x="${num(x)}" y="${num(s.sy(v))}" text-anchor="${anchor}" dominant-baseline="middle">${esc(text)}</text>`;
  }).join("");
}

function renderColumnTicks(canvas: SubplotCanvas, boxes: Map<string, Box>, xIndex: number): string {
  const side = canvas.xAnchor(xIndex);
  const inCol = canvas.allPanels().filter((p) => p.xIndex === xIndex).sort((a, b) => b.yIndex - a.yIndex);
  const ordered = side === "bottom" ? [...inCol].reverse() : inCol;
  const src = tickSource(ordered, "x");
  const edgePanel = ordered[0];
  const srcBox = src ? boxes.get(src.id) : undefined;
  const edgeBox = edgePanel ? boxes.get(edgePanel.id) : undefined;
  if (!src || !srcBox || !edgeBox) return "";
  const s = scaleFor(canvas, src, srcBox);
  const y = side === "bottom" ? edgeBox.y + edgeBox.h + 4 : edgeBox.y - 4;
  const anchor = side === "bottom" ? "end" : "start";
  const vals = src.xaxis.tickvals ?? [];
  return (src.xaxis.ticktext ?? []).map((text, i) => {
    const x = s.sx(vals[i] ?? i);
    return `\n    <text class="tickLabel x" x="${num(x)}" y="${num(y)}" text-anchor="${anchor}" dominant-baseline="middle" transform="rotate(-90 ${num(x)} ${num(y)})">${esc(text)}</text>`;
  }).join("");
}

export function renderSvg(canvas: SubplotCanvas, cssPath?: string): string {
  const l = canvas.layout;
  const css = cssPath ? fs.readFileSync(cssPath, "utf8") : "";
  const boxes = panelBoxes(canvas);

  const panels = canvas.allPanels().map((p) => {
    const box = boxes.get(p.id);
    if (!box) return "";
    const s = scaleFor(canvas, p, box);
    const body = p.traces.map((t) => (t.type === "heatmap" ? renderHeatmap(t, s) : renderLines(t, s))).join("");
    return `\n  <g class="panel ${cls(p.id)}" data-id="${esc(p.id)}">\n    <rect class="plotBg" x="${num(box.x)}" y="${num(box.y)}" width="${num(box.w)}" height="${num(box.h)}" fill="${esc(l.plot_bgcolor)}"/>\n    <g class="traces">${body}\n    </g>\n  </g>`;
  }).join("");

  const rowTicks = canvas.rows().map((r) => renderRowTicks(canvas, boxes, r)).join("");
  const colTicks = canvas.columns().map((c) => renderColumnTicks(canvas, boxes, c)).join("");

  return `<?xml version="1.0" encoding="UTF-8"?>\n<svg xmlns="http://www.w3.org/2000/svg" xmlns:inkscape="http://www.inkscape.org/namespaces/inkscape" width="${l.width}" height="${l.height}" viewBox="0 0 ${l.width} ${l.height}">\n<style>\n${css}\n.tickLabel {\n  font-size: ${l.font_size}px;\n}\n</style>\n<rect class="paper" x="0" y="0" width="${l.width}" height="${l.height}" fill="${esc(l.paper_bgcolor)}"/>\n<g id="layer-panels" class="layer panels" inkscape:groupmode="layer" inkscape:label="panels">${panels}\n</g>\n<g id="layer-labels" class="layer labels" inkscape:groupmode="layer" inkscape:label="labels">${rowTicks}${colTicks}\n</g>\n</svg>`;
}
