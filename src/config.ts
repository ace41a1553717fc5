import fs from "fs";
import yaml from "js-yaml";
import { asNum, die, readText } from "./util.js";

export type FigureLayout = {
  width: number;
  height: number;
  margin_left: number;
  margin_right: number;
  margin_top: number;
  margin_bottom: number;
  gap: number;
  font_size: number;
  paper_bgcolor: string;
  plot_bgcolor: string;
};

export const defaultLayout: FigureLayout = {
  width: 1200,
  height: 800,
  margin_left: 40,
  margin_right: 220,
  margin_top: 40,
  margin_bottom: 160,
  gap: 8,
  font_size: 11,
  paper_bgcolor: "white",
  plot_bgcolor: "white",
};

function asColor(v: unknown): string | undefined {
  return typeof v === "string" && v.trim().length > 0 ? v.trim() : undefined;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Merges a parsed YAML document over the defaults; the `layout:` key is optional. */
export function mergeLayout(rules: unknown): FigureLayout {
  const doc = isRecord(rules) ? rules : {};
  const raw = isRecord(doc.layout) ? doc.layout : doc;
  return {
    width: asNum(raw.width) ?? defaultLayout.width,
    height: asNum(raw.height) ?? defaultLayout.height,
    margin_left: asNum(raw.margin_left) ?? defaultLayout.margin_left,
    margin_right: asNum(raw.margin_right) ?? defaultLayout.margin_right,
    margin_top: asNum(raw.margin_top) ?? defaultLayout.margin_top,
    margin_bottom: asNum(raw.margin_bottom) ?? defaultLayout.margin_bottom,
    gap: asNum(raw.gap) ?? defaultLayout.gap,
    font_size: asNum(raw.font_size) ?? defaultLayout.font_size,
    paper_bgcolor: asColor(raw.paper_bgcolor) ?? defaultLayout.paper_bgcolor,
    plot_bgcolor: asColor(raw.plot_bgcolor) ?? defaultLayout.plot_bgcolor,
  };
}

export function loadLayoutConfig(path?: string): FigureLayout {
  if (!path) return { ...defaultLayout };
  if (!fs.existsSync(path)) die(`Cannot find file '${path}'`);
  return mergeLayout(yaml.load(readText(path)));
}
