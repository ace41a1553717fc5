import { scaleOrdinal, scaleSequential } from "d3-scale";
import {
  interpolateBlues,
  interpolateGreens,
  interpolateGreys,
  interpolatePurples,
  interpolateReds,
  interpolateViridis,
  schemeTableau10,
} from "d3-scale-chromatic";

const SCALES: Record<string, (t: number) => string> = {
  blues: interpolateBlues,
  greens: interpolateGreens,
  reds: interpolateReds,
  greys: interpolateGreys,
  purples: interpolatePurples,
  viridis: interpolateViridis,
};

export function colorscaleNames(): string[] {
  return Object.keys(SCALES);
}

export function isColorscale(name: string): boolean {
  return name in SCALES;
}

/** Color at `t` in [0, 1] along a named scale; `t` outside the range is clamped. */
export function scaleColor(name: string, t: number): string {
  const scale = scaleSequential(SCALES[name] ?? interpolateBlues)
    .domain([0, 1])
    .clamp(true);
  return scale(Number.isFinite(t) ? t : 0);
}

/** One color per category, in order of first appearance. */
export function categoryPalette(categories: readonly string[]): string[] {
  const color = scaleOrdinal<string, string>(schemeTableau10).domain(categories);
  return categories.map((c) => color(c));
}
