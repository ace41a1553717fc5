import { disabled, ready, type FigureElement } from "./figure_builder.js";
import type { HeatmapElement } from "./heatmap.js";
import { die, linspace } from "./util.js";

export type HeatmapColorbarOptions = {
  id: string;
  heatmap: HeatmapElement;
  xIndex: number;
  yIndex: number;
  /** Caption shown beside the colorbar. */
  label: string;
};

function tickText(v: number): string {
  return Number(v.toPrecision(3)).toString();
}

/** Colorbar annotating the values of one heatmap; it is drawn only with its heatmap. */
export function heatmapColorbar(opts: HeatmapColorbarOptions): FigureElement {
  const { id, heatmap } = opts;

  return {
    id,
    args: [],
    dependsOn: heatmap.id,

    read(fb) {
      if (!fb.isEnabled(heatmap.id)) {
        return disabled(`Heatmap element is disabled ('${heatmap.id}'), disabling colorbar`);
      }
      return ready;
    },

    plot(fb) {
      const s = heatmap.scale() ?? die(`Heatmap '${heatmap.id}' has no values for ${id}`);
      const values = linspace(s.minVal, s.maxVal, 100);

      fb.log(`Adding subplot for ${id} (x=${opts.xIndex}, y=${opts.yIndex})`);
      fb.subplots.add(id, opts.xIndex, opts.yIndex, { height: 0.05, width: 0.25, padding: 0.05 });

      fb.log(`Plotting colorbar for ${id}, paired with ${heatmap.id}`);
      fb.subplots.plot(id, {
        type: "heatmap",
        z: [values],
        zmin: s.zmin,
        zmax: s.maxVal,
        colorscale: s.colorscale,
        hovertext: [values.map(tickText)],
      });

      fb.log(`Formatting axes for ${id}`);
      const tickIx = [0, 25, 50, 74, 99];
      fb.subplots.formatAxis(id, "y", { tickvals: [0], ticktext: [opts.label], showticklabels: true });
      fb.subplots.formatAxis(id, "x", { tickvals: tickIx, ticktext: tickIx.map((i) => tickText(values[i])), showticklabels: true });
      fb.subplots.anchorYaxis(opts.yIndex, "right");
      fb.subplots.anchorXaxis(opts.xIndex, "bottom");
    },
  };
}
