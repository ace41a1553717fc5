import { axisAnnot } from "./axis_annot.js";
import { heatmapColorbar } from "./colorbar.js";
import { loadLayoutConfig, type FigureLayout } from "./config.js";
import { FigureBuilder, figureArgument, paramString } from "./figure_builder.js";
import { genomeTree } from "./genome_tree.js";
import { heatmap } from "./heatmap.js";
import type { Logger } from "./log.js";

/**
 * The gene/genome figure. Annotations come first so the tree and heatmap see
 * their axis decisions; the colorbar comes last so it sees the heatmap's.
 */
export function createGigMapFigure(logger?: Logger): FigureBuilder {
  let layout: FigureLayout | undefined;
  const genomeHeatmap = heatmap({
    id: "genomeHeatmap",
    xAxis: "gene",
    xCol: "sseqid",
    yAxis: "genome",
    yCol: "genome",
    valCol: "pident",
    fillValue: 0,
    xIndex: 1,
    yIndex: 0,
  });

  return new FigureBuilder({
    description: "Render a display showing the distribution of annotated genes across microbial genomes",
    loggingId: "gig-map-render",
    logger,
    args: [
      figureArgument({ key: "output-prefix", description: "Prefix for output file", default: "gigmap-render" }),
      figureArgument({ key: "output-folder", description: "Folder for output file", default: "./" }),
      figureArgument({ key: "config", description: "YAML file with figure layout settings (optional)" }),
      figureArgument({ key: "export-pdf", description: "Also export the figure as PDF with Inkscape", type: "boolean", default: false }),
    ],
    read(fb, params) {
      const config = paramString(params, "config");
      if (config) fb.log(`Reading layout settings from ${config}`);
      layout = loadLayoutConfig(config);
    },
    plot(fb) {
      if (layout) fb.subplots.updateLayout(layout);
    },
    elements: [
      axisAnnot({ id: "genomeAnnot", axisLabel: "genome", orient: "v", xIndex: 2, yIndex: 0 }),
      axisAnnot({ id: "geneAnnot", axisLabel: "gene", orient: "h", xIndex: 1, yIndex: -1 }),
      genomeTree({ id: "genomeTree", xIndex: 0, yIndex: 0 }),
      genomeHeatmap,
      heatmapColorbar({ id: "genomeColorbar", heatmap: genomeHeatmap, xIndex: 2, yIndex: -1, label: "Percent Identity" }),
    ],
  });
}
