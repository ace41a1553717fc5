import { disabled, figureArgument, paramString, ready, type FigureElement } from "./figure_builder.js";
import { makeNjTree, type NjTree } from "./nj_tree.js";
import { die, readSquareMatrix } from "./util.js";

export type GenomeTreeOptions = {
  id?: string;
  axisLabel?: string;
  xIndex?: number;
  yIndex?: number;
};

/**
 * Neighbor-joining tree over a genome distance matrix. When present, its leaf
 * order becomes the fixed order of the genome axis.
 */
export function genomeTree(opts: GenomeTreeOptions = {}): FigureElement {
  const id = opts.id ?? "genomeTree";
  const axisLabel = opts.axisLabel ?? "genome";
  const xIndex = opts.xIndex ?? 0;
  const yIndex = opts.yIndex ?? 0;
  let tree: NjTree | undefined;

  return {
    id,
    args: [
      figureArgument({
        key: "distmat",
        description: `Distance matrix used to generate ${axisLabel} dendrogram (optional)`,
      }),
    ],

    read(fb, params) {
      const distmat = paramString(params, "distmat");
      if (!distmat) return disabled(`no --${id}-distmat provided, skipping ${axisLabel} tree`);

      fb.log(`Reading ${distmat}`);
      const dm = readSquareMatrix(distmat);
      const ax = fb.axis(axisLabel);
      let keep = dm.rows.map((_, i) => i);
      if (ax.exists) {
        const members = ax.memberSet();
        keep = keep.filter((i) => members.has(dm.rows[i]));
        fb.log(`${axisLabel}s with annotations and distances: ${keep.length.toLocaleString("en-US")}`);
        if (keep.length < 2) {
          die(`Fewer than two ${axisLabel}s in ${distmat} are also present in the ${axisLabel} annotations`);
        }
      }

      tree = makeNjTree(
        keep.map((i) => dm.rows[i]),
        keep.map((i) => keep.map((j) => dm.values[i][j])),
      );
      if (ax.setOrder(tree.leafOrder)) ax.fix();
      return ready;
    },

    plot(fb) {
      const t = tree ?? die(`${id} has no tree to plot`);
      const ax = fb.axis(axisLabel);

      fb.log(`Adding subplot for ${id} (x=${xIndex}, y=${yIndex})`);
      fb.subplots.add(id, xIndex, yIndex, { shareY: true });

      fb.log(`Plotting nodes for ${id}`);
      fb.subplots.plot(id, {
        type: "lines",
        name: "Neighbor Joining Tree",
        x: t.x,
        y: t.y,
        text: t.text,
      });

      fb.log(`Plotting lines for ${id}`);
      fb.subplots.plot(id, {
        type: "lines",
        x: t.extensionX,
        y: t.extensionY,
        line: { color: "black", dash: "dot", width: 1 },
      });

      fb.log(`Formatting axes for ${id}`);
      const span = t.maxX > 0 ? t.maxX : 1;
      fb.subplots.formatAxis(id, "x", { range: [span * -0.025, span * 1.025], showticklabels: false });
      fb.subplots.formatAxis(id, "y", {
        tickvals: ax.order().map((_, i) => i),
        ticktext: ax.labels(),
        showticklabels: true,
      });
      fb.subplots.anchorYaxis(yIndex, "right");
      fb.log(`Done plotting ${id}`);
    },
  };
}
