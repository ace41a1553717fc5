#!/usr/bin/env node
import fs from "fs";
import path from "path";
import { hideBin } from "yargs/helpers";
import { exportPdf } from "./export_pdf.js";
import { GLOBAL, paramBoolean, paramString } from "./figure_builder.js";
import { createGigMapFigure } from "./gigmap_figure.js";
import { writeText } from "./util.js";

function main(): void {
  const fb = createGigMapFigure();
  if (!fb.run(hideBin(process.argv))) return;

  const params = fb.paramsFor(GLOBAL);
  const folder = paramString(params, "output-folder") ?? "./";
  const prefix = paramString(params, "output-prefix") ?? "gigmap-render";
  fs.mkdirSync(folder, { recursive: true });

  const svgPath = path.join(folder, `${prefix}.svg`);
  writeText(svgPath, fb.render(new URL("../styles/figure.css", import.meta.url).pathname));
  fb.log(`Wrote ${svgPath}`);

  if (paramBoolean(params, "export-pdf")) {
    const pdfPath = path.join(folder, `${prefix}.pdf`);
    exportPdf(svgPath, pdfPath, { logger: fb.logger });
    fb.log(`Wrote ${pdfPath}`);
  }
}

try {
  main();
} catch (e) {
  console.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
}
