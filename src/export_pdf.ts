import fs from "fs";
import { spawnSync, type SpawnSyncOptions, type SpawnSyncReturns } from "child_process";
import { pathToFileURL } from "url";
import type { Logger } from "./log.js";

export type SpawnFn = (
  command: string,
  args: string[],
  options: SpawnSyncOptions,
) => Pick<SpawnSyncReturns<string | Buffer>, "status" | "error">;

export type ExportPdfOptions = {
  inkscapeBin?: string;
  spawn?: SpawnFn;
  logger?: Logger;
};

export function inkscapeArgs(svg: string, pdf: string): string[] {
  return ["--export-area-page", "--export-type=pdf", `--export-filename=${pdf}`, svg];
}

function defaultInkscape(): string {
  const fromEnv = process.env.INKSCAPE_BIN?.trim();
  return fromEnv && fromEnv.length > 0 ? fromEnv : "inkscape";
}

/** Converts a rendered figure to PDF by shelling out to Inkscape. */
export function exportPdf(svg: string, pdf: string, opts: ExportPdfOptions = {}): void {
  const bin = opts.inkscapeBin ?? defaultInkscape();
  const spawn: SpawnFn = opts.spawn ?? spawnSync;
  if (!fs.existsSync(svg)) {
    throw new Error(`SVG input not found: ${svg}`);
  }
  opts.logger?.info(`Exporting ${svg} to ${pdf} with ${bin}`);
  const res = spawn(bin, inkscapeArgs(svg, pdf), { stdio: "inherit" });

  if (res.error) {
    const code = "code" in res.error ? res.error.code : undefined;
    if (code === "ENOENT") {
      throw new Error(`Inkscape not found ('${bin}'). Install Inkscape or set INKSCAPE_BIN to the executable path.`);
    }
    throw new Error(`Failed to launch Inkscape ('${bin}'): ${res.error.message}`);
  }
  if (res.status !== 0) {
    throw new Error(`Inkscape export failed with exit code ${res.status}`);
  }
  if (!fs.existsSync(pdf)) {
    throw new Error(`Inkscape reported success but PDF was not created: ${pdf}`);
  }
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain) {
  const [svg, pdf] = process.argv.slice(2);
  if (!svg || !pdf) {
    console.error("Usage: node dist/export_pdf.js <in.svg> <out.pdf>");
    process.exit(1);
  }
  try {
    exportPdf(svg, pdf);
  } catch (e) {
    console.error(e instanceof Error ? e.message : String(e));
    process.exit(1);
  }
}
