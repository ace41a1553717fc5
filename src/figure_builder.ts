import yargs from "yargs";
import type { Options } from "yargs";
import { AxisRegistry, type Axis } from "./axis.js";
import { createLogger, type Logger } from "./log.js";
import { SubplotCanvas } from "./subplots.js";
import { asNum, die } from "./util.js";

export type ArgType = "string" | "number" | "boolean";
export type ParamValue = string | number | boolean | undefined;
export type Params = Record<string, ParamValue>;

/** An input value driving the figure, declared with its type and default. */
export type FigureArgument = Readonly<{
  key: string;
  description: string;
  type: ArgType;
  default?: string | number | boolean;
}>;

export function figureArgument(opts: {
  key: string;
  description: string;
  type?: ArgType;
  default?: string | number | boolean;
}): FigureArgument {
  if (!opts.key || /\s/.test(opts.key)) die(`Argument key '${opts.key}' must be non-empty and contain no whitespace`);
  const type = opts.type ?? "string";
  if (opts.default !== undefined && typeof opts.default !== type) {
    die(`Default for argument '${opts.key}' must be a ${type}`);
  }
  return Object.freeze({ key: opts.key, description: opts.description, type, default: opts.default });
}

export type ReadResult = { status: "ready" } | { status: "disabled"; reason: string };

export const ready: ReadResult = { status: "ready" };

export function disabled(reason: string): ReadResult {
  return { status: "disabled", reason };
}

export type ElementStatus = "pending" | ReadResult["status"];

/**
 * One unit of the figure. `read` runs for every element in declaration order
 * and decides whether the element takes part; `plot` runs only for elements
 * whose read returned `ready`.
 */
export interface FigureElement {
  readonly id: string;
  readonly args: readonly FigureArgument[];
  /** Id of an earlier element this one cannot be drawn without. */
  readonly dependsOn?: string;
  read(fb: FigureBuilder, params: Params): ReadResult;
  plot(fb: FigureBuilder): void;
}

export type BuilderPhase = "constructed" | "arguments-parsed" | "data-read" | "rendered";

export type FigureBuilderOptions = {
  loggingId?: string;
  description?: string;
  args?: readonly FigureArgument[];
  read?: (fb: FigureBuilder, params: Params) => void;
  plot?: (fb: FigureBuilder) => void;
  elements: readonly FigureElement[];
  logger?: Logger;
};

type BoundaryEntry = {
  namespace: string;
  arg: FigureArgument;
};

export const GLOBAL = "global";

function coerce(value: unknown, flag: string, type: ArgType): ParamValue {
  if (value === undefined || value === null) return undefined;
  if (Array.isArray(value)) die(`Argument --${flag} was given more than once`);
  if (type === "number") {
    return asNum(value) ?? die(`Argument --${flag} expects a number, got '${String(value)}'`);
  }
  if (type === "boolean") {
    if (typeof value === "boolean") return value;
    if (value === "true" || value === "false") return value === "true";
    die(`Argument --${flag} expects true or false, got '${String(value)}'`);
  }
  return String(value);
}

export function paramString(params: Params, key: string): string | undefined {
  const v = params[key];
  return typeof v === "string" && v.length > 0 ? v : undefined;
}

export function paramNumber(params: Params, key: string): number | undefined {
  const v = params[key];
  return typeof v === "number" ? v : undefined;
}

export function paramBoolean(params: Params, key: string): boolean {
  return params[key] === true;
}

/** Coordinates the construction of a figure from independently read inputs. */
export class FigureBuilder {
  readonly loggingId: string;
  readonly description: string;
  readonly args: readonly FigureArgument[];
  readonly elements: readonly FigureElement[];
  readonly subplots = new SubplotCanvas();
  readonly logger: Logger;

  private readonly axes: AxisRegistry;
  private readonly boundary = new Map<string, BoundaryEntry>();
  private readonly globalRead?: (fb: FigureBuilder, params: Params) => void;
  private readonly globalPlot?: (fb: FigureBuilder) => void;
  private readonly results = new Map<string, ReadResult>();
  private params = new Map<string, Params>();
  private _phase: BuilderPhase = "constructed";

  constructor(opts: FigureBuilderOptions) {
    this.loggingId = opts.loggingId ?? "figure-builder";
    this.description = opts.description ?? "Figure description";
    this.args = opts.args ?? [];
    this.elements = this.validateElements(opts.elements);
    this.globalRead = opts.read;
    this.globalPlot = opts.plot;
    this.logger = opts.logger ?? createLogger(this.loggingId);
    this.axes = new AxisRegistry(this.logger);

    for (const arg of this.args) this.declare(arg.key, { namespace: GLOBAL, arg });
    for (const el of this.elements) {
      for (const arg of el.args) this.declare(`${el.id}-${arg.key}`, { namespace: el.id, arg });
    }

    this.log(this.description);
    this.log(`Node.js version: ${process.version}`);
  }

  private validateElements(elements: readonly FigureElement[]): readonly FigureElement[] {
    const seen = new Set<string>();
    for (const el of elements) {
      if (!el.id || /\s/.test(el.id)) die(`Element id '${el.id}' must be non-empty and contain no whitespace`);
      if (el.id === GLOBAL) die(`Element id '${GLOBAL}' is reserved`);
      if (seen.has(el.id)) die(`Element id '${el.id}' is not unique`);
      if (el.dependsOn !== undefined && !seen.has(el.dependsOn)) {
        die(`Element '${el.id}' depends on '${el.dependsOn}', which is not declared before it`);
      }
      seen.add(el.id);
    }
    return [...elements];
  }

  private declare(flag: string, entry: BoundaryEntry): void {
    const prior = this.boundary.get(flag);
    if (prior) {
      die(`Argument --${flag} is declared by both '${prior.namespace}' and '${entry.namespace}'`);
    }
    this.boundary.set(flag, entry);
  }

  get phase(): BuilderPhase {
    return this._phase;
  }

  private expectPhase(from: BuilderPhase, step: string): void {
    if (this._phase !== from) die(`Cannot ${step} in phase '${this._phase}' (expected '${from}')`);
  }

  log(msg: string): void {
    this.logger.info(msg);
  }

  warn(msg: string): void {
    this.logger.warn(msg);
  }

  axis(name: string): Axis {
    return this.axes.axis(name);
  }

  /** Every command line flag the figure accepts, without the leading dashes. */
  flags(): string[] {
    return Array.from(this.boundary.keys());
  }

  element(id: string): FigureElement {
    return this.elements.find((e) => e.id === id) ?? die(`No element with id '${id}'`);
  }

  status(id: string): ElementStatus {
    this.element(id);
    return this.results.get(id)?.status ?? "pending";
  }

  isEnabled(id: string): boolean {
    return this.status(id) !== "disabled";
  }

  readResult(id: string): ReadResult | undefined {
    return this.results.get(id);
  }

  paramsFor(namespace: string): Params {
    return { ...(this.params.get(namespace) ?? die(`No parameters for namespace '${namespace}'`)) };
  }

  /** Returns false when `--help` was requested; usage has then been printed and nothing parsed. */
  parseArgs(argv: readonly string[]): boolean {
    this.expectPhase("constructed", "parse arguments");
    const options: Record<string, Options> = {};
    for (const [flag, { namespace, arg }] of this.boundary) {
      options[flag] = {
        type: arg.type,
        describe: arg.default !== undefined ? `${arg.description} (default: ${String(arg.default)})` : arg.description,
        group: namespace === GLOBAL ? "Global:" : `${namespace}:`,
      };
    }
    const parsed = yargs([...argv])
      .usage(this.description)
      .parserConfiguration({ "camel-case-expansion": false, "dot-notation": false })
      .options(options)
      .strict()
      .version(false)
      .exitProcess(false)
      .fail((msg, err) => {
        throw err ?? new Error(msg);
      })
      .parseSync();
    if (parsed.help === true) return false;
    if (parsed._.length > 0) die(`Unrecognized argument: ${String(parsed._[0])}`);
    const flat: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(parsed)) {
      if (k === "_" || k === "$0" || k === "help") continue;
      flat[k] = v;
    }
    this.setParams(flat);
    return true;
  }

  /** Splits flat `{flag: value}` input into the global and per-element namespaces. */
  setParams(flat: Record<string, unknown>): void {
    this.expectPhase("constructed", "parse arguments");
    const params = new Map<string, Params>([[GLOBAL, {}]]);
    for (const el of this.elements) params.set(el.id, {});
    for (const [flag, value] of Object.entries(flat)) {
      const entry = this.boundary.get(flag) ?? die(`Unrecognized argument: --${flag}`);
      const ns = params.get(entry.namespace) ?? {};
      ns[entry.arg.key] = coerce(value, flag, entry.arg.type);
      params.set(entry.namespace, ns);
    }
    for (const { namespace, arg } of this.boundary.values()) {
      const ns = params.get(namespace) ?? {};
      if (ns[arg.key] === undefined) ns[arg.key] = arg.default;
      params.set(namespace, ns);
    }
    this.params = params;
    this._phase = "arguments-parsed";

    this.log("Parameters:");
    for (const [group, values] of params) {
      this.log(`Group: ${group}`);
      for (const [k, v] of Object.entries(values)) this.log(`       ${k}: ${String(v)}`);
    }
    this.log("End of Parameters");
  }

  readData(): void {
    this.expectPhase("arguments-parsed", "read data");
    this.log("Reading in data from the global namespace");
    this.globalRead?.(this, this.paramsFor(GLOBAL));
    for (const el of this.elements) {
      this.log(`Reading in data for element: ${el.id}`);
      const res = el.read(this, this.paramsFor(el.id));
      this.results.set(el.id, res);
      if (res.status === "disabled") this.log(`Element ${el.id} disabled: ${res.reason}`);
    }
    this._phase = "data-read";
  }

  makePlots(): void {
    this.expectPhase("data-read", "make plots");
    for (const el of this.elements) {
      if (this.results.get(el.id)?.status !== "ready") continue;
      this.log(`Plotting element: ${el.id}`);
      el.plot(this);
    }
    this.globalPlot?.(this);
    this._phase = "rendered";
  }

  run(argv: readonly string[]): boolean {
    if (!this.parseArgs(argv)) return false;
    this.readData();
    this.makePlots();
    return true;
  }

  render(cssPath?: string): string {
    if (this._phase !== "rendered") die(`Cannot render a figure in phase '${this._phase}'`);
    return this.subplots.render(cssPath);
  }
}
