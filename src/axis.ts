import type { Logger } from "./log.js";
import { die } from "./util.js";

/** Ordered `[id, label]` pairs offered to an axis by an element. */
export type AxisSeries = ReadonlyArray<readonly [string, string]>;

export type AxisState = "unset" | "set" | "fixed";

/**
 * A categorical dimension shared by every panel of a figure.
 *
 * An axis only moves forward through `unset -> set -> fixed`. Once fixed, the
 * order belongs to whichever element fixed it first; later calls to
 * `setOrder` are ignored with a warning.
 */
export class Axis {
  private _order: string[] = [];
  private labelOf = new Map<string, string>();
  private _exists = false;
  private _fixed = false;

  constructor(
    readonly name: string,
    private readonly log?: Logger,
  ) {}

  get exists(): boolean {
    return this._exists;
  }

  get isFixed(): boolean {
    return this._fixed;
  }

  get state(): AxisState {
    if (this._fixed) return "fixed";
    return this._exists ? "set" : "unset";
  }

  set(series: AxisSeries): void {
    const known = this.memberSet();
    let skipped = 0;
    for (const [id, label] of series) {
      this.labelOf.set(id, label);
      if (known.has(id)) continue;
      if (this._fixed) {
        skipped += 1;
        continue;
      }
      this._order.push(id);
      known.add(id);
    }
    if (skipped > 0) {
      this.log?.warn(`Axis '${this.name}' is fixed; ${skipped} new member(s) labelled but not added to the order`);
    }
    this._exists = true;
  }

  setOrder(sequence: readonly string[]): boolean {
    if (this._fixed) {
      this.log?.warn(`Axis '${this.name}' is fixed; ignoring a new order of ${sequence.length} member(s)`);
      return false;
    }
    const seen = new Set<string>();
    const known = this.memberSet();
    for (const id of sequence) {
      if (seen.has(id)) die(`Axis '${this.name}': '${id}' appears more than once in the new order`);
      if (this._exists && !known.has(id)) die(`Axis '${this.name}': '${id}' is not a member of this axis`);
      seen.add(id);
    }
    this._order = [...sequence];
    this._exists = true;
    return true;
  }

  fix(): void {
    if (this._fixed) return;
    this._fixed = true;
    this._exists = true;
  }

  order(): string[] {
    return [...this._order];
  }

  memberSet(): Set<string> {
    return new Set(this._order);
  }

  length(): number {
    return this._order.length;
  }

  label(id: string): string {
    return this.labelOf.get(id) ?? id;
  }

  labels(): string[] {
    return this._order.map((id) => this.label(id));
  }

  labelDict(): Record<string, string> {
    const out: Record<string, string> = {};
    for (const id of this._order) out[id] = this.label(id);
    return out;
  }
}

export class AxisRegistry {
  private axes = new Map<string, Axis>();

  constructor(private readonly log?: Logger) {}

  axis(name: string): Axis {
    let ax = this.axes.get(name);
    if (!ax) {
      ax = new Axis(name, this.log);
      this.axes.set(name, ax);
    }
    return ax;
  }

  names(): string[] {
    return Array.from(this.axes.keys());
  }
}
