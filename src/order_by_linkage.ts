import type { Logger } from "./log.js";
import { die, type NumericMatrix } from "./util.js";

export type LinkageMethod = "ward" | "single" | "complete" | "average" | "weighted";
export type DistanceMetric = "euclidean" | "cityblock" | "chebyshev" | "cosine";

export type LinkageOptions = {
  method?: LinkageMethod;
  metric?: DistanceMetric;
  logger?: Logger;
};

/** One merge step: clusters `left` and `right` join at `dist` into a cluster of `size` leaves. */
export type LinkageStep = {
  left: number;
  right: number;
  dist: number;
  size: number;
};

const METHODS: readonly LinkageMethod[] = ["ward", "single", "complete", "average", "weighted"];
const METRICS: readonly DistanceMetric[] = ["euclidean", "cityblock", "chebyshev", "cosine"];

export function isLinkageMethod(s: string): s is LinkageMethod {
  return METHODS.some((m) => m === s);
}

export function isDistanceMetric(s: string): s is DistanceMetric {
  return METRICS.some((m) => m === s);
}

function distance(a: number[], b: number[], metric: DistanceMetric): number {
  switch (metric) {
    case "euclidean": {
      let s = 0;
      for (let i = 0; i < a.length; i += 1) s += (a[i] - b[i]) ** 2;
      return Math.sqrt(s);
    }
    case "cityblock": {
      let s = 0;
      for (let i = 0; i < a.length; i += 1) s += Math.abs(a[i] - b[i]);
      return s;
    }
    case "chebyshev": {
      let s = 0;
      for (let i = 0; i < a.length; i += 1) s = Math.max(s, Math.abs(a[i] - b[i]));
      return s;
    }
    case "cosine": {
      let dot = 0;
      let na = 0;
      let nb = 0;
      for (let i = 0; i < a.length; i += 1) {
        dot += a[i] * b[i];
        na += a[i] * a[i];
        nb += b[i] * b[i];
      }
      if (na === 0 || nb === 0) return na === nb ? 0 : 1;
      return Math.max(0, 1 - dot / Math.sqrt(na * nb));
    }
  }
}

export function pairwiseDistances(values: number[][], metric: DistanceMetric): Float64Array {
  const n = values.length;
  const d = new Float64Array(n * n);
  for (let i = 0; i < n; i += 1) {
    for (let j = i + 1; j < n; j += 1) {
      const v = distance(values[i], values[j], metric);
      d[i * n + j] = v;
      d[j * n + i] = v;
    }
  }
  return d;
}

// Lance-Williams update for the distance between cluster k and the union of s and t.
function updateDistance(
  method: LinkageMethod,
  dks: number,
  dkt: number,
  dst: number,
  nk: number,
  ns: number,
  nt: number,
): number {
  switch (method) {
    case "single":
      return Math.min(dks, dkt);
    case "complete":
      return Math.max(dks, dkt);
    case "average":
      return (ns * dks + nt * dkt) / (ns + nt);
    case "weighted":
      return (dks + dkt) / 2;
    case "ward": {
      const total = nk + ns + nt;
      const sq = ((nk + ns) * dks * dks + (nk + nt) * dkt * dkt - nk * dst * dst) / total;
      return Math.sqrt(Math.max(0, sq));
    }
  }
}

/**
 * Agglomerative clustering over a precomputed distance matrix. Cluster ids
 * follow the usual convention: leaves are `0..n-1`, the cluster formed at
 * step `s` is `n + s`. Ties go to the lowest pair of slots.
 */
export function linkage(dist: Float64Array, n: number, method: LinkageMethod): LinkageStep[] {
  const d = Float64Array.from(dist);
  const slotId = Array.from({ length: n }, (_, i) => i);
  const slotSize = new Array<number>(n).fill(1);
  const active = Array.from({ length: n }, (_, i) => i);
  const steps: LinkageStep[] = [];

  while (active.length > 1) {
    let bestA = 0;
    let bestB = 1;
    let best = Infinity;
    for (let a = 0; a < active.length; a += 1) {
      for (let b = a + 1; b < active.length; b += 1) {
        const v = d[active[a] * n + active[b]];
        if (v < best) {
          best = v;
          bestA = a;
          bestB = b;
        }
      }
    }
    const s = active[bestA];
    const t = active[bestB];
    const ns = slotSize[s];
    const nt = slotSize[t];
    const left = Math.min(slotId[s], slotId[t]);
    const right = Math.max(slotId[s], slotId[t]);
    steps.push({ left, right, dist: best, size: ns + nt });

    for (const k of active) {
      if (k === s || k === t) continue;
      const v = updateDistance(method, d[k * n + s], d[k * n + t], best, slotSize[k], ns, nt);
      d[k * n + s] = v;
      d[s * n + k] = v;
    }
    slotId[s] = n + steps.length - 1;
    slotSize[s] = ns + nt;
    active.splice(bestB, 1);
  }
  return steps;
}

/**
 * Reorders the leaves of a dendrogram so that the summed distance between
 * neighbouring leaves is minimal, using only flips of the tree's internal
 * nodes.
 */
export function optimalLeafOrder(steps: LinkageStep[], dist: Float64Array, n: number): number[] {
  if (n === 1) return [0];
  const children = (id: number): [number, number] | undefined => {
    if (id < n) return undefined;
    const st = steps[id - n];
    return [st.left, st.right];
  };

  const leaves: number[][] = [];
  for (let i = 0; i < n; i += 1) leaves[i] = [i];
  for (let s = 0; s < steps.length; s += 1) {
    leaves[n + s] = [...leaves[steps[s].left], ...leaves[steps[s].right]];
  }
  const members = leaves.map((ls) => new Set(ls));

  // leaves of `node` sitting on the opposite side of `i`
  const opposite = (node: number, i: number): number[] => {
    const kids = children(node);
    if (!kids) return [i];
    return members[kids[0]].has(i) ? leaves[kids[1]] : leaves[kids[0]];
  };

  // m[i][j]: cheapest path through the subtree at lca(i, j) starting at i and ending at j
  const m = new Float64Array(n * n);
  for (let s = 0; s < steps.length; s += 1) {
    const { left, right } = steps[s];
    const A = leaves[left];
    const B = leaves[right];
    for (const i of A) {
      const oppI = opposite(left, i);
      const t = new Float64Array(B.length);
      B.forEach((k2, bi) => {
        let best = Infinity;
        for (const k of oppI) {
          const v = m[i * n + k] + dist[k * n + k2];
          if (v < best) best = v;
        }
        t[bi] = best;
      });
      const bIndex = new Map(B.map((b, bi) => [b, bi]));
      for (const j of B) {
        let best = Infinity;
        for (const k2 of opposite(right, j)) {
          const v = t[bIndex.get(k2) ?? 0] + m[k2 * n + j];
          if (v < best) best = v;
        }
        m[i * n + j] = best;
        m[j * n + i] = best;
      }
    }
  }

  const order = (node: number, i: number, j: number): number[] => {
    const kids = children(node);
    if (!kids) return [i];
    const [first, second] = members[kids[0]].has(i) ? kids : [kids[1], kids[0]];
    let best = Infinity;
    let bestK = i;
    let bestK2 = j;
    for (const k of opposite(first, i)) {
      for (const k2 of opposite(second, j)) {
        const v = m[i * n + k] + dist[k * n + k2] + m[k2 * n + j];
        if (v < best) {
          best = v;
          bestK = k;
          bestK2 = k2;
        }
      }
    }
    return [...order(first, i, bestK), ...order(second, bestK2, j)];
  };

  const root = n + steps.length - 1;
  const rootStep = steps[steps.length - 1];
  let best = Infinity;
  let bestI = 0;
  let bestJ = 0;
  for (const i of leaves[rootStep.left]) {
    for (const j of leaves[rootStep.right]) {
      if (m[i * n + j] < best) {
        best = m[i * n + j];
        bestI = i;
        bestJ = j;
      }
    }
  }
  return order(root, bestI, bestJ);
}

/** Row ids of `matrix`, ordered so that similar rows sit next to each other. */
export function orderByLinkage(matrix: NumericMatrix, opts: LinkageOptions = {}): string[] {
  const method = opts.method ?? "ward";
  const metric = opts.metric ?? "euclidean";
  if (!isLinkageMethod(method)) die(`Unknown linkage method '${String(method)}'`);
  if (!isDistanceMetric(metric)) die(`Unknown distance metric '${String(metric)}'`);
  const n = matrix.rows.length;
  if (n < 2) die(`Cannot order ${n} row(s) by linkage clustering; at least two are required`);
  for (const row of matrix.values) {
    if (row.some((v) => !Number.isFinite(v))) die("Cannot order rows containing non-finite values");
  }
  opts.logger?.info(`Ordering ${n} rows by ${method} linkage and ${metric} distances`);
  const dist = pairwiseDistances(matrix.values, metric);
  const steps = linkage(dist, n, method);
  return optimalLeafOrder(steps, dist, n).map((i) => matrix.rows[i]);
}
