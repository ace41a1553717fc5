import { die } from "./util.js";

type TreeNode = {
  name?: string;
  children: Array<{ node: TreeNode; length: number }>;
  x: number;
  y: number;
};

export type NjTree = {
  /** Leaf ids from top to bottom of the drawing; leaf `i` sits at y = i. */
  leafOrder: string[];
  /** Branch segments, `null` separates consecutive segments. */
  x: Array<number | null>;
  y: Array<number | null>;
  text: string[];
  /** Dotted lines carrying each tip out to the right edge of the tree. */
  extensionX: Array<number | null>;
  extensionY: Array<number | null>;
  maxX: number;
};

function fmt(v: number): string {
  return Number(v.toPrecision(4)).toString();
}

/**
 * Neighbor-joining (Saitou & Nei) over a square distance table, rooted at the
 * final join and laid out as a rectangular cladogram with branch lengths on x.
 */
export function makeNjTree(ids: readonly string[], distances: readonly (readonly number[])[]): NjTree {
  const n = ids.length;
  if (n < 2) die(`A tree needs at least two members, got ${n}`);
  if (distances.length !== n || distances.some((r) => r.length !== n)) {
    die(`Distance table must be ${n}x${n}`);
  }

  const d = new Map<TreeNode, Map<TreeNode, number>>();
  const dist = (a: TreeNode, b: TreeNode): number => (a === b ? 0 : d.get(a)?.get(b) ?? 0);
  const setDist = (a: TreeNode, b: TreeNode, v: number): void => {
    if (!d.has(a)) d.set(a, new Map());
    if (!d.has(b)) d.set(b, new Map());
    d.get(a)?.set(b, v);
    d.get(b)?.set(a, v);
  };

  const active: TreeNode[] = ids.map((name) => ({ name, children: [], x: 0, y: 0 }));
  for (let i = 0; i < n; i += 1) {
    for (let j = i + 1; j < n; j += 1) setDist(active[i], active[j], distances[i][j]);
  }

  while (active.length > 2) {
    const r = active.length;
    const sums = active.map((a) => active.reduce((s, b) => s + dist(a, b), 0));
    let bi = 0;
    let bj = 1;
    let best = Infinity;
    for (let i = 0; i < r; i += 1) {
      for (let j = i + 1; j < r; j += 1) {
        const q = (r - 2) * dist(active[i], active[j]) - sums[i] - sums[j];
        if (q < best) {
          best = q;
          bi = i;
          bj = j;
        }
      }
    }
    const a = active[bi];
    const b = active[bj];
    const dab = dist(a, b);
    const la = Math.max(0, dab / 2 + (sums[bi] - sums[bj]) / (2 * (r - 2)));
    const lb = Math.max(0, dab - la);
    const u: TreeNode = { children: [{ node: a, length: la }, { node: b, length: lb }], x: 0, y: 0 };
    for (const k of active) {
      if (k === a || k === b) continue;
      setDist(u, k, (dist(a, k) + dist(b, k) - dab) / 2);
    }
    active.splice(bj, 1);
    active.splice(bi, 1);
    active.push(u);
  }

  const [p, q] = active;
  const half = Math.max(0, dist(p, q)) / 2;
  const root: TreeNode = { children: [{ node: p, length: half }, { node: q, length: half }], x: 0, y: 0 };

  const leafOrder: string[] = [];
  const place = (node: TreeNode, x: number): void => {
    node.x = x;
    if (node.children.length === 0) {
      node.y = leafOrder.length;
      leafOrder.push(node.name ?? "");
      return;
    }
    for (const c of node.children) place(c.node, x + c.length);
    node.y = node.children.reduce((s, c) => s + c.node.y, 0) / node.children.length;
  };
  place(root, 0);

  const xs: Array<number | null> = [];
  const ys: Array<number | null> = [];
  const text: string[] = [];
  const tips: TreeNode[] = [];
  let maxX = 0;
  const draw = (node: TreeNode): void => {
    maxX = Math.max(maxX, node.x);
    if (node.children.length === 0) {
      tips.push(node);
      return;
    }
    const kidYs = node.children.map((c) => c.node.y);
    xs.push(node.x, node.x, null);
    ys.push(Math.min(...kidYs), Math.max(...kidYs), null);
    text.push("", "", "");
    for (const c of node.children) {
      xs.push(node.x, c.node.x, null);
      ys.push(c.node.y, c.node.y, null);
      const hover = c.node.name !== undefined ? c.node.name : `Branch length: ${fmt(c.length)}`;
      text.push(hover, hover, "");
      draw(c.node);
    }
  };
  draw(root);

  const extensionX: Array<number | null> = [];
  const extensionY: Array<number | null> = [];
  for (const t of tips) {
    if (t.x >= maxX) continue;
    extensionX.push(t.x, maxX, null);
    extensionY.push(t.y, t.y, null);
  }

  return { leafOrder, x: xs, y: ys, text, extensionX, extensionY, maxX };
}
