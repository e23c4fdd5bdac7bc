import { graphEdges, graphNodeIds } from "@/lib/domain/prereq-graph";
import type { DisciplineId, EnrollmentStatus, LayoutPoint, PrereqGraph, ProgressStatus, ProgressView } from "@/types/curriculum";

export const DEFAULT_LAYOUT_SEED = 42;
export const DEFAULT_LAYOUT_ITERATIONS = 50;

const MIN_DISTANCE = 0.01;

export interface SpringLayoutOptions {
  seed?: number;
  iterations?: number;
  scale?: number;
}

/** mulberry32: small deterministic PRNG returning floats in [0, 1). */
export function createSeededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function rescale(points: LayoutPoint[], scale: number): LayoutPoint[] {
  const count = points.length;
  const meanX = points.reduce((sum, [x]) => sum + x, 0) / count;
  const meanY = points.reduce((sum, [, y]) => sum + y, 0) / count;
  const centered = points.map(([x, y]): LayoutPoint => [x - meanX, y - meanY]);
  const limit = centered.reduce((max, [x, y]) => Math.max(max, Math.abs(x), Math.abs(y)), 0);
  if (limit === 0) {
    return centered;
  }
  return centered.map(([x, y]): LayoutPoint => [(x / limit) * scale, (y / limit) * scale]);
}

/**
 * Fruchterman-Reingold spring embedding on the undirected shape of the graph.
 * Nodes are seeded in id order from a fixed PRNG seed, so equal topologies always get equal coordinates.
 */
export function springLayout(graph: PrereqGraph, options: SpringLayoutOptions = {}): Map<DisciplineId, LayoutPoint> {
  const seed = options.seed ?? DEFAULT_LAYOUT_SEED;
  const iterations = options.iterations ?? DEFAULT_LAYOUT_ITERATIONS;
  const scale = options.scale ?? 1;

  const ids = graphNodeIds(graph).sort((a, b) => a - b);
  const count = ids.length;
  if (count === 0) {
    return new Map();
  }
  if (count === 1) {
    return new Map<DisciplineId, LayoutPoint>([[ids[0], [0, 0]]]);
  }

  const indexOf = new Map<DisciplineId, number>(ids.map((id, index) => [id, index]));
  const adjacent: boolean[][] = ids.map(() => ids.map(() => false));
  for (const { from, to } of graphEdges(graph)) {
    const i = indexOf.get(from);
    const j = indexOf.get(to);
    if (i === undefined || j === undefined || i === j) {
      continue;
    }
    adjacent[i][j] = true;
    adjacent[j][i] = true;
  }

  const random = createSeededRandom(seed);
  const xs = ids.map(() => random());
  const ys = ids.map(() => random());

  const k = Math.sqrt(1 / count);
  let temperature = 0.1 * Math.max(Math.max(...xs) - Math.min(...xs), Math.max(...ys) - Math.min(...ys));
  const cooling = temperature / (iterations + 1);

  for (let iteration = 0; iteration < iterations; iteration += 1) {
    const dispX = new Array<number>(count).fill(0);
    const dispY = new Array<number>(count).fill(0);

    for (let i = 0; i < count; i += 1) {
      for (let j = 0; j < count; j += 1) {
        if (i === j) {
          continue;
        }
        const dx = xs[i] - xs[j];
        const dy = ys[i] - ys[j];
        const distance = Math.max(Math.hypot(dx, dy), MIN_DISTANCE);
        const attraction = adjacent[i][j] ? distance / k : 0;
        const force = (k * k) / (distance * distance) - attraction;
        dispX[i] += dx * force;
        dispY[i] += dy * force;
      }
    }

    for (let i = 0; i < count; i += 1) {
      const length = Math.max(Math.hypot(dispX[i], dispY[i]), MIN_DISTANCE);
      xs[i] += (dispX[i] * temperature) / length;
      ys[i] += (dispY[i] * temperature) / length;
    }

    temperature -= cooling;
  }

  const points = rescale(
    ids.map((_, index): LayoutPoint => [xs[index], ys[index]]),
    scale
  );
  return new Map<DisciplineId, LayoutPoint>(ids.map((id, index) => [id, points[index]]));
}

export function resolveProgressStatus(
  statusMap: ReadonlyMap<DisciplineId, EnrollmentStatus>,
  id: DisciplineId
): ProgressStatus {
  return statusMap.get(id) ?? "not_associated";
}

/** Positions, statuses and labels for every node of the graph, keyed by discipline id. */
export function buildProgressView(
  graph: PrereqGraph,
  statusMap: ReadonlyMap<DisciplineId, EnrollmentStatus>,
  options: SpringLayoutOptions = {}
): ProgressView {
  const view: ProgressView = { positions: {}, statuses: {}, labels: {} };
  const layout = springLayout(graph, options);

  for (const node of graph.nodes.values()) {
    view.positions[node.id] = layout.get(node.id) ?? [0, 0];
    view.statuses[node.id] = resolveProgressStatus(statusMap, node.id);
    view.labels[node.id] = node.name;
  }

  return view;
}
