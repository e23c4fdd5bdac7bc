import { graphNodeIds, successorsOf } from "@/lib/domain/prereq-graph";
import type { DisciplineId, ImportanceMetric, PrereqGraph } from "@/types/curriculum";

/** Number of disciplines reachable from `id` following prerequisite edges forward. */
export function countDescendants(graph: PrereqGraph, id: DisciplineId): number {
  const visited = new Set<DisciplineId>([id]);
  const queue: DisciplineId[] = [id];
  let reached = 0;

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) {
      break;
    }
    for (const next of successorsOf(graph, current)) {
      if (visited.has(next)) {
        continue;
      }
      visited.add(next);
      reached += 1;
      queue.push(next);
    }
  }

  return reached;
}

/**
 * Brandes' betweenness centrality for an unweighted directed graph, normalized by 1 / ((n - 1)(n - 2)).
 * Graphs with fewer than three nodes score zero everywhere.
 */
export function betweennessCentrality(graph: PrereqGraph): Map<DisciplineId, number> {
  const nodes = graphNodeIds(graph);
  const scores = new Map<DisciplineId, number>(nodes.map((id) => [id, 0]));

  for (const source of nodes) {
    const stack: DisciplineId[] = [];
    const predecessors = new Map<DisciplineId, DisciplineId[]>();
    const pathCount = new Map<DisciplineId, number>([[source, 1]]);
    const distance = new Map<DisciplineId, number>([[source, 0]]);
    const queue: DisciplineId[] = [source];

    while (queue.length > 0) {
      const v = queue.shift();
      if (v === undefined) {
        break;
      }
      stack.push(v);
      const distanceV = distance.get(v) ?? 0;
      const pathsV = pathCount.get(v) ?? 0;

      for (const w of successorsOf(graph, v)) {
        if (!distance.has(w)) {
          distance.set(w, distanceV + 1);
          queue.push(w);
        }
        if (distance.get(w) === distanceV + 1) {
          pathCount.set(w, (pathCount.get(w) ?? 0) + pathsV);
          const preds = predecessors.get(w) ?? [];
          preds.push(v);
          predecessors.set(w, preds);
        }
      }
    }

    const dependency = new Map<DisciplineId, number>();
    while (stack.length > 0) {
      const w = stack.pop();
      if (w === undefined) {
        break;
      }
      const dependencyW = dependency.get(w) ?? 0;
      const pathsW = pathCount.get(w) ?? 1;
      for (const v of predecessors.get(w) ?? []) {
        const share = ((pathCount.get(v) ?? 0) / pathsW) * (1 + dependencyW);
        dependency.set(v, (dependency.get(v) ?? 0) + share);
      }
      if (w !== source) {
        scores.set(w, (scores.get(w) ?? 0) + dependencyW);
      }
    }
  }

  const n = nodes.length;
  if (n > 2) {
    const scale = 1 / ((n - 1) * (n - 2));
    for (const [id, score] of scores) {
      scores.set(id, score * scale);
    }
  }

  return scores;
}

/**
 * Ranks disciplines by how much of the curriculum they unlock: transitive descendants first,
 * betweenness as tie-break, then ascending id.
 */
export function analyzeImportance(graph: PrereqGraph): ImportanceMetric[] {
  if (graph.nodes.size === 0) {
    return [];
  }

  const betweenness = betweennessCentrality(graph);
  const metrics: ImportanceMetric[] = [...graph.nodes.values()].map((node) => ({
    id: node.id,
    name: node.name,
    outDegree: successorsOf(graph, node.id).length,
    descendants: countDescendants(graph, node.id),
    betweenness: betweenness.get(node.id) ?? 0
  }));

  return metrics.sort(
    (a, b) => b.descendants - a.descendants || b.betweenness - a.betweenness || a.id - b.id
  );
}
