import { graphNodeIds, successorsOf } from "@/lib/domain/prereq-graph";
import type { CycleReport, DisciplineId, PrereqGraph } from "@/types/curriculum";

export const DEFAULT_MAX_CYCLES = 1000;

export interface DetectCyclesOptions {
  maxCycles?: number;
}

function ascending(a: number, b: number): number {
  return a - b;
}

function sortedSuccessors(graph: PrereqGraph, id: DisciplineId): DisciplineId[] {
  return [...successorsOf(graph, id)].sort(ascending);
}

function insertSorted(queue: DisciplineId[], id: DisciplineId): void {
  const index = queue.findIndex((queued) => queued > id);
  if (index === -1) {
    queue.push(id);
    return;
  }
  queue.splice(index, 0, id);
}

/**
 * Kahn's algorithm, always releasing the smallest ready id first.
 * Returns `null` when some nodes can never be released, i.e. the graph has a cycle.
 */
export function topologicalOrder(graph: PrereqGraph): DisciplineId[] | null {
  const remainingInDegree = new Map<DisciplineId, number>();
  const ready: DisciplineId[] = [];

  for (const id of graphNodeIds(graph)) {
    const inDegree = graph.incoming.get(id)?.length ?? 0;
    remainingInDegree.set(id, inDegree);
    if (inDegree === 0) {
      insertSorted(ready, id);
    }
  }

  const order: DisciplineId[] = [];
  while (ready.length > 0) {
    const current = ready.shift();
    if (current === undefined) {
      break;
    }
    order.push(current);
    for (const next of successorsOf(graph, current)) {
      const left = (remainingInDegree.get(next) ?? 0) - 1;
      remainingInDegree.set(next, left);
      if (left === 0) {
        insertSorted(ready, next);
      }
    }
  }

  return order.length === graph.nodes.size ? order : null;
}

export function isAcyclic(graph: PrereqGraph): boolean {
  return topologicalOrder(graph) !== null;
}

/** Tarjan's strongly connected components, restricted to the node ids accepted by `include`. */
export function stronglyConnectedComponents(
  graph: PrereqGraph,
  include: (id: DisciplineId) => boolean = () => true
): DisciplineId[][] {
  let index = 0;
  const stack: DisciplineId[] = [];
  const onStack = new Set<DisciplineId>();
  const indices = new Map<DisciplineId, number>();
  const lowlinks = new Map<DisciplineId, number>();
  const components: DisciplineId[][] = [];

  function strongconnect(v: DisciplineId): void {
    indices.set(v, index);
    lowlinks.set(v, index);
    index += 1;
    stack.push(v);
    onStack.add(v);

    for (const w of sortedSuccessors(graph, v)) {
      if (!include(w)) {
        continue;
      }
      const lowV = lowlinks.get(v) ?? 0;
      const indexW = indices.get(w);
      if (indexW === undefined) {
        strongconnect(w);
        lowlinks.set(v, Math.min(lowV, lowlinks.get(w) ?? lowV));
      } else if (onStack.has(w)) {
        lowlinks.set(v, Math.min(lowV, indexW));
      }
    }

    if (lowlinks.get(v) === indices.get(v)) {
      const component: DisciplineId[] = [];
      let w: DisciplineId | undefined;
      do {
        w = stack.pop();
        if (w === undefined) {
          break;
        }
        onStack.delete(w);
        component.push(w);
      } while (w !== v);
      components.push(component.sort(ascending));
    }
  }

  for (const id of graphNodeIds(graph).sort(ascending)) {
    if (include(id) && !indices.has(id)) {
      strongconnect(id);
    }
  }

  return components;
}

function hasSelfLoop(graph: PrereqGraph, id: DisciplineId): boolean {
  return successorsOf(graph, id).includes(id);
}

/**
 * Enumerates elementary cycles with Johnson's algorithm. Each cycle is rooted at its smallest id
 * and follows edge direction; enumeration stops once `limit` cycles have been collected.
 * Both this search and `strongconnect` recurse, so stack depth grows with the longest path or cycle.
 */
function enumerateElementaryCycles(graph: PrereqGraph, limit: number): { cycles: DisciplineId[][]; truncated: boolean } {
  const cycles: DisciplineId[][] = [];
  let truncated = false;
  const ordered = graphNodeIds(graph).sort(ascending);

  for (const start of ordered) {
    if (truncated) {
      break;
    }

    const component = stronglyConnectedComponents(graph, (id) => id >= start).find((scc) => scc.includes(start));
    if (!component || (component.length === 1 && !hasSelfLoop(graph, start))) {
      continue;
    }

    const members = new Set(component);
    const blocked = new Set<DisciplineId>();
    const blockedBy = new Map<DisciplineId, Set<DisciplineId>>();
    const path: DisciplineId[] = [];

    const unblock = (id: DisciplineId): void => {
      blocked.delete(id);
      const waiting = blockedBy.get(id);
      if (!waiting) {
        return;
      }
      blockedBy.delete(id);
      for (const other of waiting) {
        if (blocked.has(other)) {
          unblock(other);
        }
      }
    };

    const circuit = (v: DisciplineId): boolean => {
      let found = false;
      path.push(v);
      blocked.add(v);

      for (const w of sortedSuccessors(graph, v)) {
        if (truncated) {
          break;
        }
        if (!members.has(w)) {
          continue;
        }
        if (w === start) {
          cycles.push([...path]);
          found = true;
          if (cycles.length >= limit) {
            truncated = true;
          }
        } else if (!blocked.has(w) && circuit(w)) {
          found = true;
        }
      }

      if (found) {
        unblock(v);
      } else {
        for (const w of successorsOf(graph, v)) {
          if (!members.has(w)) {
            continue;
          }
          const waiting = blockedBy.get(w) ?? new Set<DisciplineId>();
          waiting.add(v);
          blockedBy.set(w, waiting);
        }
      }

      path.pop();
      return found;
    };

    circuit(start);
  }

  return { cycles, truncated };
}

function resolveCycleLimit(maxCycles: number | undefined): number {
  if (maxCycles === undefined || !Number.isFinite(maxCycles)) {
    return DEFAULT_MAX_CYCLES;
  }
  return Math.max(1, Math.floor(maxCycles));
}

export function detectCyclesReport(graph: PrereqGraph, options: DetectCyclesOptions = {}): CycleReport {
  if (isAcyclic(graph)) {
    return { acyclic: true, cycles: [], cyclesCount: 0, truncated: false };
  }

  const limit = resolveCycleLimit(options.maxCycles);
  const { cycles, truncated } = enumerateElementaryCycles(graph, limit);
  return { acyclic: false, cycles, cyclesCount: cycles.length, truncated };
}

/** Every elementary cycle of the graph, or `[]` when it admits a topological order. */
export function detectCycles(graph: PrereqGraph, options: DetectCyclesOptions = {}): DisciplineId[][] {
  return detectCyclesReport(graph, options).cycles;
}
