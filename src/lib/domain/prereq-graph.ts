import type {
  CurriculumSnapshot,
  DisciplineId,
  GraphView,
  PrereqGraph,
  PrereqGraphEdge,
  PrereqGraphNode
} from "@/types/curriculum";

type BuildGraphInput = CurriculumSnapshot;

interface MutableGraph {
  nodes: Map<DisciplineId, PrereqGraphNode>;
  outgoing: Map<DisciplineId, DisciplineId[]>;
  incoming: Map<DisciplineId, DisciplineId[]>;
}

function createGraph(): MutableGraph {
  return { nodes: new Map(), outgoing: new Map(), incoming: new Map() };
}

function addNode(graph: MutableGraph, node: PrereqGraphNode): void {
  if (graph.nodes.has(node.id)) {
    return;
  }
  graph.nodes.set(node.id, node);
  graph.outgoing.set(node.id, []);
  graph.incoming.set(node.id, []);
}

function addEdge(graph: MutableGraph, from: DisciplineId, to: DisciplineId): void {
  const successors = graph.outgoing.get(from) ?? [];
  if (successors.includes(to)) {
    return;
  }
  successors.push(to);
  graph.outgoing.set(from, successors);

  const predecessors = graph.incoming.get(to) ?? [];
  predecessors.push(from);
  graph.incoming.set(to, predecessors);
}

function placeholderNode(id: DisciplineId): PrereqGraphNode {
  return { id, name: String(id), placeholder: true };
}

/**
 * Builds the prerequisite graph with one edge `prerequisite -> discipline` per relation row.
 * Edge endpoints that are not in the catalog become placeholder nodes named after their id.
 */
export function buildPrereqGraph({ disciplines, prerequisites }: BuildGraphInput): PrereqGraph {
  const graph = createGraph();

  for (const discipline of disciplines) {
    addNode(graph, { id: discipline.id, name: discipline.name, placeholder: false });
  }

  for (const { disciplineId, prerequisiteId } of prerequisites) {
    if (disciplineId === null || prerequisiteId === null) {
      continue;
    }
    addNode(graph, placeholderNode(prerequisiteId));
    addNode(graph, placeholderNode(disciplineId));
    addEdge(graph, prerequisiteId, disciplineId);
  }

  return graph;
}

export function graphNodeIds(graph: PrereqGraph): DisciplineId[] {
  return [...graph.nodes.keys()];
}

export function graphEdges(graph: PrereqGraph): PrereqGraphEdge[] {
  const edges: PrereqGraphEdge[] = [];
  for (const [from, successors] of graph.outgoing) {
    for (const to of successors) {
      edges.push({ from, to });
    }
  }
  return edges;
}

export function successorsOf(graph: PrereqGraph, id: DisciplineId): readonly DisciplineId[] {
  return graph.outgoing.get(id) ?? [];
}

export function predecessorsOf(graph: PrereqGraph, id: DisciplineId): readonly DisciplineId[] {
  return graph.incoming.get(id) ?? [];
}

function filterGraph(graph: PrereqGraph, keep: (id: DisciplineId) => boolean): PrereqGraph {
  const filtered = createGraph();
  for (const node of graph.nodes.values()) {
    if (keep(node.id)) {
      addNode(filtered, node);
    }
  }
  for (const { from, to } of graphEdges(graph)) {
    if (filtered.nodes.has(from) && filtered.nodes.has(to)) {
      addEdge(filtered, from, to);
    }
  }
  return filtered;
}

/** Nodes of `ids` that exist in the graph, with only the edges running between them. */
export function inducedSubgraph(graph: PrereqGraph, ids: Iterable<DisciplineId>): PrereqGraph {
  const wanted = new Set(ids);
  return filterGraph(graph, (id) => wanted.has(id));
}

export function removeNodes(graph: PrereqGraph, ids: Iterable<DisciplineId>): PrereqGraph {
  const removed = new Set(ids);
  return filterGraph(graph, (id) => !removed.has(id));
}

export function toGraphView(graph: PrereqGraph): GraphView {
  return {
    nodes: [...graph.nodes.values()].map((node) => ({ id: node.id, name: node.name })),
    edges: graphEdges(graph)
  };
}
