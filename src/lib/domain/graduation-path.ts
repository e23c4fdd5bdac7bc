import { topologicalOrder } from "@/lib/domain/cycle-detector";
import { inducedSubgraph, removeNodes } from "@/lib/domain/prereq-graph";
import type { DisciplineId, GraduationPathReport, PrereqGraph } from "@/types/curriculum";

/**
 * Orders the required disciplines the student still has to take.
 *
 * Only the required set is considered: ids missing from the catalog are dropped, and prerequisites outside
 * the required set do not constrain the order. A cycle among the remaining disciplines makes the plan
 * infeasible and yields an empty path.
 */
export function planGraduationPathReport(
  graph: PrereqGraph,
  completed: ReadonlySet<DisciplineId>,
  requiredIds: Iterable<DisciplineId>
): GraduationPathReport {
  const required = [...new Set(requiredIds)];
  const droppedIds = required.filter((id) => !graph.nodes.has(id)).sort((a, b) => a - b);

  const remaining = removeNodes(inducedSubgraph(graph, required), completed);
  const order = topologicalOrder(remaining);
  if (order === null) {
    return { path: [], feasible: false, droppedIds };
  }

  return { path: order, feasible: true, droppedIds };
}

export function planGraduationPath(
  graph: PrereqGraph,
  completed: ReadonlySet<DisciplineId>,
  requiredIds: Iterable<DisciplineId>
): DisciplineId[] {
  return planGraduationPathReport(graph, completed, requiredIds).path;
}
