import { predecessorsOf } from "@/lib/domain/prereq-graph";
import type { DisciplineId, DisciplineRecommendation, EnrollmentRecord, PrereqGraph } from "@/types/curriculum";

export function completedSet(enrollments: readonly EnrollmentRecord[]): Set<DisciplineId> {
  return new Set(enrollments.filter((record) => record.status === "completed").map((record) => record.disciplineId));
}

/**
 * Disciplines the student can enroll in now: not completed, with every direct prerequisite completed.
 * Fewer prerequisites first.
 */
export function recommendDisciplines(graph: PrereqGraph, completed: ReadonlySet<DisciplineId>): DisciplineRecommendation[] {
  const recommendations: DisciplineRecommendation[] = [];

  for (const node of graph.nodes.values()) {
    if (completed.has(node.id)) {
      continue;
    }
    const prereqs = [...predecessorsOf(graph, node.id)].sort((a, b) => a - b);
    if (prereqs.every((prereq) => completed.has(prereq))) {
      recommendations.push({ id: node.id, name: node.name, prereqs });
    }
  }

  return recommendations.sort((a, b) => a.prereqs.length - b.prereqs.length || a.id - b.id);
}
