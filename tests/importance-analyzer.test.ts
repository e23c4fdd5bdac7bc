import { describe, expect, it } from "vitest";

import { analyzeImportance, betweennessCentrality, countDescendants } from "@/lib/domain/importance-analyzer";
import { buildPrereqGraph } from "@/lib/domain/prereq-graph";
import type { DisciplineId } from "@/types/curriculum";

function graphFrom(ids: DisciplineId[], edges: Array<[DisciplineId, DisciplineId]>, names: string[] = []) {
  return buildPrereqGraph({
    disciplines: ids.map((id, index) => ({ id, name: names[index] ?? `D${id}` })),
    prerequisites: edges.map(([from, to]) => ({ prerequisiteId: from, disciplineId: to }))
  });
}

describe("importance analyzer", () => {
  it("ranks the root of a chain first", () => {
    const graph = graphFrom(
      [1, 2, 3],
      [
        [1, 2],
        [2, 3]
      ],
      ["A", "B", "C"]
    );

    expect(analyzeImportance(graph)).toEqual([
      { id: 1, name: "A", outDegree: 1, descendants: 2, betweenness: 0 },
      { id: 2, name: "B", outDegree: 1, descendants: 1, betweenness: 0.5 },
      { id: 3, name: "C", outDegree: 0, descendants: 0, betweenness: 0 }
    ]);
  });

  it("splits betweenness between parallel shortest paths", () => {
    const graph = graphFrom([1, 2, 3, 4], [
      [1, 2],
      [1, 3],
      [2, 4],
      [3, 4]
    ]);
    const scores = betweennessCentrality(graph);

    expect(scores.get(1)).toBe(0);
    expect(scores.get(2)).toBeCloseTo(1 / 12, 10);
    expect(scores.get(3)).toBeCloseTo(1 / 12, 10);
    expect(scores.get(4)).toBe(0);
    expect(analyzeImportance(graph).map((metric) => metric.id)).toEqual([1, 2, 3, 4]);
  });

  it("counts transitive descendants once even when reachable by several paths", () => {
    const graph = graphFrom([1, 2, 3, 4], [
      [1, 2],
      [1, 3],
      [2, 4],
      [3, 4]
    ]);

    expect(countDescendants(graph, 1)).toBe(3);
    expect(countDescendants(graph, 4)).toBe(0);
  });

  it("scores zero betweenness when there are no edges", () => {
    const graph = graphFrom([3, 1, 2], []);

    expect(analyzeImportance(graph)).toEqual([
      { id: 1, name: "D1", outDegree: 0, descendants: 0, betweenness: 0 },
      { id: 2, name: "D2", outDegree: 0, descendants: 0, betweenness: 0 },
      { id: 3, name: "D3", outDegree: 0, descendants: 0, betweenness: 0 }
    ]);
  });

  it("keeps a new terminal sink below every node that unlocks something", () => {
    const graph = graphFrom([1, 2, 3, 4], [
      [1, 2],
      [2, 3]
    ]);
    const ranking = analyzeImportance(graph);
    const sinkIndex = ranking.findIndex((metric) => metric.id === 4);

    ranking.forEach((metric, index) => {
      if (metric.descendants > 0) {
        expect(index).toBeLessThan(sinkIndex);
      }
    });
    expect(ranking.map((metric) => metric.id)).toEqual([1, 2, 3, 4]);
    expect(ranking[1].betweenness).toBeCloseTo(1 / 6, 10);
  });

  it("returns an empty ranking for an empty graph", () => {
    expect(analyzeImportance(graphFrom([], []))).toEqual([]);
  });
});
