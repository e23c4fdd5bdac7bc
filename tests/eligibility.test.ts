import { readFileSync } from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";

import { completedSet, recommendDisciplines } from "@/lib/domain/eligibility";
import { buildPrereqGraph, predecessorsOf } from "@/lib/domain/prereq-graph";
import type { CurriculumSnapshot, DisciplineRecord, PrerequisiteRecord } from "@/types/curriculum";

const chain: CurriculumSnapshot = {
  disciplines: [
    { id: 1, name: "A" },
    { id: 2, name: "B" },
    { id: 3, name: "C" }
  ],
  prerequisites: [
    { disciplineId: 2, prerequisiteId: 1 },
    { disciplineId: 3, prerequisiteId: 2 }
  ]
};

function readSample<T>(file: string): T {
  return JSON.parse(readFileSync(path.join(process.cwd(), "data/curriculum", file), "utf8")) as T;
}

describe("eligibility recommender", () => {
  it("unlocks only the next discipline of a chain", () => {
    const graph = buildPrereqGraph(chain);

    expect(recommendDisciplines(graph, new Set([1]))).toEqual([{ id: 2, name: "B", prereqs: [1] }]);
  });

  it("treats disciplines without prerequisites as eligible until completed", () => {
    const graph = buildPrereqGraph(chain);

    expect(recommendDisciplines(graph, new Set())).toEqual([{ id: 1, name: "A", prereqs: [] }]);
    expect(recommendDisciplines(graph, new Set([1, 2, 3]))).toEqual([]);
  });

  it("lists disciplines with fewer prerequisites first", () => {
    const graph = buildPrereqGraph({
      disciplines: [
        { id: 1, name: "A" },
        { id: 2, name: "B" },
        { id: 3, name: "C" },
        { id: 4, name: "D" },
        { id: 5, name: "E" }
      ],
      prerequisites: [
        { disciplineId: 3, prerequisiteId: 2 },
        { disciplineId: 3, prerequisiteId: 1 },
        { disciplineId: 4, prerequisiteId: 1 }
      ]
    });

    expect(recommendDisciplines(graph, new Set([1, 2]))).toEqual([
      { id: 5, name: "E", prereqs: [] },
      { id: 4, name: "D", prereqs: [1] },
      { id: 3, name: "C", prereqs: [1, 2] }
    ]);
  });

  it("counts only completed records as completed", () => {
    const completed = completedSet([
      { studentId: 1, disciplineId: 1, status: "completed" },
      { studentId: 1, disciplineId: 2, status: "in_progress" },
      { studentId: 1, disciplineId: 3, status: "pending" }
    ]);

    expect([...completed]).toEqual([1]);
  });

  it("never recommends a discipline with an unmet prerequisite in the sample curriculum", () => {
    const graph = buildPrereqGraph({
      disciplines: readSample<DisciplineRecord[]>("disciplines.json"),
      prerequisites: readSample<PrerequisiteRecord[]>("prerequisites.json")
    });
    const completedSets = [new Set<number>(), new Set([1]), new Set([1, 2, 5]), new Set([1, 2, 3, 4, 7, 8])];

    for (const completed of completedSets) {
      for (const recommendation of recommendDisciplines(graph, completed)) {
        expect(completed.has(recommendation.id)).toBe(false);
        expect(predecessorsOf(graph, recommendation.id).every((id) => completed.has(id))).toBe(true);
      }
    }
  });
});
