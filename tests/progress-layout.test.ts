import { describe, expect, it } from "vitest";

import { buildPrereqGraph } from "@/lib/domain/prereq-graph";
import { buildProgressView, createSeededRandom, springLayout } from "@/lib/domain/progress-layout";
import type { DisciplineId, EnrollmentStatus } from "@/types/curriculum";

const chain = {
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

describe("progress layout", () => {
  it("maps every node to its status, falling back to not_associated", () => {
    const graph = buildPrereqGraph(chain);
    const statusMap = new Map<DisciplineId, EnrollmentStatus>([
      [1, "completed"],
      [2, "in_progress"]
    ]);

    const view = buildProgressView(graph, statusMap);

    expect(view.statuses).toEqual({ 1: "completed", 2: "in_progress", 3: "not_associated" });
    expect(view.labels).toEqual({ 1: "A", 2: "B", 3: "C" });
    expect(Object.keys(view.positions)).toEqual(["1", "2", "3"]);
  });

  it("keeps pending distinct from not_associated", () => {
    const graph = buildPrereqGraph(chain);
    const view = buildProgressView(graph, new Map<DisciplineId, EnrollmentStatus>([[3, "pending"]]));

    expect(view.statuses[3]).toBe("pending");
    expect(view.statuses[1]).toBe("not_associated");
  });

  it("produces identical coordinates for identical topologies", () => {
    const first = springLayout(buildPrereqGraph(chain));
    const second = springLayout(
      buildPrereqGraph({
        disciplines: [...chain.disciplines].reverse(),
        prerequisites: [...chain.prerequisites].reverse()
      })
    );

    expect([...second.entries()].sort(([a], [b]) => a - b)).toEqual([...first.entries()].sort(([a], [b]) => a - b));
  });

  it("changes the layout when the seed changes", () => {
    const graph = buildPrereqGraph(chain);

    expect(springLayout(graph, { seed: 7 }).get(1)).not.toEqual(springLayout(graph, { seed: 42 }).get(1));
  });

  it("centres the layout and scales it into the unit box", () => {
    const layout = springLayout(buildPrereqGraph(chain));
    const points = [...layout.values()];
    const largest = Math.max(...points.flatMap(([x, y]) => [Math.abs(x), Math.abs(y)]));

    expect(largest).toBeCloseTo(1, 10);
    expect(points.reduce((sum, [x]) => sum + x, 0)).toBeCloseTo(0, 10);
    expect(points.reduce((sum, [, y]) => sum + y, 0)).toBeCloseTo(0, 10);
  });

  it("places a lone discipline at the origin", () => {
    const graph = buildPrereqGraph({ disciplines: [{ id: 4, name: "D" }], prerequisites: [] });

    expect(buildProgressView(graph, new Map()).positions).toEqual({ 4: [0, 0] });
  });

  it("returns empty mappings for an empty graph", () => {
    const graph = buildPrereqGraph({ disciplines: [], prerequisites: [] });

    expect(buildProgressView(graph, new Map())).toEqual({ positions: {}, statuses: {}, labels: {} });
  });

  it("repeats the same pseudo-random sequence for the same seed", () => {
    const first = createSeededRandom(42);
    const second = createSeededRandom(42);
    const values = Array.from({ length: 5 }, () => first());

    expect(Array.from({ length: 5 }, () => second())).toEqual(values);
    expect(values.every((value) => value >= 0 && value < 1)).toBe(true);
  });
});
