/**
 * Checks that the package entry point exposes a usable public surface.
 */

import {
  createCrossingPlanner,
  encodeSnapshot,
  isGoalSatisfied,
  parsePlan,
  serializeDomain,
  serializeProblem,
  translatePlan,
  SnapshotValidationError,
} from "../index";
import type { EnvironmentAction, PlanningResult, Snapshot } from "../index";

const snapshot: Snapshot = {
  width: 4,
  laneCount: 2,
  agent: { position: { x: 3, y: 1 }, speedRange: [-2, -1] },
  obstacles: [{ id: "truck", position: { x: 1, y: 0 }, speed: -2 }],
  finish: { x: 0, y: 0 },
};

describe("public API", () => {
  it("encodes, serializes and reads back a plan", () => {
    const encoding = encodeSnapshot(snapshot);

    expect(serializeDomain(encoding.domain).startsWith("(define (domain grid_world)\n")).toBe(true);
    expect(serializeProblem(encoding.problem)).toContain("    cartruck - car\n");

    const actions: EnvironmentAction[] = translatePlan(parsePlan("(up pt3pt1 pt2pt0 0 1)\n"));
    expect(actions).toEqual([{ type: "up" }]);
  });

  it("exposes the goal check", () => {
    const { goal } = encodeSnapshot(snapshot);

    expect(isGoalSatisfied(goal, [{ x: 3, y: 1 }, { x: 0, y: 0 }])).toBe(true);
  });

  it("narrows planning results on failure", async () => {
    const result: PlanningResult = await createCrossingPlanner({
      runner: async () => ({ exitCode: 12, stdout: "", stderr: "" }),
    }).plan(snapshot);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.reason).toBe("UNSOLVABLE");
  });

  it("exports the error classes", () => {
    expect(() => encodeSnapshot({ ...snapshot, laneCount: 0 })).toThrow(SnapshotValidationError);
  });
});
