import type { Cell, GoalCondition } from "./types";
import { sameCell } from "./grid";

/**
 * Goal satisfied when `vehicle` stands on `finish` at any instant from 0 to
 * `horizon` inclusive, letting the planner pick the earliest arrival.
 */
export function buildGoal(finish: Cell, horizon: number, vehicle: string): GoalCondition {
  const instants: number[] = [];
  for (let t = 0; t <= horizon; t++) {
    instants.push(t);
  }
  return { kind: "any-instant", vehicle, cell: finish, instants };
}

/**
 * Checks a goal against a position history, where `history[t]` is the
 * vehicle's cell at instant `t`.
 */
export function isGoalSatisfied(goal: GoalCondition, history: ReadonlyArray<Cell>): boolean {
  return goal.instants.some((t) => {
    const cell = history[t];
    return cell !== undefined && sameCell(cell, goal.cell);
  });
}
