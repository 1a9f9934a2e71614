import type { Cell, MoveKind, TransitionFact } from "./types";
import type { GridIndex } from "./grid";
import type { OccupancyTimeline } from "./occupancy";

/** What {@link nextCell} needs to know about the world. */
export interface TransitionContext {
  grid: GridIndex;
  timeline: OccupancyTimeline;
}

/**
 * Every move kind available to an agent with the given forward speeds:
 * `LATERAL_UP`, `LATERAL_DOWN`, then one `FORWARD` per speed in the order
 * given.
 */
export function moveKinds(speeds: ReadonlyArray<number>): MoveKind[] {
  return [
    { kind: "LATERAL_UP" },
    { kind: "LATERAL_DOWN" },
    ...speeds.map((speed): MoveKind => ({ kind: "FORWARD", speed })),
  ];
}

/**
 * Cell the agent ends up in after taking `move` from `cell` so as to arrive
 * at `instant`.
 *
 * Lateral moves also advance one column (none at x = 0) and stay in the
 * lane at the top or bottom edge. A lateral move whose target is blocked at
 * `instant` degrades to the same advance within the current lane, so every
 * cell and instant has a destination for every move.
 *
 * Forward moves ignore occupancy: the destination is arithmetic, with the
 * left edge as a sink. Whether it is blocked is left to the action
 * precondition.
 */
export function nextCell(cell: Cell, move: MoveKind, instant: number, context: TransitionContext): Cell {
  const { grid, timeline } = context;

  switch (move.kind) {
    case "LATERAL_UP":
    case "LATERAL_DOWN": {
      const x = Math.max(0, cell.x - 1);
      const y =
        move.kind === "LATERAL_UP"
          ? Math.max(0, cell.y - 1)
          : Math.min(grid.laneCount - 1, cell.y + 1);
      const target = grid.cellAt(x, y);
      return timeline.isFree(target, instant) ? target : grid.cellAt(x, cell.y);
    }
    case "FORWARD":
      return grid.cellAt(Math.max(0, cell.x - move.speed), cell.y);
  }
}

/**
 * The full transition table: every cell, every instant in `[1, horizon)`,
 * every move kind. Not pruned by reachability.
 *
 * Ordered by instant, then cell (grid order), then move kind.
 */
export function generateTransitions(
  context: TransitionContext,
  speeds: ReadonlyArray<number>
): TransitionFact[] {
  const moves = moveKinds(speeds);
  const facts: TransitionFact[] = [];

  for (let instant = 1; instant < context.timeline.horizon; instant++) {
    for (const from of context.grid.cells) {
      for (const move of moves) {
        facts.push({ from, move, to: nextCell(from, move, instant, context), instant });
      }
    }
  }
  return facts;
}
