import type { BlockedFact, Cell, Obstacle, OccupantFact, PlannerHooks } from "./types";
import type { GridIndex } from "./grid";
import { cellName, sameCell } from "./grid";
import { project, sweep } from "./trajectory";

export interface OccupancyOptions {
  grid: GridIndex;
  obstacles: ReadonlyArray<Obstacle>;
  /** Instants `0 .. horizon - 1` are modelled. */
  horizon: number;
  /**
   * Cell that stays free at instant 0 even if an obstacle sits on it:
   * the agent's starting cell.
   */
  reserved?: Cell;
  hooks?: Pick<PlannerHooks, "onCollision">;
}

/**
 * Which cells are blocked, and by whom, at every modelled instant.
 * For every instant, `blockedAt(t)` and `freeAt(t)` partition the grid.
 */
export interface OccupancyTimeline {
  readonly horizon: number;
  /** Occupant facts in derivation order (instant, then obstacle order). */
  readonly occupants: ReadonlyArray<OccupantFact>;
  /** Blocked facts in derivation order (instant, then obstacle order). */
  readonly blockedFacts: ReadonlyArray<BlockedFact>;
  isBlocked(cell: Cell, instant: number): boolean;
  isFree(cell: Cell, instant: number): boolean;
  /** Blocked cells at `instant`, in grid order. */
  blockedAt(instant: number): Cell[];
  /** Free cells at `instant`, in grid order. */
  freeAt(instant: number): Cell[];
  /** Name of the vehicle holding `cell` at `instant`, if any. */
  ownerAt(cell: Cell, instant: number): string | undefined;
}

/** Object name of an obstacle in the encoding. */
export function obstacleName(obstacle: Obstacle): string {
  return `car${obstacle.id}`;
}

/**
 * Projects every obstacle over the horizon and records the cells it holds.
 *
 * Claims are first-writer-wins per instant: when two obstacles reach the
 * same cell at the same instant, only the one listed first in `obstacles`
 * gets the fact, and `onCollision` reports the other. Obstacles faster
 * than one cell per instant also block every cell they sweep through on
 * their way, starting from the cell they left.
 */
export function buildOccupancyTimeline(options: OccupancyOptions): OccupancyTimeline {
  const { grid, obstacles, horizon, reserved, hooks } = options;

  if (!Number.isInteger(horizon) || horizon < 1) {
    throw new RangeError(`Horizon must be a positive integer, got ${horizon}`);
  }

  const claims: Array<Map<string, string>> = [];
  for (let t = 0; t < horizon; t++) {
    claims.push(new Map());
  }
  const occupants: OccupantFact[] = [];
  const blockedFacts: BlockedFact[] = [];

  const claim = (cell: Cell, instant: number, vehicle: string, occupied: boolean): void => {
    if (instant === 0 && reserved !== undefined && sameCell(cell, reserved)) {
      return;
    }
    const held = claims[instant];
    const key = cellName(cell);
    const owner = held.get(key);
    if (owner !== undefined) {
      if (owner !== vehicle) {
        hooks?.onCollision?.(cell, instant, owner, vehicle);
      }
      return;
    }
    held.set(key, vehicle);
    blockedFacts.push({ cell, instant });
    if (occupied) {
      occupants.push({ cell, instant, vehicle });
    }
  };

  for (const obstacle of obstacles) {
    claim(obstacle.position, 0, obstacleName(obstacle), true);
  }

  for (let t = 1; t < horizon; t++) {
    for (const obstacle of obstacles) {
      const vehicle = obstacleName(obstacle);
      const target = project(obstacle, t, grid.width);
      claim(target, t, vehicle, true);
      if (Math.abs(obstacle.speed) > 1) {
        for (const passed of sweep(obstacle, t, grid.width)) {
          if (!sameCell(passed, target)) {
            claim(passed, t, vehicle, false);
          }
        }
      }
    }
  }

  const checkInstant = (instant: number): Map<string, string> => {
    const held = claims[instant];
    if (!Number.isInteger(instant) || held === undefined) {
      throw new RangeError(`Instant ${instant} is outside [0, ${horizon})`);
    }
    return held;
  };

  const isBlocked = (cell: Cell, instant: number): boolean =>
    checkInstant(instant).has(cellName(cell));

  return {
    horizon,
    occupants: Object.freeze(occupants),
    blockedFacts: Object.freeze(blockedFacts),
    isBlocked,
    isFree: (cell, instant) => !isBlocked(cell, instant),
    blockedAt: (instant) => grid.cells.filter((cell) => isBlocked(cell, instant)),
    freeAt: (instant) => grid.cells.filter((cell) => !isBlocked(cell, instant)),
    ownerAt: (cell, instant) => checkInstant(instant).get(cellName(cell)),
  };
}
