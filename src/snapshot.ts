import type { Cell, Snapshot } from "./types";
import { SnapshotValidationError } from "./errors";

const OBSTACLE_ID = /^[A-Za-z0-9_-]+$/;

function checkCell(field: string, cell: Cell, snapshot: Snapshot): void {
  if (!Number.isInteger(cell.x) || !Number.isInteger(cell.y)) {
    throw new SnapshotValidationError(field, `must have integer coordinates, got (${cell.x}, ${cell.y})`);
  }
  if (cell.x < 0 || cell.x >= snapshot.width || cell.y < 0 || cell.y >= snapshot.laneCount) {
    throw new SnapshotValidationError(
      field,
      `(${cell.x}, ${cell.y}) is outside the ${snapshot.width}x${snapshot.laneCount} grid`
    );
  }
}

/**
 * Rejects snapshots the encoder cannot represent faithfully. Nothing is
 * clamped: an out-of-range finish cell is an error, not a boundary cell.
 *
 * @throws {SnapshotValidationError} naming the first offending field.
 */
export function validateSnapshot(snapshot: Snapshot): void {
  if (!Number.isInteger(snapshot.width) || snapshot.width < 1) {
    throw new SnapshotValidationError("width", `must be a positive integer, got ${snapshot.width}`);
  }
  if (!Number.isInteger(snapshot.laneCount) || snapshot.laneCount < 1) {
    throw new SnapshotValidationError("laneCount", `must be a positive integer, got ${snapshot.laneCount}`);
  }

  checkCell("agent.position", snapshot.agent.position, snapshot);
  checkCell("finish", snapshot.finish, snapshot);

  const [a, b] = snapshot.agent.speedRange;
  if (!Number.isInteger(a) || !Number.isInteger(b)) {
    throw new SnapshotValidationError("agent.speedRange", `must hold integers, got [${a}, ${b}]`);
  }
  if (Math.sign(a) !== Math.sign(b) || a === 0) {
    throw new SnapshotValidationError(
      "agent.speedRange",
      `must not contain zero or change direction, got [${a}, ${b}]`
    );
  }

  const seen = new Set<string>();
  snapshot.obstacles.forEach((obstacle, i) => {
    const id = String(obstacle.id);
    if (!OBSTACLE_ID.test(id)) {
      throw new SnapshotValidationError(
        `obstacles[${i}].id`,
        `must contain only letters, digits, "_" or "-", got "${id}"`
      );
    }
    // PDDL names are case-insensitive.
    const key = id.toLowerCase();
    if (seen.has(key)) {
      throw new SnapshotValidationError(`obstacles[${i}].id`, `duplicates id "${id}"`);
    }
    seen.add(key);
    checkCell(`obstacles[${i}].position`, obstacle.position, snapshot);
    if (!Number.isInteger(obstacle.speed)) {
      throw new SnapshotValidationError(`obstacles[${i}].speed`, `must be an integer, got ${obstacle.speed}`);
    }
  });
}

/**
 * Allowed forward speed magnitudes for a signed range, ascending.
 *
 * @example
 * speedMagnitudes([-3, -1]); // [1, 2, 3]
 */
export function speedMagnitudes(range: readonly [number, number]): number[] {
  const lo = Math.min(Math.abs(range[0]), Math.abs(range[1]));
  const hi = Math.max(Math.abs(range[0]), Math.abs(range[1]));
  const speeds: number[] = [];
  for (let s = lo; s <= hi; s++) {
    speeds.push(s);
  }
  return speeds;
}

/**
 * Number of future instants modelled: enough for an entity moving at
 * `minSpeedMagnitude` to cross the whole grid, plus one.
 *
 * @throws {RangeError} if `minSpeedMagnitude` is below 1.
 */
export function computeHorizon(width: number, minSpeedMagnitude: number): number {
  if (minSpeedMagnitude < 1) {
    throw new RangeError(`Minimum speed magnitude must be at least 1, got ${minSpeedMagnitude}`);
  }
  return Math.ceil(width / minSpeedMagnitude) + 1;
}
