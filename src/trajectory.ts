import type { Cell, Obstacle } from "./types";

/**
 * Reduces `x` into `[0, width)`. Unlike `%`, the result is never negative.
 */
export function wrap(x: number, width: number): number {
  return ((x % width) + width) % width;
}

/**
 * Position of `obstacle` at `instant`, assuming constant speed and a fixed
 * lane. Motion off one edge re-enters from the other.
 */
export function project(obstacle: Obstacle, instant: number, width: number): Cell {
  return {
    x: wrap(obstacle.position.x + obstacle.speed * instant, width),
    y: obstacle.position.y,
  };
}

/**
 * Cells an obstacle passes through while moving from its instant-(t−1)
 * position to its instant-t position, both ends included, in the order it
 * crosses them. Follows the direction of motion across the wrap seam and
 * never covers a lane cell twice.
 *
 * @example
 * // speed -3, width 5, at x=4 before the step: [4, 3, 2, 1]
 * sweep({ id: 1, position: { x: 4, y: 0 }, speed: -3 }, 1, 5);
 */
export function sweep(obstacle: Obstacle, instant: number, width: number): Cell[] {
  const start = project(obstacle, instant - 1, width);
  const direction = Math.sign(obstacle.speed);
  const steps = Math.min(Math.abs(obstacle.speed), width - 1);

  const cells: Cell[] = [];
  for (let k = 0; k <= steps; k++) {
    cells.push({ x: wrap(start.x + direction * k, width), y: start.y });
  }
  return cells;
}
