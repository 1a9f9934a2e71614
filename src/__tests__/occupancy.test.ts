import { createGridIndex, cellName } from "../grid";
import { buildOccupancyTimeline } from "../occupancy";
import type { Cell, Obstacle } from "../types";

const names = (cells: Cell[]): string[] => cells.map(cellName);

// ── Slow obstacle ────────────────────────────────────────────────────────────

describe("buildOccupancyTimeline – one obstacle at speed 1", () => {
  const grid = createGridIndex(5, 3);
  const timeline = buildOccupancyTimeline({
    grid,
    obstacles: [{ id: 1, position: { x: 3, y: 1 }, speed: -1 }],
    horizon: 6,
    reserved: { x: 0, y: 0 },
  });

  it("blocks the obstacle's position at every instant", () => {
    expect([0, 1, 2, 3, 4, 5].map((t) => names(timeline.blockedAt(t)))).toEqual([
      ["pt3pt1"],
      ["pt2pt1"],
      ["pt1pt1"],
      ["pt0pt1"],
      ["pt4pt1"],
      ["pt3pt1"],
    ]);
  });

  it("records an occupant fact for each blocked position", () => {
    expect(timeline.occupants.slice(0, 2)).toEqual([
      { cell: { x: 3, y: 1 }, instant: 0, vehicle: "car1" },
      { cell: { x: 2, y: 1 }, instant: 1, vehicle: "car1" },
    ]);
    expect(timeline.occupants).toHaveLength(6);
  });

  it("does not sweep intermediate cells at speed 1", () => {
    expect(timeline.isBlocked({ x: 3, y: 1 }, 1)).toBe(false);
  });

  it("reports the owner of a blocked cell", () => {
    expect(timeline.ownerAt({ x: 1, y: 1 }, 2)).toBe("car1");
    expect(timeline.ownerAt({ x: 1, y: 0 }, 2)).toBeUndefined();
  });
});

// ── Fast obstacle ────────────────────────────────────────────────────────────

describe("buildOccupancyTimeline – sweep of a fast obstacle", () => {
  const grid = createGridIndex(5, 1);
  const timeline = buildOccupancyTimeline({
    grid,
    obstacles: [{ id: 7, position: { x: 4, y: 0 }, speed: -3 }],
    horizon: 3,
  });

  it("blocks every cell passed between two instants, both ends included", () => {
    expect(names(timeline.blockedAt(1))).toEqual(["pt1pt0", "pt2pt0", "pt3pt0", "pt4pt0"]);
    expect(names(timeline.freeAt(1))).toEqual(["pt0pt0"]);
  });

  it("sweeps across the wrap seam", () => {
    expect(names(timeline.blockedAt(2))).toEqual(["pt0pt0", "pt1pt0", "pt3pt0", "pt4pt0"]);
    expect(names(timeline.freeAt(2))).toEqual(["pt2pt0"]);
  });

  it("gives an occupant fact only to the landing cell", () => {
    expect(timeline.occupants.filter((f) => f.instant === 1)).toEqual([
      { cell: { x: 1, y: 0 }, instant: 1, vehicle: "car7" },
    ]);
  });

  it("orders blocked facts landing cell first, then the sweep", () => {
    const atOne = timeline.blockedFacts.filter((f) => f.instant === 1).map((f) => cellName(f.cell));

    expect(atOne).toEqual(["pt1pt0", "pt4pt0", "pt3pt0", "pt2pt0"]);
  });
});

// ── Collisions ───────────────────────────────────────────────────────────────

describe("buildOccupancyTimeline – first writer wins", () => {
  const obstacles: Obstacle[] = [
    { id: "a", position: { x: 2, y: 0 }, speed: -1 },
    { id: "b", position: { x: 3, y: 0 }, speed: -2 },
  ];

  it("keeps the first claim and reports the second through onCollision", () => {
    const collisions: Array<{ cell: string; instant: number; winner: string; loser: string }> = [];
    const timeline = buildOccupancyTimeline({
      grid: createGridIndex(5, 1),
      obstacles,
      horizon: 2,
      hooks: {
        onCollision: (cell, instant, winner, loser) =>
          collisions.push({ cell: cellName(cell), instant, winner, loser }),
      },
    });

    expect(collisions).toEqual([{ cell: "pt1pt0", instant: 1, winner: "cara", loser: "carb" }]);
    expect(timeline.ownerAt({ x: 1, y: 0 }, 1)).toBe("cara");
    expect(timeline.occupants.filter((f) => f.instant === 1).map((f) => f.vehicle)).toEqual(["cara"]);
    expect(names(timeline.blockedAt(1))).toEqual(["pt1pt0", "pt2pt0", "pt3pt0"]);
  });

  it("records a shared cell only once", () => {
    const timeline = buildOccupancyTimeline({ grid: createGridIndex(5, 1), obstacles, horizon: 2 });
    const atOne = timeline.blockedFacts.filter((f) => f.instant === 1).map((f) => cellName(f.cell));

    expect(atOne).toEqual(["pt1pt0", "pt3pt0", "pt2pt0"]);
  });
});

// ── Reserved start cell ──────────────────────────────────────────────────────

describe("buildOccupancyTimeline – reserved cell", () => {
  it("keeps the reserved cell free at instant 0 only", () => {
    const timeline = buildOccupancyTimeline({
      grid: createGridIndex(3, 1),
      obstacles: [{ id: 1, position: { x: 0, y: 0 }, speed: 0 }],
      horizon: 2,
      reserved: { x: 0, y: 0 },
    });

    expect(timeline.isFree({ x: 0, y: 0 }, 0)).toBe(true);
    expect(timeline.isBlocked({ x: 0, y: 0 }, 1)).toBe(true);
  });
});

// ── Partition invariant ──────────────────────────────────────────────────────

describe("buildOccupancyTimeline – blocked and free partition the grid", () => {
  const cases: Array<{ width: number; lanes: number; horizon: number; obstacles: Obstacle[] }> = [
    { width: 1, lanes: 1, horizon: 2, obstacles: [{ id: 1, position: { x: 0, y: 0 }, speed: -1 }] },
    {
      width: 6,
      lanes: 3,
      horizon: 7,
      obstacles: [
        { id: 1, position: { x: 5, y: 0 }, speed: -2 },
        { id: 2, position: { x: 1, y: 1 }, speed: -3 },
        { id: 3, position: { x: 3, y: 2 }, speed: 0 },
        { id: 4, position: { x: 2, y: 2 }, speed: -1 },
      ],
    },
    {
      width: 10,
      lanes: 4,
      horizon: 11,
      obstacles: [
        { id: 1, position: { x: 9, y: 3 }, speed: -5 },
        { id: 2, position: { x: 0, y: 3 }, speed: -4 },
      ],
    },
  ];

  it.each(cases)("holds for a $width x $lanes grid", ({ width, lanes, horizon, obstacles }) => {
    const grid = createGridIndex(width, lanes);
    const timeline = buildOccupancyTimeline({ grid, obstacles, horizon });

    for (let t = 0; t < horizon; t++) {
      const blocked = new Set(names(timeline.blockedAt(t)));
      const free = new Set(names(timeline.freeAt(t)));
      for (const cell of free) {
        expect(blocked.has(cell)).toBe(false);
      }
      expect(blocked.size + free.size).toBe(grid.cells.length);
    }
  });
});

// ── Range checks ─────────────────────────────────────────────────────────────

describe("buildOccupancyTimeline – range checks", () => {
  const timeline = buildOccupancyTimeline({ grid: createGridIndex(3, 1), obstacles: [], horizon: 2 });

  it("throws for instants outside [0, horizon)", () => {
    expect(() => timeline.isBlocked({ x: 0, y: 0 }, 2)).toThrow(RangeError);
    expect(() => timeline.freeAt(-1)).toThrow(RangeError);
  });

  it("rejects a non-positive horizon", () => {
    expect(() => buildOccupancyTimeline({ grid: createGridIndex(3, 1), obstacles: [], horizon: 0 })).toThrow(
      RangeError
    );
  });
});
