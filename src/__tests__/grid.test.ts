import { cellName, createGridIndex, parseCellName, sameCell } from "../grid";

// ── createGridIndex ──────────────────────────────────────────────────────────

describe("createGridIndex", () => {
  it("enumerates every cell, column by column", () => {
    const grid = createGridIndex(2, 3);

    expect(grid.cells).toEqual([
      { x: 0, y: 0 },
      { x: 0, y: 1 },
      { x: 0, y: 2 },
      { x: 1, y: 0 },
      { x: 1, y: 1 },
      { x: 1, y: 2 },
    ]);
  });

  it("returns the shared cell instance from cellAt", () => {
    const grid = createGridIndex(4, 2);

    expect(grid.cellAt(3, 1)).toBe(grid.cells[7]);
    expect(grid.cellAt(3, 1)).toEqual({ x: 3, y: 1 });
  });

  it("throws a RangeError for cells outside the grid", () => {
    const grid = createGridIndex(4, 2);

    expect(() => grid.cellAt(4, 0)).toThrow(RangeError);
    expect(() => grid.cellAt(0, -1)).toThrow(RangeError);
  });

  it("reports containment", () => {
    const grid = createGridIndex(3, 3);

    expect(grid.contains({ x: 2, y: 2 })).toBe(true);
    expect(grid.contains({ x: 3, y: 0 })).toBe(false);
    expect(grid.contains({ x: 1.5, y: 0 })).toBe(false);
  });

  it("rejects non-positive dimensions", () => {
    expect(() => createGridIndex(0, 3)).toThrow(RangeError);
    expect(() => createGridIndex(3, 0)).toThrow(RangeError);
    expect(() => createGridIndex(2.5, 1)).toThrow(RangeError);
  });
});

// ── Cell names ───────────────────────────────────────────────────────────────

describe("cellName / parseCellName", () => {
  it("names a cell from its coordinates", () => {
    expect(cellName({ x: 12, y: 3 })).toBe("pt12pt3");
  });

  it("parses a cell name back to coordinates", () => {
    expect(parseCellName("pt12pt3")).toEqual({ x: 12, y: 3 });
  });

  it("rejects malformed names", () => {
    expect(() => parseCellName("p12pt3")).toThrow(SyntaxError);
    expect(() => parseCellName("pt1pt")).toThrow(SyntaxError);
  });

  it("compares cells by value", () => {
    expect(sameCell({ x: 1, y: 2 }, { x: 1, y: 2 })).toBe(true);
    expect(sameCell({ x: 1, y: 2 }, { x: 2, y: 1 })).toBe(false);
  });
});
