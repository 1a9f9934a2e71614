import { parsePlan, parsePlanLine, translatePlan, translateStep } from "../plan";
import { PlanParseError } from "../errors";

// ── parsePlanLine ────────────────────────────────────────────────────────────

describe("parsePlanLine", () => {
  it("parses a forward step with its signed speed", () => {
    expect(parsePlanLine("(forward pt0pt0 pt3pt0 0 1 -3)")).toEqual({
      action: "forward",
      from: "pt0pt0",
      to: "pt3pt0",
      fromInstant: "0",
      toInstant: "1",
      speed: -3,
    });
  });

  it("parses lateral steps", () => {
    expect(parsePlanLine("(up pt4pt2 pt3pt1 2 3)")).toEqual({
      action: "up",
      from: "pt4pt2",
      to: "pt3pt1",
      fromInstant: "2",
      toInstant: "3",
    });
    expect(parsePlanLine("(down pt4pt0 pt3pt1 0 1)").action).toBe("down");
  });

  it("matches action names case-insensitively", () => {
    expect(parsePlanLine("(FORWARD PT2PT1 PT1PT1 4 5 -1)")).toMatchObject({ action: "forward", from: "pt2pt1" });
  });

  it("rejects unknown actions", () => {
    expect(() => parsePlanLine("(jump pt0pt0 pt1pt0 0 1)")).toThrow(PlanParseError);
  });

  it("rejects a forward step without a speed", () => {
    expect(() => parsePlanLine("(forward pt0pt0 pt1pt0 0 1)")).toThrow(PlanParseError);
  });

  it("rejects a lateral step with a speed", () => {
    expect(() => parsePlanLine("(up pt1pt1 pt0pt0 0 1 -1)")).toThrow(PlanParseError);
  });

  it("carries the offending line in the error", () => {
    try {
      parsePlanLine("(forward pt0pt0 x 0 1 -1)", 4);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PlanParseError);
      if (err instanceof PlanParseError) {
        expect(err.line).toBe("(forward pt0pt0 x 0 1 -1)");
        expect(err.lineNumber).toBe(4);
        expect(err.message).toBe("Unrecognized plan action (line 4): (forward pt0pt0 x 0 1 -1)");
      }
    }
  });
});

// ── parsePlan ────────────────────────────────────────────────────────────────

describe("parsePlan", () => {
  it("skips lines that do not start with a parenthesis", () => {
    const text = ["(up pt4pt2 pt3pt1 0 1)", "(forward pt3pt1 pt0pt1 1 2 -3)", "; cost = 2 (unit cost)", ""].join("\n");

    expect(parsePlan(text).map((s) => s.action)).toEqual(["up", "forward"]);
  });

  it("handles CRLF line endings", () => {
    expect(parsePlan("(up pt4pt2 pt3pt1 0 1)\r\n(down pt3pt1 pt2pt2 1 2)\r\n")).toHaveLength(2);
  });

  it("reports the line number of a bad line", () => {
    const text = "(up pt4pt2 pt3pt1 0 1)\n(teleport pt3pt1)\n";

    expect(() => parsePlan(text)).toThrow("Unrecognized plan action (line 2): (teleport pt3pt1)");
  });
});

// ── translateStep ────────────────────────────────────────────────────────────

describe("translateStep", () => {
  it("translates a forward step to a forward action of the same magnitude", () => {
    expect(translateStep(parsePlanLine("(forward pt0pt0 pt3pt0 0 1 -3)"), 1)).toEqual({ type: "forward", speed: 3 });
  });

  it("keeps lateral steps that change lane and column", () => {
    expect(translateStep(parsePlanLine("(up pt4pt2 pt3pt1 0 1)"), 1)).toEqual({ type: "up" });
    expect(translateStep(parsePlanLine("(down pt4pt0 pt3pt1 0 1)"), 1)).toEqual({ type: "down" });
  });

  it("turns a lateral step within one column into a minimum-speed forward action", () => {
    expect(translateStep(parsePlanLine("(up pt0pt1 pt0pt0 3 4)"), 1)).toEqual({ type: "forward", speed: 1 });
    expect(translateStep(parsePlanLine("(down pt0pt1 pt0pt2 3 4)"), 2)).toEqual({ type: "forward", speed: 2 });
  });

  it("turns a lateral step that stayed in its lane into a minimum-speed forward action", () => {
    expect(translateStep(parsePlanLine("(up pt3pt2 pt2pt2 0 1)"), 1)).toEqual({ type: "forward", speed: 1 });
  });
});

describe("translatePlan", () => {
  it("translates in plan order with minimum speed 1 by default", () => {
    const steps = parsePlan(
      ["(up pt4pt2 pt3pt1 0 1)", "(up pt3pt1 pt2pt1 1 2)", "(forward pt2pt1 pt0pt1 2 3 -2)"].join("\n")
    );

    expect(translatePlan(steps)).toEqual([{ type: "up" }, { type: "forward", speed: 1 }, { type: "forward", speed: 2 }]);
  });
});
