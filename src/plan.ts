import type { EnvironmentAction, PlanStep } from "./types";
import { PlanParseError } from "./errors";
import { parseCellName } from "./grid";

const CELL = String.raw`pt\d+pt\d+`;
const ENDPOINTS = String.raw`\s+(?<from>${CELL})\s+(?<to>${CELL})\s+(?<fromInstant>\d+)\s+(?<toInstant>\d+)`;

const LATERAL_LINE = new RegExp(String.raw`^\(\s*(?<action>up|down)${ENDPOINTS}\s*\)$`);
const FORWARD_LINE = new RegExp(String.raw`^\(\s*forward${ENDPOINTS}\s+(?<speed>-?\d+)\s*\)$`);

/**
 * Parses one action line of a plan, e.g. `(forward pt3pt0 pt0pt0 0 1 -3)`.
 * Action and object names are matched case-insensitively.
 *
 * @throws {PlanParseError} if the line is not an `up`, `down` or `forward`
 *   instantiation with the expected parameters.
 */
export function parsePlanLine(line: string, lineNumber?: number): PlanStep {
  const text = line.trim().toLowerCase();

  const lateral = LATERAL_LINE.exec(text)?.groups;
  if (lateral !== undefined) {
    return {
      action: lateral.action === "up" ? "up" : "down",
      from: lateral.from,
      to: lateral.to,
      fromInstant: lateral.fromInstant,
      toInstant: lateral.toInstant,
    };
  }

  const forward = FORWARD_LINE.exec(text)?.groups;
  if (forward !== undefined) {
    return {
      action: "forward",
      from: forward.from,
      to: forward.to,
      fromInstant: forward.fromInstant,
      toInstant: forward.toInstant,
      speed: Number(forward.speed),
    };
  }

  throw new PlanParseError(line, lineNumber);
}

/**
 * Parses a plan file. Lines that do not start with `(` (cost summaries,
 * comments, blank lines) are skipped.
 *
 * @throws {PlanParseError} on the first unrecognized action line.
 */
export function parsePlan(text: string): PlanStep[] {
  const steps: PlanStep[] = [];
  text.split(/\r?\n/).forEach((raw, i) => {
    const line = raw.trim();
    if (line.startsWith("(")) {
      steps.push(parsePlanLine(line, i + 1));
    }
  });
  return steps;
}

/**
 * Maps one plan step to the action the simulation should take.
 *
 * A lateral step whose endpoints share a column or a lane did not actually
 * change lane diagonally: either it was clamped at the left edge or its
 * target was blocked and it degraded to a same-lane advance. Either way
 * the simulation gets a forward move at `minSpeed`.
 */
export function translateStep(step: PlanStep, minSpeed: number): EnvironmentAction {
  switch (step.action) {
    case "up":
    case "down": {
      const from = parseCellName(step.from);
      const to = parseCellName(step.to);
      if (from.x === to.x || from.y === to.y) {
        return { type: "forward", speed: minSpeed };
      }
      return { type: step.action };
    }
    case "forward":
      return { type: "forward", speed: Math.abs(step.speed) };
  }
}

/** Translates a parsed plan in order. */
export function translatePlan(steps: ReadonlyArray<PlanStep>, minSpeed = 1): EnvironmentAction[] {
  return steps.map((step) => translateStep(step, minSpeed));
}
