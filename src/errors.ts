import type { PlanningFailureReason } from "./types";

/**
 * Thrown by {@link validateSnapshot} when a snapshot cannot be encoded,
 * e.g. a finish cell outside the grid.
 *
 * @example
 * ```ts
 * try {
 *   encodeSnapshot(snapshot);
 * } catch (err) {
 *   if (err instanceof SnapshotValidationError) {
 *     console.error(`Bad snapshot field: ${err.field}`);
 *   }
 * }
 * ```
 */
export class SnapshotValidationError extends Error {
  /** Path of the offending snapshot field, e.g. `"finish"` or `"obstacles[2].speed"`. */
  readonly field: string;

  constructor(field: string, detail: string) {
    super(`Invalid snapshot: ${field} ${detail}.`);
    this.name = "SnapshotValidationError";
    this.field = field;
  }
}

/**
 * Thrown when a domain or problem document is incomplete or refers to
 * something that was never declared (unknown predicate, wrong arity,
 * undeclared object or type, missing goal).
 */
export class EncodingValidationError extends Error {
  /** The name that failed validation. */
  readonly subject: string;

  constructor(subject: string, detail: string) {
    super(`Encoding validation failed for "${subject}": ${detail}.`);
    this.name = "EncodingValidationError";
    this.subject = subject;
  }
}

/**
 * Thrown when a plan line does not match any known action shape.
 * Plans come from a trusted tool, so this is a fatal format error.
 */
export class PlanParseError extends Error {
  readonly line: string;
  /** 1-based line number, or `undefined` when a single line was parsed. */
  readonly lineNumber: number | undefined;

  constructor(line: string, lineNumber?: number) {
    const where = lineNumber === undefined ? "" : ` (line ${lineNumber})`;
    super(`Unrecognized plan action${where}: ${line}`);
    this.name = "PlanParseError";
    this.line = line;
    this.lineNumber = lineNumber;
  }
}

/**
 * Thrown by {@link CrossingAgent.step} when asked for more actions than the
 * plan contains.
 */
export class PlanExhaustedError extends Error {
  readonly step: number;

  constructor(step: number, length: number) {
    super(`Plan exhausted: step ${step} requested but the plan has ${length} action(s).`);
    this.name = "PlanExhaustedError";
    this.step = step;
  }
}

/**
 * Thrown by {@link CrossingAgent.fromSnapshot} when the planner returned no
 * plan. `reason` tells an infeasible problem (`"UNSOLVABLE"`) apart from a
 * tooling failure.
 */
export class NoPlanFoundError extends Error {
  readonly reason: PlanningFailureReason;
  readonly exitCode: number | null;

  constructor(reason: PlanningFailureReason, exitCode: number | null, detail: string) {
    super(
      `No plan found (${reason}, exit code ${exitCode ?? "none"})` + (detail === "" ? "." : `: ${detail}`)
    );
    this.name = "NoPlanFoundError";
    this.reason = reason;
    this.exitCode = exitCode;
  }
}
