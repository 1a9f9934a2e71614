import type { EnvironmentAction, PlanStep, PlannerHooks, PlanningFailure, Snapshot } from "./types";
import type { Encoding, EncodingOptions } from "./encoding";
import type { SolverConfig } from "./solver";
import { NoPlanFoundError, PlanExhaustedError } from "./errors";
import { encodeSnapshot } from "./encoding";
import { serializeDomain, serializeProblem } from "./pddl";
import { parsePlan, translatePlan } from "./plan";
import { solvePddl } from "./solver";

/**
 * Configuration accepted by {@link createCrossingPlanner}. Every field is
 * optional; see {@link EncodingOptions} and {@link SolverConfig} for the
 * defaults.
 */
export interface CrossingPlannerConfig
  extends Omit<EncodingOptions, "hooks">,
    Omit<SolverConfig, "hooks"> {
  hooks?: PlannerHooks;
}

/**
 * Returned when the planner found a plan.
 */
export interface PlanningSuccess {
  success: true;
  /** Environment actions, one per control step. */
  actions: ReadonlyArray<EnvironmentAction>;
  /** The planner's steps the actions were translated from. */
  steps: ReadonlyArray<PlanStep>;
  encoding: Encoding;
}

/**
 * Union result type returned by `createCrossingPlanner().plan()`.
 */
export type PlanningResult = PlanningSuccess | PlanningFailure;

/**
 * Creates a planner that turns snapshots into environment action sequences
 * through an external classical planner.
 *
 * Malformed snapshots throw {@link SnapshotValidationError} and malformed
 * plans throw {@link PlanParseError}; a planner that produces no plan is
 * reported as a {@link PlanningFailure}.
 *
 * @example
 * ```ts
 * const result = await createCrossingPlanner({ plannerPath: "/opt/fd/fast-downward.py" }).plan(snapshot);
 * if (result.success) {
 *   result.actions.forEach((action) => env.step(action));
 * }
 * ```
 */
export function createCrossingPlanner(config: CrossingPlannerConfig = {}) {
  const encode = (snapshot: Snapshot): Encoding => encodeSnapshot(snapshot, config);

  return {
    /** Derives the encoding of a snapshot without running the planner. */
    encode,

    /**
     * Encodes the snapshot, runs the planner on it and translates the plan.
     */
    async plan(snapshot: Snapshot): Promise<PlanningResult> {
      const encoding = encode(snapshot);
      const solved = await solvePddl(serializeDomain(encoding.domain), serializeProblem(encoding.problem), config);
      if (!solved.success) {
        return solved;
      }

      const steps = parsePlan(solved.planText);
      const actions = translatePlan(steps, encoding.speeds[0]);
      config.hooks?.onPlanTranslated?.(actions);
      return { success: true, actions, steps, encoding };
    },
  };
}

/**
 * Replays a translated plan one control step at a time.
 *
 * @example
 * ```ts
 * const agent = await CrossingAgent.fromSnapshot(snapshot, { plannerPath });
 * while (!done) {
 *   env.step(agent.step());
 * }
 * ```
 */
export class CrossingAgent {
  private readonly _actions: ReadonlyArray<EnvironmentAction>;
  private _next = 0;

  constructor(actions: ReadonlyArray<EnvironmentAction>) {
    this._actions = [...actions];
  }

  /**
   * Plans once for `snapshot` and wraps the result.
   *
   * @throws {NoPlanFoundError} when the planner returned no plan.
   */
  static async fromSnapshot(snapshot: Snapshot, config: CrossingPlannerConfig = {}): Promise<CrossingAgent> {
    const result = await createCrossingPlanner(config).plan(snapshot);
    if (!result.success) {
      throw new NoPlanFoundError(result.reason, result.exitCode, result.detail);
    }
    return new CrossingAgent(result.actions);
  }

  /** Actions not yet handed out. */
  get remaining(): number {
    return this._actions.length - this._next;
  }

  /**
   * Returns the action for the current control step and advances.
   *
   * @throws {PlanExhaustedError} once every action has been handed out.
   */
  step(): EnvironmentAction {
    const action = this._actions[this._next];
    if (action === undefined) {
      throw new PlanExhaustedError(this._next, this._actions.length);
    }
    this._next += 1;
    return action;
  }

  /** Starts replaying from the first action again. */
  reset(): void {
    this._next = 0;
  }
}
