/**
 * An addressable grid location. `x` runs along the lane (0 is the left
 * edge, where the agent is heading), `y` indexes the lane (0 is topmost).
 */
export interface Cell {
  readonly x: number;
  readonly y: number;
}

/**
 * A moving obstacle as seen in one simulation snapshot.
 * The lane (`position.y`) never changes; `speed` is signed, in cells per
 * instant, negative meaning leftward.
 */
export interface Obstacle {
  readonly id: string | number;
  readonly position: Cell;
  readonly speed: number;
}

/** The driving agent as seen in one simulation snapshot. */
export interface AgentState {
  readonly position: Cell;
  /**
   * Signed speed bounds, e.g. `[-3, -1]`. Only the magnitudes matter to the
   * encoding; the agent always moves leftward.
   */
  readonly speedRange: readonly [number, number];
}

/**
 * Read-only view of the simulation consumed by the encoder.
 * Nothing in this library mutates a snapshot.
 */
export interface Snapshot {
  readonly width: number;
  readonly laneCount: number;
  readonly agent: AgentState;
  readonly obstacles: ReadonlyArray<Obstacle>;
  readonly finish: Cell;
}

/** The three agent move shapes. Forward moves carry a speed magnitude. */
export type MoveKind =
  | { readonly kind: "LATERAL_UP" }
  | { readonly kind: "LATERAL_DOWN" }
  | { readonly kind: "FORWARD"; readonly speed: number };

/**
 * One row of the symbolic "physics" table: taking `move` from `from` so as
 * to arrive at `instant` lands the agent on `to`.
 */
export interface TransitionFact {
  readonly from: Cell;
  readonly move: MoveKind;
  readonly to: Cell;
  readonly instant: number;
}

/** `vehicle` is at `cell` at `instant`. */
export interface OccupantFact {
  readonly cell: Cell;
  readonly instant: number;
  readonly vehicle: string;
}

/** `cell` is illegal as a destination at `instant`. */
export interface BlockedFact {
  readonly cell: Cell;
  readonly instant: number;
}

/**
 * Goal condition: `vehicle` occupies `cell` at any of `instants`.
 */
export interface GoalCondition {
  readonly kind: "any-instant";
  readonly vehicle: string;
  readonly cell: Cell;
  readonly instants: ReadonlyArray<number>;
}

// ── Planner output ──────────────────────────────────────────────────────────

/** A single action instantiation parsed from a plan file. */
export type PlanStep =
  | {
      readonly action: "up" | "down";
      readonly from: string;
      readonly to: string;
      readonly fromInstant: string;
      readonly toInstant: string;
    }
  | {
      readonly action: "forward";
      readonly from: string;
      readonly to: string;
      readonly fromInstant: string;
      readonly toInstant: string;
      /** Signed speed as written by the planner, e.g. `-3`. */
      readonly speed: number;
    };

/**
 * Action tokens fed back to the simulation, one per control step.
 * `speed` is a magnitude.
 */
export type EnvironmentAction =
  | { readonly type: "up" }
  | { readonly type: "down" }
  | { readonly type: "forward"; readonly speed: number };

// ── Observability ───────────────────────────────────────────────────────────

/**
 * Optional lifecycle callbacks. Every hook is invoked synchronously and
 * its return value is ignored.
 */
export interface PlannerHooks {
  /**
   * Called when an obstacle (`loser`) tries to claim a cell that another
   * obstacle (`winner`) already claimed at the same instant.
   */
  onCollision?: (cell: Cell, instant: number, winner: string, loser: string) => void;
  /** Called once the encoding of a snapshot is complete. */
  onEncoded?: (stats: EncodingStats) => void;
  /** Called right before the external planner is spawned. */
  onPlannerStart?: (command: string, args: ReadonlyArray<string>, cwd: string) => void;
  /** Called when the external planner exits. */
  onPlannerFinish?: (exitCode: number | null, durationMs: number) => void;
  /**
   * Called when the planner's working directory could not be removed.
   * The run's result is returned regardless.
   */
  onCleanupError?: (dir: string, error: unknown) => void;
  /** Called once a plan has been translated into environment actions. */
  onPlanTranslated?: (actions: ReadonlyArray<EnvironmentAction>) => void;
}

export interface EncodingStats {
  horizon: number;
  cells: number;
  blockedFacts: number;
  transitionFacts: number;
  initFacts: number;
}

// ── Results ─────────────────────────────────────────────────────────────────

/**
 * Reason codes for a run that produced no plan.
 * `UNSOLVABLE` means the planner proved the problem infeasible;
 * the other two point at the tooling.
 */
export type PlanningFailureReason = "UNSOLVABLE" | "NO_PLAN_FILE" | "PLANNER_ERROR";

export interface PlanningFailure {
  success: false;
  reason: PlanningFailureReason;
  /** Exit code of the planner process, `null` when it never ran or was killed. */
  exitCode: number | null;
  /** Tail of the planner's diagnostic output. */
  detail: string;
}

// ── PDDL documents ──────────────────────────────────────────────────────────

/**
 * A predicate applied to arguments. Arguments starting with `?` are action
 * parameters; anything else names an object.
 */
export interface Atom {
  readonly type: "atom";
  readonly predicate: string;
  readonly args: ReadonlyArray<string>;
}

export interface Negation<TOperand = Formula> {
  readonly type: "not";
  readonly operand: TOperand;
}

export interface Conjunction {
  readonly type: "and";
  readonly operands: ReadonlyArray<Formula>;
}

export interface Disjunction {
  readonly type: "or";
  readonly operands: ReadonlyArray<Formula>;
}

export type Formula = Atom | Negation | Conjunction | Disjunction;

/** A fact of the initial state. */
export type InitLiteral = Atom | Negation<Atom>;

/** A typed parameter. `name` is written without the leading `?`. */
export interface Parameter {
  readonly name: string;
  readonly type: string;
}

export interface TypeDeclaration {
  readonly name: string;
  /** Supertype, or `undefined` for a root type. */
  readonly parent?: string;
}

export interface PredicateDeclaration {
  readonly name: string;
  readonly parameters: ReadonlyArray<Parameter>;
}

export interface ActionSchema {
  readonly name: string;
  readonly parameters: ReadonlyArray<Parameter>;
  readonly precondition: Formula;
  readonly effect: Formula;
}

/**
 * An object the domain's action schemas mention by name, which every
 * problem must declare with `type` or a subtype of it.
 */
export interface RequiredObject {
  readonly name: string;
  readonly type: string;
}

export interface DomainDocument {
  readonly name: string;
  readonly requirements: ReadonlyArray<string>;
  readonly types: ReadonlyArray<TypeDeclaration>;
  readonly predicates: ReadonlyArray<PredicateDeclaration>;
  readonly actions: ReadonlyArray<ActionSchema>;
  readonly requiredObjects: ReadonlyArray<RequiredObject>;
}

export interface ObjectGroup {
  readonly type: string;
  readonly names: ReadonlyArray<string>;
}

export interface ProblemDocument {
  readonly name: string;
  readonly domain: string;
  readonly objects: ReadonlyArray<ObjectGroup>;
  readonly init: ReadonlyArray<InitLiteral>;
  readonly goal: Formula;
}
