export type {
  Cell,
  Obstacle,
  AgentState,
  Snapshot,
  MoveKind,
  TransitionFact,
  OccupantFact,
  BlockedFact,
  GoalCondition,
  PlanStep,
  EnvironmentAction,
  PlannerHooks,
  EncodingStats,
  PlanningFailureReason,
  PlanningFailure,
  Atom,
  Negation,
  Conjunction,
  Disjunction,
  Formula,
  InitLiteral,
  Parameter,
  TypeDeclaration,
  PredicateDeclaration,
  ActionSchema,
  RequiredObject,
  DomainDocument,
  ObjectGroup,
  ProblemDocument,
} from "./types";

export type { GridIndex } from "./grid";
export type { OccupancyOptions, OccupancyTimeline } from "./occupancy";
export type { TransitionContext } from "./transitions";
export type { Encoding, EncodingOptions } from "./encoding";
export type { PlannerRunner, RunResult, SolverConfig, SolveResult, SolveSuccess } from "./solver";
export type { CrossingPlannerConfig, PlanningResult, PlanningSuccess } from "./planner";

export { createGridIndex, cellName, parseCellName, sameCell } from "./grid";
export { validateSnapshot, speedMagnitudes, computeHorizon } from "./snapshot";
export { wrap, project, sweep } from "./trajectory";
export { buildOccupancyTimeline, obstacleName } from "./occupancy";
export { moveKinds, nextCell, generateTransitions } from "./transitions";
export { buildGoal, isGoalSatisfied } from "./goal";
export { DomainBuilder, DEFAULT_REQUIREMENTS, atom, not, and, or } from "./domain";
export { ProblemBuilder } from "./problem";
export {
  encodeSnapshot,
  createGridWorldDomain,
  AGENT_OBJECT,
  DEFAULT_DOMAIN_NAME,
  DEFAULT_PROBLEM_NAME,
} from "./encoding";
export { serializeDomain, serializeProblem, formatFormula } from "./pddl";
export { parsePlanLine, parsePlan, translateStep, translatePlan } from "./plan";
export {
  solvePddl,
  spawnRunner,
  resolvePlannerPath,
  DEFAULT_SEARCH_ARGS,
  DEFAULT_PLANNER_COMMAND,
  PLAN_FILE,
  UNSOLVABLE_EXIT_CODES,
  PLAN_FOUND_EXIT_CODES,
} from "./solver";
export { createCrossingPlanner, CrossingAgent } from "./planner";
export {
  SnapshotValidationError,
  EncodingValidationError,
  PlanParseError,
  PlanExhaustedError,
  NoPlanFoundError,
} from "./errors";
