import type {
  ActionSchema,
  DomainDocument,
  GoalCondition,
  MoveKind,
  PlannerHooks,
  ProblemDocument,
  Snapshot,
  TransitionFact,
} from "./types";
import type { GridIndex } from "./grid";
import type { OccupancyTimeline } from "./occupancy";
import { DomainBuilder, and, atom, not, or } from "./domain";
import { ProblemBuilder } from "./problem";
import { cellName, createGridIndex } from "./grid";
import { buildOccupancyTimeline, obstacleName } from "./occupancy";
import { generateTransitions } from "./transitions";
import { buildGoal } from "./goal";
import { computeHorizon, speedMagnitudes, validateSnapshot } from "./snapshot";

/** Object name of the agent in every problem. */
export const AGENT_OBJECT = "agent1";
export const DEFAULT_DOMAIN_NAME = "grid_world";
export const DEFAULT_PROBLEM_NAME = "crossing";

export interface EncodingOptions {
  /** Defaults to {@link DEFAULT_DOMAIN_NAME}. */
  domainName?: string;
  /** Defaults to {@link DEFAULT_PROBLEM_NAME}. */
  problemName?: string;
  /**
   * Emit `(not (blocked cell t))` for every free cell at every instant
   * after the first. Defaults to `true`.
   */
  emitFreeFacts?: boolean;
  hooks?: Pick<PlannerHooks, "onCollision" | "onEncoded">;
}

/** Everything derived from one snapshot, ready to serialize. */
export interface Encoding {
  readonly grid: GridIndex;
  readonly horizon: number;
  /** Forward speed magnitudes available to the agent, ascending. */
  readonly speeds: ReadonlyArray<number>;
  readonly timeline: OccupancyTimeline;
  readonly transitions: ReadonlyArray<TransitionFact>;
  readonly goal: GoalCondition;
  readonly domain: DomainDocument;
  readonly problem: ProblemDocument;
}

/** Object name of an instant. */
export function instantName(instant: number): string {
  return String(instant);
}

/** Object name of a forward speed magnitude: the signed, leftward speed. */
export function speedName(magnitude: number): string {
  return String(-magnitude);
}

const SUCCESSOR_PREDICATE: Record<MoveKind["kind"], string> = {
  LATERAL_UP: "up_next",
  LATERAL_DOWN: "down_next",
  FORWARD: "forward_next",
};

/**
 * The fixed grid-driving domain: occupancy and successor predicates, and
 * the `up`, `down` and `forward` actions that advance the agent by one
 * instant onto a cell that is not blocked at the arrival instant.
 */
export function createGridWorldDomain(name: string = DEFAULT_DOMAIN_NAME): DomainDocument {
  const move = (action: string, successor: string, withSpeed: boolean): ActionSchema => {
    const parameters = [
      { name: "pt1", type: "gridcell" },
      { name: "pt2", type: "gridcell" },
      { name: "t1", type: "time" },
      { name: "t2", type: "time" },
      ...(withSpeed ? [{ name: "s", type: "speed" }] : []),
    ];
    const successorArgs = withSpeed ? ["?pt1", "?pt2", "?t2", "?s"] : ["?pt1", "?pt2", "?t2"];
    return {
      name: action,
      parameters,
      precondition: and(
        atom("at", "?pt1", "?t1", AGENT_OBJECT),
        atom(successor, ...successorArgs),
        not(atom("blocked", "?pt2", "?t2")),
        atom("next_instant", "?t1", "?t2")
      ),
      effect: atom("at", "?pt2", "?t2", AGENT_OBJECT),
    };
  };

  return new DomainBuilder(name)
    .addType("car")
    .addType("agent", "car")
    .addType("gridcell")
    .addType("time")
    .addType("speed")
    .addPredicate("at", [
      { name: "pt1", type: "gridcell" },
      { name: "t", type: "time" },
      { name: "car", type: "car" },
    ])
    .addPredicate("up_next", [
      { name: "pt1", type: "gridcell" },
      { name: "pt2", type: "gridcell" },
      { name: "t", type: "time" },
    ])
    .addPredicate("down_next", [
      { name: "pt1", type: "gridcell" },
      { name: "pt2", type: "gridcell" },
      { name: "t", type: "time" },
    ])
    .addPredicate("forward_next", [
      { name: "pt1", type: "gridcell" },
      { name: "pt2", type: "gridcell" },
      { name: "t", type: "time" },
      { name: "s", type: "speed" },
    ])
    .addPredicate("next_instant", [
      { name: "t1", type: "time" },
      { name: "t2", type: "time" },
    ])
    .addPredicate("blocked", [
      { name: "pt1", type: "gridcell" },
      { name: "t", type: "time" },
    ])
    .addAction(move("up", SUCCESSOR_PREDICATE.LATERAL_UP, false))
    .addAction(move("down", SUCCESSOR_PREDICATE.LATERAL_DOWN, false))
    .addAction(move("forward", SUCCESSOR_PREDICATE.FORWARD, true))
    .requireObject(AGENT_OBJECT, "agent")
    .build();
}

/**
 * Derives the complete time-expanded encoding of a snapshot.
 *
 * @throws {SnapshotValidationError} if the snapshot is malformed.
 */
export function encodeSnapshot(snapshot: Snapshot, options: EncodingOptions = {}): Encoding {
  validateSnapshot(snapshot);

  const { hooks, emitFreeFacts = true } = options;
  const grid = createGridIndex(snapshot.width, snapshot.laneCount);
  const speeds = speedMagnitudes(snapshot.agent.speedRange);
  const horizon = computeHorizon(snapshot.width, speeds[0]);

  const timeline = buildOccupancyTimeline({
    grid,
    obstacles: snapshot.obstacles,
    horizon,
    reserved: snapshot.agent.position,
    hooks,
  });
  const transitions = generateTransitions({ grid, timeline }, speeds);
  const goal = buildGoal(snapshot.finish, horizon, AGENT_OBJECT);
  const domain = createGridWorldDomain(options.domainName ?? DEFAULT_DOMAIN_NAME);

  const instants: string[] = [];
  for (let t = 0; t <= horizon; t++) {
    instants.push(instantName(t));
  }

  const builder = new ProblemBuilder(domain, options.problemName ?? DEFAULT_PROBLEM_NAME)
    .addObjects("agent", [AGENT_OBJECT])
    .addObjects("car", snapshot.obstacles.map(obstacleName))
    .addObjects("time", instants)
    .addObjects("speed", speeds.map(speedName))
    .addObjects("gridcell", grid.cells.map(cellName));

  for (let t = 0; t < horizon; t++) {
    for (const fact of timeline.occupants) {
      if (fact.instant === t) {
        builder.addFact("at", cellName(fact.cell), instantName(t), fact.vehicle);
      }
    }
    for (const fact of timeline.blockedFacts) {
      if (fact.instant === t) {
        builder.addFact("blocked", cellName(fact.cell), instantName(t));
      }
    }
    if (emitFreeFacts && t > 0) {
      for (const cell of timeline.freeAt(t)) {
        builder.addNegatedFact("blocked", cellName(cell), instantName(t));
      }
    }
  }

  builder.addFact("at", cellName(snapshot.agent.position), instantName(0), AGENT_OBJECT);

  for (const fact of transitions) {
    const args = [cellName(fact.from), cellName(fact.to), instantName(fact.instant)];
    if (fact.move.kind === "FORWARD") {
      args.push(speedName(fact.move.speed));
    }
    builder.addFact(SUCCESSOR_PREDICATE[fact.move.kind], ...args);
  }

  for (let t = 0; t < horizon; t++) {
    builder.addFact("next_instant", instantName(t), instantName(t + 1));
  }

  const problem = builder
    .setGoal(or(...goal.instants.map((t) => atom("at", cellName(goal.cell), instantName(t), goal.vehicle))))
    .build();

  hooks?.onEncoded?.({
    horizon,
    cells: grid.cells.length,
    blockedFacts: timeline.blockedFacts.length,
    transitionFacts: transitions.length,
    initFacts: problem.init.length,
  });

  return { grid, horizon, speeds, timeline, transitions, goal, domain, problem };
}
