import { spawn } from "node:child_process";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { PlannerHooks, PlanningFailure } from "./types";

/** Search configuration passed to Fast Downward unless overridden. */
export const DEFAULT_SEARCH_ARGS: ReadonlyArray<string> = ["--search", "lazy_greedy([ff()], preferred=[ff()])"];

/** Executable used when neither the config nor `FAST_DOWNWARD_PATH` names one. */
export const DEFAULT_PLANNER_COMMAND = "fast-downward.py";

/** File the planner writes its plan to, relative to its working directory. */
export const PLAN_FILE = "sas_plan";

/**
 * Fast Downward exit codes meaning the problem was proved unsolvable
 * (by the translator, by a complete search, or by an incomplete search
 * that ran out of options).
 */
export const UNSOLVABLE_EXIT_CODES: ReadonlyArray<number> = [10, 11, 12];

/**
 * Exit codes after which a plan file may exist: success, and a plan found
 * before the planner ran out of memory, time, or both.
 */
export const PLAN_FOUND_EXIT_CODES: ReadonlyArray<number> = [0, 1, 2, 3];

const DETAIL_LENGTH = 2000;

export interface RunResult {
  /** `null` when the process was terminated by a signal. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs the planner process to completion. Rejects only when the process
 * could not be started at all.
 */
export type PlannerRunner = (
  command: string,
  args: ReadonlyArray<string>,
  options: { cwd: string }
) => Promise<RunResult>;

export interface SolverConfig {
  /** Planner executable. Defaults to `$FAST_DOWNWARD_PATH`, then {@link DEFAULT_PLANNER_COMMAND}. */
  plannerPath?: string;
  /** Arguments placed after the domain and problem paths. Defaults to {@link DEFAULT_SEARCH_ARGS}. */
  searchArgs?: ReadonlyArray<string>;
  /** Directory in which each run's private working directory is created. Defaults to the OS temp dir. */
  workDir?: string;
  /** Keep the working directory and its PDDL and plan files after the run. */
  keepArtifacts?: boolean;
  /** Process runner. Defaults to {@link spawnRunner}. */
  runner?: PlannerRunner;
  hooks?: Pick<PlannerHooks, "onPlannerStart" | "onPlannerFinish" | "onCleanupError">;
}

export interface SolveSuccess {
  success: true;
  planText: string;
  /** Working directory of the run, present only when `keepArtifacts` is set. */
  artifactsDir?: string;
}

export type SolveResult = SolveSuccess | PlanningFailure;

/** Spawns the planner without a shell and buffers its output. */
export const spawnRunner: PlannerRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, [...args], { cwd: options.cwd, stdio: ["ignore", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });
    child.on("error", reject);
    child.on("close", (exitCode) => resolve({ exitCode, stdout, stderr }));
  });

export function resolvePlannerPath(config: Pick<SolverConfig, "plannerPath">): string {
  return config.plannerPath ?? process.env.FAST_DOWNWARD_PATH ?? DEFAULT_PLANNER_COMMAND;
}

function tail(run: RunResult): string {
  const output = `${run.stdout}${run.stderr}`.trim();
  return output.length > DETAIL_LENGTH ? output.slice(-DETAIL_LENGTH) : output;
}

async function readPlanFile(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return undefined;
    }
    throw err;
  }
}

/**
 * Writes `domain.pddl` and `problem.pddl` into a fresh working directory,
 * runs the planner there and reads back its plan file. Each call gets its
 * own directory, so concurrent calls do not interfere. Nothing is retried.
 *
 * Expected failures are returned, not thrown: `UNSOLVABLE` when the planner
 * proved the problem infeasible, `NO_PLAN_FILE` when it exited as if it had
 * found a plan but wrote none, `PLANNER_ERROR` when it could not be started
 * or exited with any other code.
 *
 * A working directory that cannot be removed afterwards is reported through
 * `onCleanupError` and never replaces the run's result.
 */
export async function solvePddl(
  domainText: string,
  problemText: string,
  config: SolverConfig = {}
): Promise<SolveResult> {
  const { hooks, keepArtifacts = false, runner = spawnRunner } = config;
  const dir = await mkdtemp(join(config.workDir ?? tmpdir(), "crossing-"));

  try {
    const domainPath = join(dir, "domain.pddl");
    const problemPath = join(dir, "problem.pddl");
    await writeFile(domainPath, domainText, "utf8");
    await writeFile(problemPath, problemText, "utf8");

    const command = resolvePlannerPath(config);
    const args = [domainPath, problemPath, ...(config.searchArgs ?? DEFAULT_SEARCH_ARGS)];
    hooks?.onPlannerStart?.(command, args, dir);

    const started = Date.now();
    let run: RunResult;
    try {
      run = await runner(command, args, { cwd: dir });
    } catch (err) {
      hooks?.onPlannerFinish?.(null, Date.now() - started);
      return {
        success: false,
        reason: "PLANNER_ERROR",
        exitCode: null,
        detail: err instanceof Error ? err.message : String(err),
      };
    }
    hooks?.onPlannerFinish?.(run.exitCode, Date.now() - started);

    if (run.exitCode !== null && UNSOLVABLE_EXIT_CODES.includes(run.exitCode)) {
      return { success: false, reason: "UNSOLVABLE", exitCode: run.exitCode, detail: tail(run) };
    }
    if (run.exitCode === null || !PLAN_FOUND_EXIT_CODES.includes(run.exitCode)) {
      return { success: false, reason: "PLANNER_ERROR", exitCode: run.exitCode, detail: tail(run) };
    }

    const planText = await readPlanFile(join(dir, PLAN_FILE));
    if (planText === undefined) {
      return { success: false, reason: "NO_PLAN_FILE", exitCode: run.exitCode, detail: tail(run) };
    }
    return keepArtifacts ? { success: true, planText, artifactsDir: dir } : { success: true, planText };
  } finally {
    if (!keepArtifacts) {
      await rm(dir, { recursive: true, force: true }).catch((err: unknown) => {
        hooks?.onCleanupError?.(dir, err);
      });
    }
  }
}
