/**
 * Why a path request produced no path. None of these are errors: the agent
 * falls back to direct steering until the next throttled retry.
 */
export enum PathFailureReason {
  START_OUT_OF_BOUNDS = "start_out_of_bounds",
  GOAL_OUT_OF_BOUNDS = "goal_out_of_bounds",
  START_BLOCKED = "start_blocked",
  GOAL_BLOCKED = "goal_blocked",
  BUDGET_EXCEEDED = "budget_exceeded",
  UNREACHABLE = "unreachable",
  NO_GOAL = "no_goal",
}
