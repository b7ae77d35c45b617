/**
 * Publish protocol states. `skipped` is the successful end of a conflict
 * when conflicts are not errors.
 */
export type PublishState = "built" | "staged" | "transferred" | "published" | "conflicted" | "skipped" | "failed";

export type PublishEvent = "staged" | "conflict" | "transferred" | "published" | "failure";

export const TERMINAL_STATES: readonly PublishState[] = ["published", "conflicted", "skipped", "failed"];

export function isTerminal(state: PublishState): boolean {
  return TERMINAL_STATES.includes(state);
}

/**
 * Pure function: given current state + event, return next state.
 * Events that do not apply to the current state fail the run.
 */
export function nextPublishState(current: PublishState, event: PublishEvent, opts: { errorOnConflict: boolean }): PublishState {
  if (isTerminal(current)) return "failed";
  if (event === "failure") return "failed";

  switch (current) {
    case "built":
      if (event === "staged") return "staged";
      if (event === "conflict") return opts.errorOnConflict ? "conflicted" : "skipped";
      return "failed";
    case "staged":
      return event === "transferred" ? "transferred" : "failed";
    case "transferred":
      return event === "published" ? "published" : "failed";
    default:
      return "failed";
  }
}
