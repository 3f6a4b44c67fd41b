import type { TerminalState, ValidatorState } from "../types/validation.js";

/**
 * Events that drive validator transitions.
 */
export type ValidatorEvent = "start" | "inconclusive" | "ready" | "failed" | "deadline" | "cancelled";

export function isTerminal(state: ValidatorState): state is TerminalState {
  return state === "Ready" || state === "TimedOut" || state === "Failed";
}

/**
 * Pure function: given current state + event, return next state.
 *
 * Pending → Polling → {Ready, TimedOut, Failed}. Terminal states accept no
 * further events; validating again needs a fresh validator.
 */
export function nextState(current: ValidatorState, event: ValidatorEvent): ValidatorState {
  if (isTerminal(current)) {
    throw new Error(`Validator is already ${current}; start a new validation instead`);
  }
  if (event === "deadline" || event === "cancelled") return "TimedOut";

  if (current === "Pending") {
    if (event === "start") return "Polling";
    throw new Error(`Event ${event} is not valid before polling starts`);
  }

  switch (event) {
    case "inconclusive":
      return "Polling";
    case "ready":
      return "Ready";
    case "failed":
      return "Failed";
    case "start":
      throw new Error("Validator is already polling");
  }
}
