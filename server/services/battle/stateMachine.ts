/**
 * Session lifecycle state machine.
 *
 *   waiting ──PLAYER_BOUND──▶ matched ──START──▶ in_progress ──COMPLETE──▶ completed
 *      │                        │                  │   ▲
 *      └────────ABANDON─────────┴─────ABANDON──────┘   └─SUDDEN_DEATH (self-loop)
 *                                  ▼
 *                              abandoned
 *
 * `transition` is pure: it returns the next state and the effects the
 * registry must carry out, or an IllegalTransitionError.
 */

import { IllegalTransitionError, fail, ok, type Result } from "./errors";
import type { AbandonReason, SessionOutcome, SessionState, Seat } from "./types";

export type SessionEvent =
  | { type: "PLAYER_BOUND" }
  | { type: "START" }
  | { type: "SUDDEN_DEATH" }
  | { type: "COMPLETE"; outcome: SessionOutcome }
  | { type: "ABANDON"; reason: AbandonReason; forfeitTo?: Seat };

export type PublishedEvent =
  | "session.matched"
  | "session.started"
  | "session.completed"
  | "session.abandoned";

export type SessionEffect =
  | { kind: "cancel_timers" }
  | { kind: "schedule_retention" }
  | { kind: "publish"; event: PublishedEvent };

export interface TransitionResult {
  next: SessionState;
  effects: SessionEffect[];
}

export const TERMINAL_STATES: ReadonlySet<SessionState> = new Set(["completed", "abandoned"]);

export function isTerminal(state: SessionState): boolean {
  return TERMINAL_STATES.has(state);
}

const END_EFFECTS = (event: PublishedEvent): SessionEffect[] => [
  { kind: "cancel_timers" },
  { kind: "publish", event },
  { kind: "schedule_retention" },
];

export function transition(state: SessionState, event: SessionEvent): Result<TransitionResult> {
  switch (state) {
    case "waiting":
      if (event.type === "PLAYER_BOUND") {
        return ok<TransitionResult>({
          next: "matched",
          effects: [{ kind: "cancel_timers" }, { kind: "publish", event: "session.matched" }],
        });
      }
      if (event.type === "ABANDON") {
        return ok<TransitionResult>({ next: "abandoned", effects: END_EFFECTS("session.abandoned") });
      }
      break;

    case "matched":
      if (event.type === "START") {
        return ok<TransitionResult>({ next: "in_progress", effects: [{ kind: "publish", event: "session.started" }] });
      }
      if (event.type === "ABANDON") {
        return ok<TransitionResult>({ next: "abandoned", effects: END_EFFECTS("session.abandoned") });
      }
      break;

    case "in_progress":
      if (event.type === "SUDDEN_DEATH") {
        return ok<TransitionResult>({ next: "in_progress", effects: [] });
      }
      if (event.type === "COMPLETE") {
        return ok<TransitionResult>({ next: "completed", effects: END_EFFECTS("session.completed") });
      }
      if (event.type === "ABANDON") {
        return ok<TransitionResult>({ next: "abandoned", effects: END_EFFECTS("session.abandoned") });
      }
      break;

    case "completed":
    case "abandoned":
      break;
  }

  return fail(new IllegalTransitionError(state, event.type));
}
