import { Outcome } from "./Outcome";
import { State } from "./State";
import { applyAction } from "./actions";

/** Rebuild the board a game ended on from its record. */
export function replay(outcome: Outcome): State {
  const state = new State(outcome.turnOrder, outcome.size);
  for (const entry of outcome.record) {
    applyAction(state, entry.token, entry.action);
  }
  return state;
}
