import { Action, ActionError, StateView, Token } from "@dropfour/core";
import type { Outcome } from "../Outcome";

/**
 * The contract every participant implements. The Game asks the agent whose
 * turn it is for an action, and tells every agent the outcome at the end.
 */
export interface IAgent {
  /** Identifies this agent's pieces. Must be unique within a game. */
  readonly token: Token;

  /**
   * Called each time it's this agent's turn. May resolve later (e.g. while
   * waiting on terminal input); no other agent acts in the meantime.
   */
  selectAction(view: StateView): Action | Promise<Action>;

  /** Called once on every agent when the game ends. */
  notifyOutcome(outcome: Outcome): void;

  /** Called when a selected action was rejected by the board, before the agent is asked again. */
  notifyActionError?(error: ActionError, view: StateView): void;
}
