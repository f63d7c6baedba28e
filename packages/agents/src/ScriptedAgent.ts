import { Action, ActionError, StateView, Token, place } from "@dropfour/core";
import { IAgent, Outcome } from "@dropfour/engine";

/**
 * Plays a fixed list of columns in order. Useful for replays and tests.
 * Rejected columns still use up a move.
 */
export class ScriptedAgent implements IAgent {
  readonly token: Token;
  readonly rejections: ActionError[] = [];
  lastOutcome: Outcome | null = null;
  private readonly columns: readonly number[];
  private cursor = 0;

  constructor(token: Token, columns: readonly number[]) {
    this.token = token;
    this.columns = [...columns];
  }

  get remaining(): number {
    return this.columns.length - this.cursor;
  }

  selectAction(_view: StateView): Action {
    if (this.cursor >= this.columns.length) {
      throw new Error(`Scripted agent ${this.token} ran out of moves after ${this.columns.length}`);
    }
    return place(this.columns[this.cursor++]);
  }

  notifyActionError(error: ActionError): void {
    this.rejections.push(error);
  }

  notifyOutcome(outcome: Outcome): void {
    this.lastOutcome = outcome;
  }
}
