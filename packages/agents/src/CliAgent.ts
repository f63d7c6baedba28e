import { Action, ActionError, StateView, Token, isValidColumn, place } from "@dropfour/core";
import { IAgent, Outcome, replay } from "@dropfour/engine";
import { AgentIO } from "./terminal";
import { describeOutcome, renderBoard } from "./ui";

const INTEGER_RE = /^[+-]?\d+$/;

/** A human at a terminal. Prints the board and asks for a column each turn. */
export class CliAgent implements IAgent {
  readonly token: Token;
  private readonly io: AgentIO;

  constructor(token: Token, io: AgentIO) {
    this.token = token;
    this.io = io;
  }

  async selectAction(view: StateView): Promise<Action> {
    this.io.print(renderBoard(view));

    for (;;) {
      const raw = (await this.io.ask(`${this.token} to play. `)).trim();
      if (!INTEGER_RE.test(raw)) {
        this.io.print("Input could not be converted to an integer.");
        continue;
      }
      const column = parseInt(raw, 10);
      if (!isValidColumn(view.size, column)) {
        this.io.print(
          `Selected column lies outside the board. Columns are indexed from 1 to ${view.size.columns}.`
        );
        continue;
      }
      return place(column);
    }
  }

  notifyActionError(error: ActionError): void {
    this.io.print(error.message);
  }

  notifyOutcome(outcome: Outcome): void {
    this.io.print(renderBoard(replay(outcome).exposeView()));
    this.io.print(describeOutcome(outcome));
    this.io.print(`${this.token}: ${outcome.resultFor(this.token) ?? "pending"}`);
  }
}
