import { randomBytes } from "node:crypto";
import { Action, RandomSource, SeededRng, StateView, Token, openColumns, place } from "@dropfour/core";
import { IAgent } from "@dropfour/engine";

/** Drops into a uniformly chosen open column. */
export class RandomAgent implements IAgent {
  readonly token: Token;
  private readonly rng: RandomSource;

  constructor(token: Token, rng: RandomSource = new SeededRng(randomBytes(8).toString("hex"))) {
    this.token = token;
    this.rng = rng;
  }

  selectAction(view: StateView): Action {
    const open = openColumns(view);
    if (open.length === 0) {
      throw new Error(`${this.token} has no open column to play`);
    }
    return place(open[this.rng.nextInt(open.length)]);
  }

  notifyOutcome(): void {}
}
