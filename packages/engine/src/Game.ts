import { randomBytes } from "node:crypto";
import type Logger from "bunyan";
import {
  Action,
  ActionError,
  BoardSize,
  GameConfigError,
  RandomSource,
  SeededRng,
  Token,
} from "@dropfour/core";
import { IAgent } from "./interfaces/IAgent";
import { Outcome } from "./Outcome";
import { MAX_TOKENS, State, assertBoardSize } from "./State";
import { applyAction, parseAction } from "./actions";

export const DEFAULT_ROWS = 6;
export const DEFAULT_COLUMNS = 7;
export const DEFAULT_MAX_ATTEMPTS_PER_TURN = 3;

export enum GamePhase {
  NOT_STARTED = "not_started",
  IN_PROGRESS = "in_progress",
  WON = "won",
  DRAWN = "drawn",
  FORFEITED = "forfeited",
}

export interface GameOptions {
  agents: readonly IAgent[];
  rows?: number;
  columns?: number;
  /** Seed for the turn-order shuffle. A random one is drawn when omitted. */
  seed?: string;
  /** Overrides `seed` entirely */
  rng?: RandomSource;
  /**
   * How many times an agent is asked for an action in one turn before it
   * forfeits. Only actions rejected by the board (a full column) count.
   */
  maxAttemptsPerTurn?: number;
  logger?: Logger;
}

/**
 * Referee for a single game: fixes the turn order, asks each agent for an
 * action in turn, validates and applies it, and reports the outcome to
 * every agent once the game ends.
 */
export class Game {
  readonly size: BoardSize;
  private readonly agents: readonly IAgent[];
  private readonly rng: RandomSource;
  private readonly seed: string | null;
  private readonly maxAttemptsPerTurn: number;
  private readonly log?: Logger;
  private _phase = GamePhase.NOT_STARTED;

  constructor(opts: GameOptions) {
    const { agents } = opts;
    if (agents.length < 2) {
      throw new GameConfigError(`A game needs at least 2 agents, got ${agents.length}`);
    }
    if (agents.length > MAX_TOKENS) {
      throw new GameConfigError(`A game takes at most ${MAX_TOKENS} agents, got ${agents.length}`);
    }
    const tokens = new Set<Token>();
    for (const agent of agents) {
      if (agent.token === "") {
        throw new GameConfigError("Agent tokens must not be empty");
      }
      if (tokens.has(agent.token)) {
        throw new GameConfigError(`Duplicate agent token: ${agent.token}`);
      }
      tokens.add(agent.token);
    }

    const size = { rows: opts.rows ?? DEFAULT_ROWS, columns: opts.columns ?? DEFAULT_COLUMNS };
    assertBoardSize(size);

    const maxAttempts = opts.maxAttemptsPerTurn ?? DEFAULT_MAX_ATTEMPTS_PER_TURN;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new GameConfigError(
        `maxAttemptsPerTurn must be a strictly positive integer, got ${maxAttempts}`
      );
    }

    this.agents = [...agents];
    this.size = Object.freeze(size);
    this.maxAttemptsPerTurn = maxAttempts;
    this.log = opts.logger;

    if (opts.rng) {
      this.rng = opts.rng;
      this.seed = null;
    } else {
      this.seed = opts.seed ?? randomBytes(8).toString("hex");
      this.rng = new SeededRng(this.seed);
    }
  }

  get phase(): GamePhase {
    return this._phase;
  }

  /**
   * Play the game to the end. Resolves with the final Outcome after every
   * agent has been notified. Rejects with a ProtocolError if an agent returns
   * a malformed action; errors thrown by agents propagate unchanged.
   */
  async play(): Promise<Outcome> {
    if (this._phase !== GamePhase.NOT_STARTED) {
      throw new Error("Game has already been played");
    }
    this._phase = GamePhase.IN_PROGRESS;

    const order = this.rng.shuffle([...this.agents]);
    const state = new State(
      this.agents.map((agent) => agent.token),
      this.size
    );
    const outcome = new Outcome(this.agents, {
      size: this.size,
      turnOrder: order.map((agent) => agent.token),
      seed: this.seed,
    });

    this.log?.info(
      { rows: this.size.rows, columns: this.size.columns, turnOrder: outcome.turnOrder, seed: this.seed },
      "Game started"
    );

    for (let turn = 0; this._phase === GamePhase.IN_PROGRESS; turn++) {
      const agent = order[turn % order.length];
      const action = await this.takeTurn(agent, state);

      if (action === null) {
        this.log?.warn({ token: agent.token, attempts: this.maxAttemptsPerTurn }, "Agent forfeited");
        outcome.finalizeForfeit(agent.token);
        this._phase = GamePhase.FORFEITED;
        break;
      }

      outcome.append(agent.token, action);
      const status = state.checkOutcome();

      switch (status.kind) {
        case "win":
          outcome.finalizeWin(status.token, status.line.cells);
          this._phase = GamePhase.WON;
          break;
        case "draw":
          outcome.finalizeDraw();
          this._phase = GamePhase.DRAWN;
          break;
        case "unfinished":
          break;
      }
    }

    this.log?.info(
      { reason: outcome.reason, winner: outcome.winner, moves: outcome.record.length },
      "Game finished"
    );

    for (const agent of this.agents) {
      agent.notifyOutcome(outcome);
    }
    return outcome;
  }

  /**
   * Ask `agent` for actions until one is accepted by the board.
   * Returns null once maxAttemptsPerTurn actions have been rejected.
   */
  private async takeTurn(agent: IAgent, state: State): Promise<Action | null> {
    for (let attempt = 1; attempt <= this.maxAttemptsPerTurn; attempt++) {
      const view = state.exposeView();
      const action = parseAction(await agent.selectAction(view), this.size);

      try {
        const placement = applyAction(state, agent.token, action);
        this.log?.debug({ token: agent.token, ...placement }, "Token placed");
        return action;
      } catch (err) {
        if (!(err instanceof ActionError)) {
          throw err;
        }
        this.log?.warn({ token: agent.token, column: err.column, attempt }, err.message);
        agent.notifyActionError?.(err, view);
      }
    }
    return null;
  }
}
