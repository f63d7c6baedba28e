import {
  Action,
  AgentResult,
  BoardSize,
  OutcomeReason,
  RecordEntry,
  Token,
  formatAction,
  linkHash,
} from "@dropfour/core";
import type { IAgent } from "./interfaces/IAgent";

export interface GameSetup {
  size: BoardSize;
  /** Tokens in the order agents take turns */
  turnOrder: readonly Token[];
  /** Seed behind the turn order, or null when a custom RandomSource was supplied */
  seed: string | null;
}

/**
 * Per-agent results plus the ordered record of applied actions.
 * Created when a game starts, finalized exactly once when it ends.
 *
 * Each record entry is hash-chained to the previous one (starting from the
 * hash of the setup), so rootHash identifies the whole game for replay checks.
 */
export class Outcome {
  readonly size: BoardSize;
  readonly turnOrder: readonly Token[];
  readonly seed: string | null;

  private readonly resultsByAgent = new Map<IAgent, AgentResult | null>();
  private readonly entries: RecordEntry[] = [];
  private currentHash: string;
  private _reason: OutcomeReason | null = null;
  private _winner: Token | null = null;
  private _winningLine: readonly number[] | null = null;

  constructor(agents: readonly IAgent[], setup: GameSetup) {
    this.size = setup.size;
    this.turnOrder = Object.freeze([...setup.turnOrder]);
    this.seed = setup.seed;
    this.currentHash = linkHash(null, setup);
    for (const agent of agents) {
      this.resultsByAgent.set(agent, null);
    }
  }

  /** A copy: the same Outcome is handed to every agent */
  get results(): ReadonlyMap<IAgent, AgentResult | null> {
    return new Map(this.resultsByAgent);
  }

  get record(): readonly RecordEntry[] {
    return this.entries;
  }

  get reason(): OutcomeReason | null {
    return this._reason;
  }

  get winner(): Token | null {
    return this._winner;
  }

  /** Board indices of the four-in-a-row, when the game was won on the board */
  get winningLine(): readonly number[] | null {
    return this._winningLine;
  }

  get finished(): boolean {
    return this._reason !== null;
  }

  get rootHash(): string {
    return this.currentHash;
  }

  resultFor(token: Token): AgentResult | null {
    for (const [agent, result] of this.resultsByAgent) {
      if (agent.token === token) {
        return result;
      }
    }
    throw new Error(`No agent with token ${token} took part in this game`);
  }

  append(token: Token, action: Action): RecordEntry {
    this.assertOpen();
    const entry: RecordEntry = Object.freeze({
      sequence: this.entries.length,
      token,
      action,
      prevHash: this.currentHash,
    });
    this.currentHash = linkHash(this.currentHash, entry);
    this.entries.push(entry);
    return entry;
  }

  finalizeWin(token: Token, line: readonly number[]): void {
    this.finalize("four_in_a_row", (agent) =>
      agent.token === token ? AgentResult.WIN : AgentResult.LOSE
    );
    this._winner = token;
    this._winningLine = Object.freeze([...line]);
  }

  finalizeDraw(): void {
    this.finalize("board_full", () => AgentResult.DRAW);
  }

  /** `token` gave up its turn; everyone else wins. */
  finalizeForfeit(token: Token): void {
    this.finalize("forfeit", (agent) =>
      agent.token === token ? AgentResult.LOSE : AgentResult.WIN
    );
    const others = this.turnOrder.filter((t) => t !== token);
    this._winner = others.length === 1 ? others[0] : null;
  }

  toString(): string {
    return [
      "Agent outcomes",
      ...Array.from(this.resultsByAgent, ([agent, result]) => `${agent.token}: ${result ?? "pending"}`),
      "Action record",
      ...this.entries.map((entry) => `${entry.token}, ${formatAction(entry.action)}`),
    ].join("\n");
  }

  private finalize(reason: OutcomeReason, resultOf: (agent: IAgent) => AgentResult): void {
    this.assertOpen();
    for (const agent of this.resultsByAgent.keys()) {
      this.resultsByAgent.set(agent, resultOf(agent));
    }
    this._reason = reason;
    Object.freeze(this.entries);
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new Error("Outcome is already final");
    }
  }
}
