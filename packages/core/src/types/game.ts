/** External identifier of an agent's pieces. Supplied by the caller, one per agent. */
export type Token = string;

/** A cell as agents see it: the owning token, or null when empty. */
export type Cell = Token | null;

export interface BoardSize {
  readonly rows: number;
  readonly columns: number;
}

/**
 * Read-only snapshot of the board handed to an agent.
 * `board` is row-major, top row first, `rows * columns` long.
 */
export interface StateView {
  readonly size: BoardSize;
  readonly board: readonly Cell[];
}

export enum AgentResult {
  WIN = "win",
  LOSE = "lose",
  DRAW = "draw",
}

export type OutcomeReason = "four_in_a_row" | "board_full" | "forfeit";
