import {
  ActionError,
  BoardSize,
  GameConfigError,
  StateView,
  Token,
  isValidColumn,
} from "@dropfour/core";
import { Line, generateLines } from "./lines";

/** Internal id of an empty cell. Tokens map to 1..n. */
const EMPTY = 0;
export const MAX_TOKENS = 255;

export interface Placement {
  /** Row from the top, indexed from 1 */
  row: number;
  /** Column, indexed from 1 */
  column: number;
}

export type BoardStatus =
  | { kind: "unfinished" }
  | { kind: "win"; token: Token; line: Line }
  | { kind: "draw" };

export function assertBoardSize(size: BoardSize): void {
  for (const [name, value] of Object.entries(size)) {
    if (!Number.isInteger(value) || value < 1) {
      throw new GameConfigError(
        `Board ${name} must be a strictly positive integer, got ${String(value)}`
      );
    }
  }
}

/**
 * Authoritative board for one game. Never handed to agents directly;
 * they receive the snapshot produced by exposeView().
 */
export class State {
  readonly size: BoardSize;
  private readonly board: Uint8Array;
  private readonly idByToken = new Map<Token, number>();
  private readonly tokenById = new Map<number, Token>();

  constructor(tokens: readonly Token[], size: BoardSize) {
    assertBoardSize(size);
    if (tokens.length > MAX_TOKENS) {
      throw new GameConfigError(`At most ${MAX_TOKENS} tokens are supported, got ${tokens.length}`);
    }

    tokens.forEach((token, index) => {
      if (this.idByToken.has(token)) {
        throw new GameConfigError(`Duplicate token: ${token}`);
      }
      this.idByToken.set(token, index + 1);
      this.tokenById.set(index + 1, token);
    });

    this.size = Object.freeze({ rows: size.rows, columns: size.columns });
    this.board = new Uint8Array(size.rows * size.columns);
  }

  /**
   * Drop `token` into `column` (from 1). It lands in the lowest empty cell.
   * Throws ActionError if the column does not exist or is full.
   */
  place(column: number, token: Token): Placement {
    const id = this.idByToken.get(token);
    if (id === undefined) {
      throw new Error(`Token ${token} is not part of this game`);
    }
    if (!isValidColumn(this.size, column)) {
      throw new ActionError(
        `Cannot place a token in column ${column}. Columns are indexed from 1 to ${this.size.columns}.`,
        column
      );
    }

    const { rows, columns } = this.size;
    for (let r = rows - 1; r >= 0; r--) {
      const index = r * columns + column - 1;
      if (this.board[index] === EMPTY) {
        this.board[index] = id;
        return { row: r + 1, column };
      }
    }

    throw new ActionError(`Cannot place a token in column ${column}. Column is full.`, column);
  }

  checkOutcome(): BoardStatus {
    for (const line of generateLines(this.size)) {
      const first = this.board[line.cells[0]];
      if (first !== EMPTY && line.cells.every((cell) => this.board[cell] === first)) {
        return { kind: "win", token: this.tokenOf(first), line };
      }
    }

    if (this.isFull()) {
      return { kind: "draw" };
    }
    return { kind: "unfinished" };
  }

  isFull(): boolean {
    return !this.board.includes(EMPTY);
  }

  exposeView(): StateView {
    const board = Array.from(this.board, (id) => (id === EMPTY ? null : this.tokenOf(id)));
    return Object.freeze({ size: this.size, board: Object.freeze(board) });
  }

  private tokenOf(id: number): Token {
    const token = this.tokenById.get(id);
    if (token === undefined) {
      throw new Error(`No token mapped to internal id ${id}`);
    }
    return token;
  }
}
