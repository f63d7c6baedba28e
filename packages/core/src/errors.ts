/**
 * An action that is invalid given the current board, such as placing into a
 * full column. The game may re-prompt the agent after one of these.
 */
export class ActionError extends Error {
  readonly column: number;

  constructor(message: string, column: number) {
    super(message);
    this.name = "ActionError";
    this.column = column;
  }
}

/**
 * An agent broke the action contract: unknown action type, a column that is
 * not an integer or lies outside the board, or a return value that is not an
 * action at all. Always fatal.
 */
export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolError";
  }
}

/** Invalid arguments when constructing a game or its state. */
export class GameConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GameConfigError";
  }
}
