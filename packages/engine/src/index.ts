export { Game, GamePhase, DEFAULT_ROWS, DEFAULT_COLUMNS, DEFAULT_MAX_ATTEMPTS_PER_TURN } from "./Game";
export type { GameOptions } from "./Game";
export { State, assertBoardSize } from "./State";
export type { Placement, BoardStatus } from "./State";
export { Outcome } from "./Outcome";
export type { GameSetup } from "./Outcome";
export { generateLines, LineDirection, LINE_LENGTH } from "./lines";
export type { Line } from "./lines";
export { parseAction, applyAction } from "./actions";
export { replay } from "./replay";
export type { IAgent } from "./interfaces/IAgent";
