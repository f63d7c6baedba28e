import {
  Action,
  ActionType,
  BoardSize,
  PlaceAction,
  ProtocolError,
  Token,
  isValidColumn,
  place,
} from "@dropfour/core";
import { Placement, State } from "./State";

function parsePlace(raw: object, size: BoardSize): PlaceAction {
  if (!("column" in raw) || typeof raw.column !== "number" || !Number.isInteger(raw.column)) {
    throw new ProtocolError("A place action must carry an integer column");
  }
  if (!isValidColumn(size, raw.column)) {
    throw new ProtocolError(
      `Column ${raw.column} lies outside the closed interval [1, ${size.columns}]`
    );
  }
  return place(raw.column);
}

/**
 * Check the shape of whatever an agent returned from selectAction.
 * Anything that could never be legal on this board is a ProtocolError;
 * whether the move fits the current position is left to the State.
 */
export function parseAction(raw: unknown, size: BoardSize): Action {
  if (typeof raw !== "object" || raw === null || !("type" in raw)) {
    throw new ProtocolError("Agent.selectAction() must return an action object");
  }

  switch (raw.type) {
    case ActionType.PLACE:
      return parsePlace(raw, size);
    default:
      throw new ProtocolError(`Unsupported action type: ${String(raw.type)}`);
  }
}

/** Apply an already-validated action to the board. */
export function applyAction(state: State, token: Token, action: Action): Placement {
  switch (action.type) {
    case ActionType.PLACE:
      return state.place(action.column, token);
  }
}
