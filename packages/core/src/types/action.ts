export enum ActionType {
  PLACE = "place",
}

/** Drop a token into a column. Columns are indexed from 1. */
export interface PlaceAction {
  readonly type: ActionType.PLACE;
  readonly column: number;
}

export type Action = PlaceAction;

export function place(column: number): PlaceAction {
  return Object.freeze({ type: ActionType.PLACE, column });
}

/** Format an Action for move history, e.g. "column 4". */
export function formatAction(action: Action): string {
  switch (action.type) {
    case ActionType.PLACE:
      return `column ${action.column}`;
  }
}
