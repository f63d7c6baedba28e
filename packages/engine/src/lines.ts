import { BoardSize } from "@dropfour/core";

export const LINE_LENGTH = 4;

export enum LineDirection {
  HORIZONTAL = "horizontal",
  VERTICAL = "vertical",
  /** Down and to the right: \ */
  DIAGONAL_DOWN_RIGHT = "diagonal_down_right",
  /** Down and to the left: / */
  DIAGONAL_DOWN_LEFT = "diagonal_down_left",
}

/** A run of LINE_LENGTH cells, as indices into the row-major board. */
export interface Line {
  direction: LineDirection;
  cells: readonly number[];
}

function lineFrom(direction: LineDirection, start: number, step: number): Line {
  const cells: number[] = [];
  for (let i = 0; i < LINE_LENGTH; i++) {
    cells.push(start + i * step);
  }
  return { direction, cells };
}

/**
 * Enumerate every line on a board exactly once.
 * Order is rows, columns, then the two diagonals; within each family,
 * top to bottom and left to right by starting cell.
 */
export function* generateLines({ rows, columns }: BoardSize): Generator<Line> {
  const span = LINE_LENGTH - 1;

  for (let r = 0; r < rows; r++) {
    for (let c = 0; c + span < columns; c++) {
      yield lineFrom(LineDirection.HORIZONTAL, r * columns + c, 1);
    }
  }

  for (let r = 0; r + span < rows; r++) {
    for (let c = 0; c < columns; c++) {
      yield lineFrom(LineDirection.VERTICAL, r * columns + c, columns);
    }
  }

  for (let r = 0; r + span < rows; r++) {
    for (let c = 0; c + span < columns; c++) {
      yield lineFrom(LineDirection.DIAGONAL_DOWN_RIGHT, r * columns + c, columns + 1);
    }
  }

  for (let r = 0; r + span < rows; r++) {
    for (let c = span; c < columns; c++) {
      yield lineFrom(LineDirection.DIAGONAL_DOWN_LEFT, r * columns + c, columns - 1);
    }
  }
}
