import { BoardSize, Cell, StateView } from "./types/game";

/** True if `column` is an integer within [1, size.columns]. */
export function isValidColumn(size: BoardSize, column: number): boolean {
  return Number.isInteger(column) && column >= 1 && column <= size.columns;
}

/**
 * Read a cell from a view. Rows and columns are both indexed from 1,
 * row 1 being the top of the board.
 */
export function cellAt(view: StateView, row: number, column: number): Cell {
  const { rows, columns } = view.size;
  if (!Number.isInteger(row) || row < 1 || row > rows || !isValidColumn(view.size, column)) {
    throw new RangeError(`Cell (${row}, ${column}) lies outside a ${rows}x${columns} board`);
  }
  return view.board[(row - 1) * columns + column - 1];
}

/** Columns (from 1) that can still take a token, i.e. whose top cell is empty. */
export function openColumns(view: StateView): number[] {
  const open: number[] = [];
  for (let column = 1; column <= view.size.columns; column++) {
    if (view.board[column - 1] === null) {
      open.push(column);
    }
  }
  return open;
}
