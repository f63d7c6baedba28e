import { AgentResult, Cell, StateView } from "@dropfour/core";
import { Outcome } from "@dropfour/engine";

function symbolFor(cell: Cell): string {
  return cell === null ? " " : cell.charAt(0);
}

/**
 * Render a view as a box-drawn grid, top row first, with column numbers
 * (from 1) above it.
 */
export function renderBoard(view: StateView): string {
  const { rows, columns } = view.size;
  const rule = (left: string, join: string, right: string) =>
    left + new Array(columns).fill("───").join(join) + right;

  const lines: string[] = [];

  // Column headers
  const header = new Array(columns)
    .fill(0)
    .map((_, i) => String(i + 1).padStart(2).padEnd(3))
    .join(" ");
  lines.push((" " + header).trimEnd());

  lines.push(rule("┌", "┬", "┐"));
  for (let r = 0; r < rows; r++) {
    const cells = view.board
      .slice(r * columns, (r + 1) * columns)
      .map((cell) => ` ${symbolFor(cell)} `);
    lines.push("│" + cells.join("│") + "│");

    if (r < rows - 1) {
      lines.push(rule("├", "┼", "┤"));
    }
  }
  lines.push(rule("└", "┴", "┘"));

  return lines.join("\n");
}

/** One-line summary of how a game ended. */
export function describeOutcome(outcome: Outcome): string {
  const moves = outcome.record.length;
  switch (outcome.reason) {
    case "four_in_a_row":
      return `${outcome.winner} wins with four in a row after ${moves} moves`;
    case "board_full":
      return `Draw: the board filled up after ${moves} moves`;
    case "forfeit": {
      const loser = [...outcome.results].find(([, result]) => result === AgentResult.LOSE)?.[0];
      return `${loser?.token ?? "?"} forfeits after repeated moves into full columns`;
    }
    case null:
      return `Game in progress after ${moves} moves`;
  }
}
