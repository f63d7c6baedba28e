import { strict as assert } from "assert";
import { PassThrough } from "stream";
import { ActionError, AgentResult, RandomSource, SeededRng, StateView, place } from "@dropfour/core";
import { Game } from "@dropfour/engine";
import { CliAgent } from "./CliAgent";
import { RandomAgent } from "./RandomAgent";
import { ScriptedAgent } from "./ScriptedAgent";
import { AgentIO, createTerminalIO } from "./terminal";
import { describeOutcome, renderBoard } from "./ui";

const inOrder: RandomSource = { nextInt: () => 0, shuffle: <T>(arr: T[]) => arr };

function emptyView(rows: number, columns: number): StateView {
  return { size: { rows, columns }, board: new Array<null>(rows * columns).fill(null) };
}

class FakeIO implements AgentIO {
  readonly printed: string[] = [];
  readonly prompts: string[] = [];

  constructor(private readonly answers: string[]) {}

  async ask(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error("No more answers");
    }
    return answer;
  }

  print(text: string): void {
    this.printed.push(text);
  }
}

describe("RandomAgent", () => {
  // 2 rows x 3 columns with column 2 full
  const view: StateView = {
    size: { rows: 2, columns: 3 },
    board: [null, "X", null, null, "O", null],
  };

  it("should only choose open columns", () => {
    const agent = new RandomAgent("R", new SeededRng("test-seed"));
    for (let i = 0; i < 50; i++) {
      const action = agent.selectAction(view);
      assert.ok(action.column === 1 || action.column === 3);
    }
  });

  it("should index into the open columns with its random source", () => {
    const last: RandomSource = { nextInt: (max) => max - 1, shuffle: <T>(arr: T[]) => arr };
    assert.deepEqual(new RandomAgent("R", last).selectAction(view), place(3));
  });

  it("should fail loudly on a full board", () => {
    const full: StateView = { size: { rows: 1, columns: 2 }, board: ["X", "O"] };
    assert.throws(() => new RandomAgent("R").selectAction(full), /no open column/);
  });

  it("should finish a game against another random agent", async () => {
    const outcome = await new Game({
      agents: [new RandomAgent("X", new SeededRng("x")), new RandomAgent("O", new SeededRng("o"))],
      seed: "match",
    }).play();
    assert.equal(outcome.finished, true);
    assert.notEqual(outcome.reason, "forfeit");
  });
});

describe("ScriptedAgent", () => {
  it("should play its columns in order and then stop", () => {
    const agent = new ScriptedAgent("S", [3, 1]);
    const view = emptyView(6, 7);
    assert.equal(agent.selectAction(view).column, 3);
    assert.equal(agent.selectAction(view).column, 1);
    assert.equal(agent.remaining, 0);
    assert.throws(() => agent.selectAction(view), /ran out of moves after 2/);
  });

  it("should remember rejections and the outcome", async () => {
    const a = new ScriptedAgent("A", [1, 3]);
    const b = new ScriptedAgent("B", [1, 2, 4]);
    const outcome = await new Game({ agents: [a, b], rows: 1, columns: 4, rng: inOrder }).play();

    assert.deepEqual(b.rejections.map((e) => e.column), [1]);
    assert.equal(a.lastOutcome, outcome);
    assert.equal(b.lastOutcome, outcome);
  });
});

describe("CliAgent", () => {
  it("should keep asking until it gets a column on the board", async () => {
    const io = new FakeIO(["abc", "9", " 2 "]);
    const action = await new CliAgent("X", io).selectAction(emptyView(6, 7));

    assert.deepEqual(action, place(2));
    assert.deepEqual(io.prompts, ["X to play. ", "X to play. ", "X to play. "]);
    assert.deepEqual(io.printed.slice(1), [
      "Input could not be converted to an integer.",
      "Selected column lies outside the board. Columns are indexed from 1 to 7.",
    ]);
  });

  it("should show the board before asking", async () => {
    const io = new FakeIO(["1"]);
    const view = emptyView(2, 2);
    await new CliAgent("X", io).selectAction(view);
    assert.equal(io.printed[0], renderBoard(view));
  });

  it("should report the final result", async () => {
    const io = new FakeIO(["4", "4", "4", "4"]);
    const human = new CliAgent("X", io);
    const bot = new ScriptedAgent("O", [1, 1, 1]);
    await new Game({ agents: [human, bot], rng: inOrder }).play();

    assert.deepEqual(io.printed.slice(-2), ["X wins with four in a row after 7 moves", "X: win"]);
  });

  it("should print the message of a rejected move", () => {
    const io = new FakeIO([]);
    new CliAgent("X", io).notifyActionError(
      new ActionError("Cannot place a token in column 1. Column is full.", 1)
    );
    assert.deepEqual(io.printed, ["Cannot place a token in column 1. Column is full."]);
  });
});

describe("renderBoard", () => {
  it("should draw a grid with column numbers", () => {
    const view: StateView = { size: { rows: 2, columns: 2 }, board: [null, "X", "O", "X"] };
    assert.equal(
      renderBoard(view),
      ["  1   2", "┌───┬───┐", "│   │ X │", "├───┼───┤", "│ O │ X │", "└───┴───┘"].join("\n")
    );
  });

  it("should show the first character of each token", () => {
    const view: StateView = { size: { rows: 1, columns: 1 }, board: ["Red"] };
    assert.equal(renderBoard(view).split("\n")[2], "│ R │");
  });
});

describe("describeOutcome", () => {
  it("should describe a draw", async () => {
    const outcome = await new Game({
      agents: [new ScriptedAgent("A", [1, 3]), new ScriptedAgent("B", [2, 4])],
      rows: 1,
      columns: 4,
      rng: inOrder,
    }).play();
    assert.equal(describeOutcome(outcome), "Draw: the board filled up after 4 moves");
  });

  it("should name the agent that forfeited", async () => {
    const outcome = await new Game({
      agents: [new ScriptedAgent("A", [1]), new ScriptedAgent("B", [1, 1, 1])],
      rows: 1,
      columns: 5,
      rng: inOrder,
    }).play();
    assert.equal(outcome.resultFor("B"), AgentResult.LOSE);
    assert.equal(describeOutcome(outcome), "B forfeits after repeated moves into full columns");
  });
});

describe("createTerminalIO", () => {
  it("should resolve with the next line typed", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const io = createTerminalIO(input, output);

    const answer = io.ask("X to play. ");
    input.write("5\n");
    assert.equal(await answer, "5");

    io.close();
    await assert.rejects(io.ask("X to play. "), /Input closed/);
  });

  it("should reject a pending question when input closes", async () => {
    const io = createTerminalIO(new PassThrough(), new PassThrough());
    const pending = io.ask("X to play. ");
    io.close();
    await assert.rejects(pending, /before a move was entered/);
  });
});
