import { strict as assert } from "assert";
import { AgentResult } from "@dropfour/core";
import { formatTally, runSimulation } from "./simulate";

describe("runSimulation", () => {
  const opts = { tokens: ["X", "O"], count: 5, rows: 6, columns: 7, seed: "test-seed" };

  it("should record one result per token per game", async () => {
    const tally = await runSimulation(opts);
    const x = tally.get("X") ?? assert.fail("no tally for X");
    const o = tally.get("O") ?? assert.fail("no tally for O");
    const total = (t: typeof x) => t[AgentResult.WIN] + t[AgentResult.LOSE] + t[AgentResult.DRAW];

    assert.equal(total(x), 5);
    assert.equal(total(o), 5);
    assert.equal(x[AgentResult.WIN], o[AgentResult.LOSE]);
    assert.equal(x[AgentResult.DRAW], o[AgentResult.DRAW]);
  });

  it("should repeat itself for the same seed", async () => {
    assert.deepEqual(await runSimulation(opts), await runSimulation(opts));
  });
});

describe("formatTally", () => {
  it("should show wins, losses and draws", () => {
    assert.equal(formatTally("X", { [AgentResult.WIN]: 3, [AgentResult.LOSE]: 1, [AgentResult.DRAW]: 2 }), "X: 3W / 1L / 2D");
  });
});
