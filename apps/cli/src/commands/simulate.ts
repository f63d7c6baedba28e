import { Command } from "commander";
import { AgentResult, SeededRng, Token } from "@dropfour/core";
import { Game } from "@dropfour/engine";
import { RandomAgent } from "@dropfour/agents";
import Logger from "bunyan";
import { resolveConfig } from "../config";
import log from "../logger";
import { reportError } from "./errors";

export type Tally = Record<AgentResult, number>;

export interface SimulationOptions {
  tokens: readonly Token[];
  count: number;
  rows: number;
  columns: number;
  /** Base seed; game i and its agents derive their seeds from it */
  seed?: string;
  logger?: Logger;
}

/** Play `count` games between random agents and count each token's results. */
export async function runSimulation(opts: SimulationOptions): Promise<Map<Token, Tally>> {
  const tally = new Map<Token, Tally>();
  for (const token of opts.tokens) {
    tally.set(token, { [AgentResult.WIN]: 0, [AgentResult.LOSE]: 0, [AgentResult.DRAW]: 0 });
  }

  for (let i = 0; i < opts.count; i++) {
    const { seed } = opts;
    const agents = opts.tokens.map(
      (token) => new RandomAgent(token, seed === undefined ? undefined : new SeededRng(`${seed}-${token}-${i}`))
    );
    const outcome = await new Game({
      agents,
      rows: opts.rows,
      columns: opts.columns,
      seed: seed === undefined ? undefined : `${seed}-${i}`,
      logger: opts.logger,
    }).play();

    for (const [agent, result] of outcome.results) {
      const counts = tally.get(agent.token);
      if (counts && result !== null) {
        counts[result]++;
      }
    }
  }

  return tally;
}

export function formatTally(token: Token, counts: Tally): string {
  return `${token}: ${counts[AgentResult.WIN]}W / ${counts[AgentResult.LOSE]}L / ${counts[AgentResult.DRAW]}D`;
}

interface SimulateCommandOptions {
  count: string;
  tokens: string;
  rows?: string;
  columns?: string;
  seed?: string;
}

export function registerSimulateCommand(program: Command): void {
  program
    .command("simulate")
    .description("Play random agents against each other and tally the results")
    .option("-n, --count <N>", "Number of games to play", "100")
    .option("-t, --tokens <list>", "Comma-separated player tokens", "X,O")
    .option("--rows <n>", "Board rows")
    .option("--columns <n>", "Board columns")
    .option("--seed <seed>", "Base seed, for repeatable runs")
    .action(async (opts: SimulateCommandOptions) => {
      try {
        const config = await resolveConfig({
          overrides: { rows: opts.rows, columns: opts.columns },
        });
        log.level(config.logLevel);

        const count = parseInt(opts.count, 10);
        if (!Number.isInteger(count) || count < 1) {
          throw new Error(`Invalid game count: "${opts.count}"`);
        }
        // Per-game info lines would drown the tally
        const gameLog = log.child({ command: "simulate" });
        if (gameLog.level() === Logger.INFO) {
          gameLog.level(Logger.WARN);
        }

        const tokens = opts.tokens.split(",").map((t) => t.trim()).filter((t) => t !== "");

        const tally = await runSimulation({
          tokens,
          count,
          rows: config.rows,
          columns: config.columns,
          seed: opts.seed,
          logger: gameLog,
        });

        console.log(`\nResults over ${count} games:`);
        for (const [token, counts] of tally) {
          console.log(`  ${formatTally(token, counts)}`);
        }
      } catch (err) {
        reportError(err);
      }
    });
}
