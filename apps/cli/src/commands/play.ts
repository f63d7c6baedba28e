import { Command } from "commander";
import { Game, replay } from "@dropfour/engine";
import { CliAgent, createTerminalIO, describeOutcome, renderBoard } from "@dropfour/agents";
import { resolveConfig } from "../config";
import { DEFAULT_PLAYERS, PlayerSpec, collectPlayer, createAgents } from "../players";
import log from "../logger";
import { reportError } from "./errors";

interface PlayCommandOptions {
  player: PlayerSpec[];
  rows?: string;
  columns?: string;
  seed?: string;
  maxAttempts?: string;
}

export function registerPlayCommand(program: Command): void {
  program
    .command("play")
    .description("Play a game at the terminal")
    .option(
      "-p, --player <token:kind>",
      'Add a player, kind "human" or "random" (repeat per player; default X:human O:random)',
      collectPlayer,
      []
    )
    .option("--rows <n>", "Board rows")
    .option("--columns <n>", "Board columns")
    .option("--seed <seed>", "Seed for the turn order")
    .option("--max-attempts <n>", "Moves into full columns allowed per turn before forfeiting")
    .action(async (opts: PlayCommandOptions) => {
      const io = createTerminalIO();
      try {
        const config = await resolveConfig({
          overrides: { rows: opts.rows, columns: opts.columns, maxAttempts: opts.maxAttempts },
        });
        log.level(config.logLevel);

        const agents = createAgents(opts.player.length > 0 ? opts.player : DEFAULT_PLAYERS, io);
        const game = new Game({
          agents,
          rows: config.rows,
          columns: config.columns,
          seed: opts.seed,
          maxAttemptsPerTurn: config.maxAttempts,
          logger: log,
        });

        const outcome = await game.play();

        // Human agents print the final board themselves
        if (!agents.some((agent) => agent instanceof CliAgent)) {
          io.print(renderBoard(replay(outcome).exposeView()));
          io.print(describeOutcome(outcome));
        }
        io.print("");
        io.print(outcome.toString());
      } catch (err) {
        reportError(err);
      } finally {
        io.close();
      }
    });
}
