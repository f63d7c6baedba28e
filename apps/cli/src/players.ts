import { InvalidArgumentError } from "commander";
import { RandomSource, Token } from "@dropfour/core";
import { IAgent } from "@dropfour/engine";
import { AgentIO, CliAgent, RandomAgent } from "@dropfour/agents";

export type AgentKind = "human" | "random";

export interface PlayerSpec {
  token: Token;
  kind: AgentKind;
}

export const DEFAULT_PLAYERS: readonly PlayerSpec[] = [
  { token: "X", kind: "human" },
  { token: "O", kind: "random" },
];

/** Parse "<token>:<kind>", e.g. "X:human". */
export function parsePlayerSpec(raw: string): PlayerSpec {
  const sep = raw.lastIndexOf(":");
  const token = sep === -1 ? raw : raw.slice(0, sep);
  const kind = sep === -1 ? "random" : raw.slice(sep + 1);

  if (token === "") {
    throw new InvalidArgumentError(`Player "${raw}" has an empty token.`);
  }
  if (kind !== "human" && kind !== "random") {
    throw new InvalidArgumentError(`Player kind must be "human" or "random", got "${kind}".`);
  }
  return { token, kind };
}

/** commander option processor for a repeatable --player flag */
export function collectPlayer(raw: string, previous: PlayerSpec[]): PlayerSpec[] {
  return [...previous, parsePlayerSpec(raw)];
}

export function createAgents(
  specs: readonly PlayerSpec[],
  io: AgentIO,
  rngFor?: (token: Token) => RandomSource
): IAgent[] {
  return specs.map(({ token, kind }) => {
    switch (kind) {
      case "human":
        return new CliAgent(token, io);
      case "random":
        return new RandomAgent(token, rngFor?.(token));
    }
  });
}
