import { Command } from "commander";
import {
  CONFIG_KEYS,
  ENV_MAP,
  getConfigPath,
  isConfigKey,
  resolveConfigWithSources,
  updateConfigFile,
} from "../config";
import { reportError } from "./errors";

function unknownKey(key: string): Error {
  return new Error(`Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`);
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description("Manage configuration (~/.dropfour/config.json)");

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action(async (key: string, value: string) => {
      try {
        if (!isConfigKey(key)) {
          throw unknownKey(key);
        }
        const saved = await updateConfigFile(key, value);
        console.log(`Set ${key} = ${saved[key]}`);
      } catch (err) {
        reportError(err);
      }
    });

  configCmd
    .command("get <key>")
    .description("Get a resolved config value")
    .action(async (key: string) => {
      try {
        if (!isConfigKey(key)) {
          throw unknownKey(key);
        }
        const { values } = await resolveConfigWithSources();
        console.log(String(values[key]));
      } catch (err) {
        reportError(err);
      }
    });

  configCmd
    .command("list")
    .description("List all config values with their sources")
    .action(async () => {
      try {
        const { values, sources } = await resolveConfigWithSources();
        console.log(`\nConfig file: ${getConfigPath()}\n`);
        for (const key of CONFIG_KEYS) {
          console.log(`  ${key.padEnd(12)} ${String(values[key]).padEnd(8)} (${sources[key]}, env ${ENV_MAP[key]})`);
        }
        console.log("");
      } catch (err) {
        reportError(err);
      }
    });
}
