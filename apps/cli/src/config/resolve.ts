import { CONFIG_KEYS, ConfigData, DEFAULTS, ENV_MAP, parseConfigValue } from "./defaults";
import { RawConfig, readConfigFile } from "./configFile";

export type ConfigSource = "default" | "file" | "env" | "cli";

export interface ResolveOptions {
  /** Config file to read instead of ~/.dropfour/config.json */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Values from command-line flags; undefined entries are skipped */
  overrides?: RawConfig;
}

export interface ResolvedConfig {
  values: ConfigData;
  sources: Record<keyof ConfigData, ConfigSource>;
}

function assign<K extends keyof ConfigData>(target: ConfigData, key: K, raw: string): void {
  target[key] = parseConfigValue(key, raw);
}

/**
 * Merge defaults, the config file, environment variables and command-line
 * overrides, later layers winning. Empty strings count as unset.
 */
export async function resolveConfigWithSources(opts: ResolveOptions = {}): Promise<ResolvedConfig> {
  const env = opts.env ?? process.env;
  const overrides = opts.overrides ?? {};
  const fileConfig = await readConfigFile(opts.configPath);

  const values: ConfigData = { ...DEFAULTS };
  const sources: Record<keyof ConfigData, ConfigSource> = {
    rows: "default",
    columns: "default",
    maxAttempts: "default",
    logLevel: "default",
  };

  for (const key of CONFIG_KEYS) {
    const layers: [ConfigSource, string | undefined][] = [
      ["file", fileConfig[key]],
      ["env", env[ENV_MAP[key]]],
      ["cli", overrides[key]],
    ];
    for (const [source, raw] of layers) {
      if (raw !== undefined && raw !== "") {
        assign(values, key, raw);
        sources[key] = source;
      }
    }
  }

  return { values, sources };
}

export async function resolveConfig(opts: ResolveOptions = {}): Promise<ConfigData> {
  return (await resolveConfigWithSources(opts)).values;
}
