import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import { homedir } from "node:os";
import { CONFIG_KEYS, ConfigData, parseConfigValue } from "./defaults";
import log from "../logger";

const CONFIG_DIR = join(homedir(), ".dropfour");
const CONFIG_PATH = join(CONFIG_DIR, "config.json");

/** Values as stored on disk, before parsing */
export type RawConfig = Partial<Record<keyof ConfigData, string>>;

export function getConfigPath(): string {
  return CONFIG_PATH;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function readConfigFile(path: string = CONFIG_PATH): Promise<RawConfig> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      return {};
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    if (!(err instanceof SyntaxError)) {
      throw err;
    }
    log.warn({ path }, `Config file is malformed and was ignored. Run "dropfour config set" to recreate it.`);
    return {};
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    log.warn({ path }, "Config file does not hold an object and was ignored");
    return {};
  }

  const config: RawConfig = {};
  for (const key of CONFIG_KEYS) {
    const value: unknown = Object.getOwnPropertyDescriptor(parsed, key)?.value;
    if (typeof value === "string" || typeof value === "number") {
      config[key] = String(value);
    }
  }
  return config;
}

export async function writeConfigFile(data: RawConfig, path: string = CONFIG_PATH): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(data, null, 2) + "\n", "utf-8");
}

/** Validate `value` for `key`, then store it. Returns the file's new contents. */
export async function updateConfigFile(
  key: keyof ConfigData,
  value: string,
  path: string = CONFIG_PATH
): Promise<RawConfig> {
  const existing = await readConfigFile(path);
  existing[key] = String(parseConfigValue(key, value));
  await writeConfigFile(existing, path);
  return existing;
}
