export { ConfigError, CONFIG_KEYS, DEFAULTS, ENV_MAP, isConfigKey, parseConfigValue } from "./defaults";
export type { ConfigData } from "./defaults";
export { readConfigFile, writeConfigFile, updateConfigFile, getConfigPath } from "./configFile";
export type { RawConfig } from "./configFile";
export { resolveConfig, resolveConfigWithSources } from "./resolve";
export type { ConfigSource, ResolveOptions, ResolvedConfig } from "./resolve";
