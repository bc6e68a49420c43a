export { ConfigError } from "./ConfigError.js";
export type { ConfigIssue } from "./ConfigError.js";
export { parseConfig, loadConfigFromEnv } from "./loadConfig.js";
export type { EnvSource, EnvMapping } from "./loadConfig.js";
