export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { ConfigError, type ConfigIssue } from "./core/config-error"
export { type LoadConfigOptions, loadConfig } from "./core/load"
export type { ConfigSource } from "./ports/source"
