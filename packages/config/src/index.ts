export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { ObjectSource } from "./adapters/object/object-source"
export { Config } from "./core/config"
export { ConfigError } from "./core/config-error"
export { type LoadConfigOptions, loadConfig } from "./core/load"
export type { IConfig } from "./ports/config"
export type { ConfigSource } from "./ports/source"
