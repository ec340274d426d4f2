export * from "./campaign/index.ts";
export * from "./cache/index.ts";
export * from "./store/index.ts";
export * from "./generation/index.ts";
export * from "./prompts/index.ts";
export * from "./agents/index.ts";
export * from "./assets/index.ts";
export * from "./runtime/index.ts";
export * from "./observability/index.ts";

export { loadConfig, ConfigError, type RuntimeConfig } from "./config.ts";
export { bootstrap, type Application, type BootstrapOverrides } from "./bootstrap.ts";
