// pattern: Functional Core (barrel export)

export type { AppConfig, DispatchConfig, SearchConfig, TelegramConfig, AgentConfig } from "./schema.ts";
export { AppConfigSchema } from "./schema.ts";
export { loadConfig, DEFAULT_CONFIG_PATH } from "./config.ts";
