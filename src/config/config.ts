// pattern: Imperative Shell
import TOML from "@iarna/toml";
import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { AppConfigSchema, type AppConfig } from "./schema.ts";

export const DEFAULT_CONFIG_PATH = "config.toml";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(parsed: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = parsed[name];
  return isRecord(value) ? { ...value } : {};
}

export function loadConfig(configPath?: string): AppConfig {
  const resolvedPath = resolve(configPath ?? process.env["TOOLGATE_CONFIG"] ?? DEFAULT_CONFIG_PATH);

  let parsed: Record<string, unknown> = {};
  if (existsSync(resolvedPath)) {
    parsed = TOML.parse(readFileSync(resolvedPath, "utf-8"));
  } else {
    console.warn(`[config] ${resolvedPath} not found, using defaults`);
  }

  // Environment variable overrides for secrets
  const envOverrides: Record<string, unknown> = {};

  if (process.env["TAVILY_API_KEY"]) {
    envOverrides["search"] = { ...section(parsed, "search"), api_key: process.env["TAVILY_API_KEY"] };
  }

  if (process.env["TELEGRAM_BOT_TOKEN"]) {
    envOverrides["telegram"] = { ...section(parsed, "telegram"), bot_token: process.env["TELEGRAM_BOT_TOKEN"] };
  }

  const merged = { ...parsed, ...envOverrides };
  return AppConfigSchema.parse(merged);
}
