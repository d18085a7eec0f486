// pattern: Imperative Shell

import type { SettingDefinition, SettingValue, SettingsStore } from './types.ts';

export const DEFAULT_SETTING_DEFINITIONS: ReadonlyArray<SettingDefinition> = [
  { key: 'active_agent', kind: 'string', description: 'Name of the agent answering requests', secret: false },
  { key: 'wake_word', kind: 'string', description: 'Default wake word for new agents', secret: false },
  { key: 'telegram_enabled', kind: 'boolean', description: 'Whether the Telegram bot is enabled', secret: false },
  { key: 'telegram_bot_token', kind: 'string', description: 'Telegram Bot API token', secret: true },
  { key: 'tavily_api_key', kind: 'string', description: 'Tavily web search API key', secret: true },
  { key: 'search_max_results', kind: 'number', description: 'Results returned by web.search', secret: false },
];

function matchesKind(definition: SettingDefinition, value: SettingValue): boolean {
  return typeof value === definition.kind;
}

export function createInMemorySettingsStore(
  initial: Record<string, SettingValue> = {},
  definitions: ReadonlyArray<SettingDefinition> = DEFAULT_SETTING_DEFINITIONS,
): SettingsStore {
  const byKey = new Map(definitions.map((definition) => [definition.key, definition]));
  const values = new Map<string, SettingValue>();

  function set(key: string, value: SettingValue): void {
    const definition = byKey.get(key);
    if (!definition) {
      throw new Error(`unknown setting: ${key}`);
    }
    if (!matchesKind(definition, value)) {
      throw new Error(`setting ${key} expects a ${definition.kind}, got ${typeof value}`);
    }
    values.set(key, value);
  }

  for (const [key, value] of Object.entries(initial)) {
    set(key, value);
  }

  return {
    definitions(): ReadonlyArray<SettingDefinition> {
      return definitions;
    },

    get(key: string): SettingValue | undefined {
      return values.get(key);
    },

    set,
  };
}
