// pattern: Imperative Shell

/**
 * Built-in settings tools.
 * Values cross the tool boundary as strings and are converted per setting kind.
 * Secret values are reported as '***' and never echoed back.
 */

import { z } from 'zod';
import { createToolProvider, defineTool } from '../provider.ts';
import { hostUnavailable, invalidArguments } from '../errors.ts';
import type { SettingDefinition, SettingValue, SettingsStore } from '../../settings/types.ts';
import type { ToolCategory, ToolProvider } from '../types.ts';

export const SETTINGS_CATEGORY: ToolCategory = {
  name: 'settings',
  description: 'Read and change application settings',
};

const SECRET_MASK = '***';
const TRUTHY = new Set(['true', '1', 'yes', 'on', 'y']);

type SettingsToolOptions = {
  readonly settings?: SettingsStore;
};

type SettingView = {
  readonly key: string;
  readonly kind: string;
  readonly description: string;
  readonly value: SettingValue | null;
};

export function parseBool(value: string): boolean {
  return TRUTHY.has(value.trim().toLowerCase());
}

function display(definition: SettingDefinition, value: SettingValue | undefined): SettingValue | null {
  if (definition.secret) {
    return value === undefined || value === '' ? '' : SECRET_MASK;
  }
  return value ?? null;
}

function convert(definition: SettingDefinition, raw: string): SettingValue {
  switch (definition.kind) {
    case 'boolean':
      return parseBool(raw);
    case 'number': {
      const value = Number(raw.trim());
      if (raw.trim() === '' || !Number.isFinite(value)) {
        throw invalidArguments(`${definition.key} must be a number`);
      }
      return value;
    }
    case 'string':
      return raw;
  }
}

export function createSettingsTools(options: SettingsToolOptions = {}): ToolProvider {
  function requireStore(): SettingsStore {
    if (!options.settings) {
      throw hostUnavailable('settings store');
    }
    return options.settings;
  }

  function lookup(store: SettingsStore, key: string): SettingDefinition {
    const definition = store.definitions().find((candidate) => candidate.key === key);
    if (!definition) {
      const known = store.definitions().map((candidate) => candidate.key).join(', ');
      throw invalidArguments(`unknown setting: ${key}. Known settings: ${known}`);
    }
    return definition;
  }

  function view(store: SettingsStore, definition: SettingDefinition): SettingView {
    return {
      key: definition.key,
      kind: definition.kind,
      description: definition.description,
      value: display(definition, store.get(definition.key)),
    };
  }

  const list = defineTool({
    name: 'settings.list',
    description: 'List supported setting keys with their types and current values.',
    args: z.object({}),
    run: async () => {
      const store = requireStore();
      return JSON.stringify(
        store.definitions().map((definition) => view(store, definition)),
        null,
        2,
      );
    },
  });

  const get = defineTool({
    name: 'settings.get',
    description: 'Get the current value of a setting key.',
    args: z.object({
      key: z.string().min(1).describe('Setting key, see settings.list'),
    }),
    run: async ({ key }) => {
      const store = requireStore();
      return JSON.stringify(view(store, lookup(store, key)), null, 2);
    },
  });

  const set = defineTool({
    name: 'settings.set',
    description: 'Set an application setting. Use settings.list to discover keys and types.',
    risk: 'sensitive',
    args: z.object({
      key: z.string().min(1).describe('Setting key to update'),
      value: z.string().describe('New value as a string; converted per key type'),
    }),
    run: async ({ key, value }) => {
      const store = requireStore();
      const definition = lookup(store, key);
      store.set(key, convert(definition, value));
      console.log(`[settings] ${key} updated`);
      return `Setting ${key} updated`;
    },
  });

  return createToolProvider({
    name: 'settings',
    category: SETTINGS_CATEGORY,
    tools: [list, get, set],
  });
}
