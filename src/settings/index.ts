// pattern: Functional Core (barrel export)

export type { SettingKind, SettingValue, SettingDefinition, SettingsStore } from './types.ts';
export { createInMemorySettingsStore, DEFAULT_SETTING_DEFINITIONS } from './in-memory.ts';
