// pattern: Functional Core

/**
 * SettingsStore port interface.
 * Typed key/value access to application settings. Persistence is the
 * implementation's concern.
 */

export type SettingKind = 'string' | 'number' | 'boolean';

export type SettingValue = string | number | boolean;

export type SettingDefinition = {
  readonly key: string;
  readonly kind: SettingKind;
  readonly description: string;
  /** Secret values are never echoed back to the model. */
  readonly secret: boolean;
};

export interface SettingsStore {
  definitions(): ReadonlyArray<SettingDefinition>;
  get(key: string): SettingValue | undefined;
  set(key: string, value: SettingValue): void;
}
