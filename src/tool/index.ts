// pattern: Functional Core

export type {
  ToolPropertyType,
  ToolProperty,
  InputSchema,
  ToolCategory,
  ToolRisk,
  ToolDescriptor,
  InvocationResult,
  ToolArguments,
  ToolProvider,
  Clock,
  ModelTool,
} from './types.ts';
export type { ToolErrorCode } from './errors.ts';
export type { ToolSpec, ToolDefinition, ToolProviderOptions } from './provider.ts';
export type { CapabilityCatalog } from './catalog.ts';
export type { GatingPolicy, GatingSnapshot, ElevationResult } from './gating.ts';
export type { Dispatcher, DispatcherOptions, ConfirmationHandler } from './dispatch.ts';
export type { ToolHost, ToolHostOptions } from './host.ts';
export type { RegistryControl, RegistryListing } from './builtin/registry.ts';

export {
  ToolError,
  unknownTool,
  toolDisabled,
  missingApiKey,
  invalidArguments,
  apiError,
  invalidResponse,
  hostUnavailable,
  errorResult,
} from './errors.ts';
export { deriveInputSchema } from './schema.ts';
export { defineTool, createToolProvider } from './provider.ts';
export { createCapabilityCatalog } from './catalog.ts';
export { createGatingPolicy } from './gating.ts';
export { createDispatcher } from './dispatch.ts';
export { createToolHost } from './host.ts';
export { sanitizeToolName, desanitizeToolName } from './names.ts';
export { createRegistryTools, TOOLS_CATEGORY } from './builtin/registry.ts';
export {
  createAgentTools,
  createAgentEditorTools,
  AGENT_CATEGORY,
  AGENT_EDIT_CATEGORY,
} from './builtin/agent.ts';
export { createSettingsTools, SETTINGS_CATEGORY } from './builtin/settings.ts';
export { createTelegramTools, TELEGRAM_CATEGORY } from './builtin/telegram.ts';
export { createWebTools, SEARCH_CATEGORY } from './builtin/web.ts';
