// pattern: Imperative Shell

/**
 * Tool host: composition of catalog, gating policy, dispatcher and the registry
 * meta-tools. It is also the advertisement layer, exposing only currently
 * callable tools to the model; the dispatcher enforces gating again at call
 * time.
 */

import { createCapabilityCatalog, type CapabilityCatalog } from './catalog.ts';
import { createGatingPolicy, type GatingPolicy } from './gating.ts';
import { createDispatcher, type ConfirmationHandler } from './dispatch.ts';
import { createRegistryTools, type RegistryControl } from './builtin/registry.ts';
import { sanitizeToolName } from './names.ts';
import type {
  Clock,
  InvocationResult,
  ModelTool,
  ToolArguments,
  ToolDescriptor,
  ToolProvider,
} from './types.ts';

export type ToolHostOptions = {
  readonly providers: ReadonlyArray<ToolProvider>;
  readonly clock?: Clock;
  readonly confirm?: ConfirmationHandler;
  readonly timeoutMs?: number;
};

export type ToolHost = {
  readonly catalog: CapabilityCatalog;
  readonly gating: GatingPolicy;
  availableTools(now?: number): Array<ToolDescriptor>;
  toModelTools(now?: number): Array<ModelTool>;
  invoke(name: string, args: ToolArguments, now?: number): Promise<InvocationResult>;
};

export function createToolHost(options: ToolHostOptions): ToolHost {
  const clock = options.clock ?? Date.now;

  function availableTools(now: number = clock()): Array<ToolDescriptor> {
    return catalog.all().filter((descriptor) => gating.isCallable(descriptor, now));
  }

  const control: RegistryControl = {
    listing() {
      const now = clock();
      const snapshot = gating.snapshot(now);
      return {
        catalog: catalog.byCategory(),
        descriptions: catalog.categoryDescriptions(),
        enabled: snapshot.enabled,
        baseline_count: catalog.all().filter((descriptor) => descriptor.isBaseline).length,
        available_tool_count: availableTools(now).length,
        expires_at: snapshot.expiresAt ? snapshot.expiresAt.toISOString() : null,
      };
    },
    enable: (names) => gating.enable(names),
    enableCategories: (categories) => gating.enableCategories(categories),
    setTTL: (minutes) => gating.setTTL(minutes),
    reset: () => gating.reset(),
  };

  const catalog = createCapabilityCatalog([createRegistryTools(control), ...options.providers]);
  const gating = createGatingPolicy(catalog, clock);
  const dispatcher = createDispatcher({
    catalog,
    gating,
    clock,
    confirm: options.confirm,
    timeoutMs: options.timeoutMs,
  });

  console.log(
    `[toolgate] catalog built with ${catalog.all().length} tools in ${Object.keys(catalog.byCategory()).length} categories`,
  );

  return {
    catalog,
    gating,
    availableTools,

    toModelTools(now: number = clock()): Array<ModelTool> {
      return availableTools(now).map((descriptor) => ({
        name: sanitizeToolName(descriptor.name),
        description: descriptor.description,
        input_schema: descriptor.inputSchema,
      }));
    },

    invoke(name: string, args: ToolArguments, now?: number): Promise<InvocationResult> {
      return dispatcher.invoke(name, args, now);
    },
  };
}
