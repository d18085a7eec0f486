// pattern: Imperative Shell

/**
 * Dispatch engine: the single entry point between model-issued tool calls and
 * providers. Resolves the tool, checks gating, optionally asks for confirmation,
 * then delegates and normalizes every outcome into an InvocationResult.
 *
 * The gating check is synchronous and completes before the provider is awaited,
 * so slow providers never hold up other dispatches or meta-tool mutations. It
 * runs again once a confirmation prompt resolves.
 */

import type { CapabilityCatalog } from './catalog.ts';
import type { GatingPolicy } from './gating.ts';
import { apiError, errorResult, toolDisabled, unknownTool } from './errors.ts';
import { desanitizeToolName } from './names.ts';
import type {
  Clock,
  InvocationResult,
  ToolArguments,
  ToolDescriptor,
} from './types.ts';

export type ConfirmationHandler = (descriptor: ToolDescriptor) => Promise<boolean>;

export type DispatcherOptions = {
  readonly catalog: CapabilityCatalog;
  readonly gating: GatingPolicy;
  readonly clock?: Clock;
  /** Asked before any tool whose risk is not 'safe' runs. */
  readonly confirm?: ConfirmationHandler;
  /** Deadline for a single provider invocation; none when omitted. */
  readonly timeoutMs?: number;
};

export interface Dispatcher {
  invoke(name: string, args: ToolArguments, now?: number): Promise<InvocationResult>;
}

function withTimeout(
  name: string,
  pending: Promise<InvocationResult>,
  timeoutMs: number | undefined,
): Promise<InvocationResult> {
  if (timeoutMs === undefined) {
    return pending;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(apiError(`${name} timed out after ${timeoutMs}ms`)),
      timeoutMs,
    );
  });

  return Promise.race([pending, deadline]).finally(() => clearTimeout(timer));
}

export function createDispatcher(options: DispatcherOptions): Dispatcher {
  const { catalog, gating, confirm, timeoutMs } = options;
  const clock = options.clock ?? Date.now;

  return {
    async invoke(
      name: string,
      args: ToolArguments,
      now?: number,
    ): Promise<InvocationResult> {
      const resolvedName = desanitizeToolName(name);
      const descriptor = catalog.get(resolvedName);
      const provider = catalog.resolve(resolvedName);

      if (!descriptor || !provider) {
        console.warn(`[dispatch] unknown tool: ${name}`);
        return errorResult(unknownTool(name));
      }

      if (!gating.isCallable(descriptor, now ?? clock())) {
        console.warn(`[dispatch] tool not enabled: ${resolvedName}`);
        return errorResult(toolDisabled(resolvedName));
      }

      try {
        if (confirm && descriptor.risk !== 'safe') {
          const approved = await confirm(descriptor);
          if (!approved) {
            console.log(`[dispatch] ${resolvedName} denied by user`);
            return { content: `tool call denied by user: ${resolvedName}`, isError: true };
          }
          // Elevation may have lapsed or been reset while the prompt was open.
          if (!gating.isCallable(descriptor, now ?? clock())) {
            console.warn(`[dispatch] ${resolvedName} disabled while awaiting confirmation`);
            return errorResult(toolDisabled(resolvedName));
          }
        }

        const result = await withTimeout(
          resolvedName,
          provider.invoke(resolvedName, args),
          timeoutMs,
        );
        if (result.isError) {
          console.warn(`[dispatch] ${resolvedName} returned error: ${result.content}`);
        }
        return result;
      } catch (error) {
        console.error(`[dispatch] ${resolvedName} failed:`, error);
        return errorResult(error);
      }
    },
  };
}
