// pattern: Imperative Shell

/**
 * Registry meta-tools.
 * Baseline tools that let the model discover the catalog and widen or narrow
 * its own callable surface. They only see the narrow RegistryControl port; the
 * host owns the catalog and the gating policy.
 */

import { z } from 'zod';
import { createToolProvider, defineTool } from '../provider.ts';
import type { ElevationResult } from '../gating.ts';
import type { ToolCategory, ToolProvider } from '../types.ts';

export const TOOLS_CATEGORY: ToolCategory = {
  name: 'tools',
  description: 'Discover tools and enable them by name or category (always available)',
};

export type RegistryListing = {
  readonly catalog: Record<string, Array<string>>;
  readonly descriptions: Record<string, string>;
  readonly enabled: Array<string>;
  readonly baseline_count: number;
  readonly available_tool_count: number;
  readonly expires_at: string | null;
};

export interface RegistryControl {
  listing(): RegistryListing;
  enable(names: ReadonlyArray<string>): ElevationResult;
  enableCategories(categories: ReadonlyArray<string>): ElevationResult;
  setTTL(minutes: number): Date;
  reset(): void;
}

export function createRegistryTools(control: RegistryControl): ToolProvider {
  const list = defineTool({
    name: 'tools.list',
    description:
      'List tool names grouped by category, with category descriptions and the currently enabled tools. Does not include full schemas.',
    baseline: true,
    args: z.object({}),
    run: async () => JSON.stringify(control.listing(), null, 2),
  });

  const enable = defineTool({
    name: 'tools.enable',
    description:
      'Enable a set of tools by name. Replaces the previously enabled set; only enabled tools (plus baseline) are callable.',
    baseline: true,
    args: z.object({
      names: z.array(z.string()).describe('Tool names to enable; an empty list clears the enabled set'),
    }),
    run: async ({ names }) => {
      const result = control.enable(names);
      return JSON.stringify({ enabled: result.enabled, unknown: result.unknown }, null, 2);
    },
  });

  const enableCategories = defineTool({
    name: 'tools.enable_categories',
    description:
      'Enable every tool in the given categories (see tools.list). Replaces the previously enabled set.',
    baseline: true,
    args: z.object({
      categories: z.array(z.string()).describe('Category names, e.g. agent, settings, telegram'),
    }),
    run: async ({ categories }) => {
      const result = control.enableCategories(categories);
      return JSON.stringify(
        { enabled: result.enabled, unknown_categories: result.unknown },
        null,
        2,
      );
    },
  });

  const enableTtl = defineTool({
    name: 'tools.enable_ttl',
    description: 'Set how many minutes the enabled tools stay enabled before falling back to baseline.',
    baseline: true,
    args: z.object({
      minutes: z.number().int().positive().describe('Minutes until enabled tools lapse'),
    }),
    run: async ({ minutes }) => {
      const expiresAt = control.setTTL(minutes);
      return JSON.stringify({ minutes, expires_at: expiresAt.toISOString() }, null, 2);
    },
  });

  const reset = defineTool({
    name: 'tools.reset',
    description: 'Reset enabled tools back to baseline only.',
    baseline: true,
    args: z.object({}),
    run: async () => {
      control.reset();
      return 'Enabled tools reset to baseline';
    },
  });

  return createToolProvider({
    name: 'registry',
    category: TOOLS_CATEGORY,
    tools: [list, enable, enableCategories, enableTtl, reset],
  });
}
