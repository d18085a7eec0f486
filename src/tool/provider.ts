// pattern: Imperative Shell

/**
 * Typed tool definitions and the provider that groups them under a category.
 * Arguments are decoded once, at the provider boundary, with the same zod schema
 * the advertised input schema is derived from.
 */

import type { z } from 'zod';
import { deriveInputSchema } from './schema.ts';
import { errorResult, invalidArguments, unknownTool } from './errors.ts';
import type {
  InputSchema,
  InvocationResult,
  ToolArguments,
  ToolCategory,
  ToolDescriptor,
  ToolProvider,
  ToolRisk,
} from './types.ts';

export type ToolSpec<TArgs extends z.ZodType> = {
  readonly name: string;
  readonly id?: string;
  readonly description: string;
  readonly args: TArgs;
  readonly baseline?: boolean;
  readonly risk?: ToolRisk;
  run(args: z.output<TArgs>): Promise<string | InvocationResult>;
};

export type ToolDefinition = {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly inputSchema: InputSchema;
  readonly isBaseline: boolean;
  readonly risk: ToolRisk;
  execute(args: ToolArguments): Promise<InvocationResult>;
};

export type ToolProviderOptions = {
  readonly name: string;
  readonly category: ToolCategory;
  readonly tools: ReadonlyArray<ToolDefinition>;
};

function formatIssues(issues: z.ZodError['issues']): string {
  return issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.map(String).join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ');
}

export function defineTool<TArgs extends z.ZodType>(spec: ToolSpec<TArgs>): ToolDefinition {
  return {
    id: spec.id ?? `builtin:${spec.name}`,
    name: spec.name,
    description: spec.description,
    inputSchema: deriveInputSchema(spec.args),
    isBaseline: spec.baseline ?? false,
    risk: spec.risk ?? 'safe',
    async execute(args: ToolArguments): Promise<InvocationResult> {
      const parsed = spec.args.safeParse(args);
      if (!parsed.success) {
        throw invalidArguments(formatIssues(parsed.error.issues));
      }

      const outcome = await spec.run(parsed.data);
      return typeof outcome === 'string' ? { content: outcome, isError: false } : outcome;
    },
  };
}

export function createToolProvider(options: ToolProviderOptions): ToolProvider {
  const { name, category, tools } = options;

  const descriptors: ReadonlyArray<ToolDescriptor> = tools.map((tool) => ({
    id: tool.id,
    name: tool.name,
    description: tool.description,
    inputSchema: tool.inputSchema,
    category,
    isBaseline: tool.isBaseline,
    risk: tool.risk,
  }));

  const byName = new Map(tools.map((tool) => [tool.name, tool]));

  return {
    name,

    descriptors(): ReadonlyArray<ToolDescriptor> {
      return descriptors;
    },

    async invoke(toolName: string, args: ToolArguments): Promise<InvocationResult> {
      const tool = byName.get(toolName);
      if (!tool) {
        return errorResult(unknownTool(toolName));
      }

      try {
        return await tool.execute(args);
      } catch (error) {
        return errorResult(error);
      }
    },
  };
}
