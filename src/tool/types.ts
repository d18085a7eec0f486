// pattern: Functional Core

/**
 * Tool system types for the capability catalog, gating policy and dispatcher.
 * These types define the port interface every tool provider implements and the
 * uniform result envelope that crosses the dispatch boundary.
 */

export type ToolPropertyType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

export type ToolProperty = {
  readonly type: ToolPropertyType;
  readonly description?: string;
  readonly enum?: ReadonlyArray<string>;
  readonly items?: { readonly type: ToolPropertyType };
};

export type InputSchema = {
  readonly type: 'object';
  readonly properties: Readonly<Record<string, ToolProperty>>;
  readonly required: ReadonlyArray<string>;
};

export type ToolCategory = {
  readonly name: string;
  readonly description: string;
};

/**
 * How much confirmation a tool warrants before it runs.
 * safe: read-only or local; sensitive: changes user state or sends data out;
 * restricted: spawns processes or deletes things.
 */
export type ToolRisk = 'safe' | 'sensitive' | 'restricted';

export type ToolDescriptor = {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly inputSchema: InputSchema;
  readonly category: ToolCategory;
  readonly isBaseline: boolean;
  readonly risk: ToolRisk;
};

export type InvocationResult = {
  readonly content: string;
  readonly isError: boolean;
};

export type ToolArguments = Record<string, unknown>;

/**
 * ToolProvider is a cohesive source of tools: it enumerates its descriptors and
 * executes them by name. descriptors() must be pure so the catalog can be built
 * before any collaborator is wired; invoke() resolves with an envelope instead
 * of rejecting.
 */
export interface ToolProvider {
  readonly name: string;
  descriptors(): ReadonlyArray<ToolDescriptor>;
  invoke(tool: string, args: ToolArguments): Promise<InvocationResult>;
}

export type Clock = () => number;

export type ModelTool = {
  name: string;
  description: string;
  input_schema: InputSchema;
};
