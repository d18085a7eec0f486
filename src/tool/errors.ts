// pattern: Functional Core

import type { InvocationResult } from './types.ts';

export type ToolErrorCode =
  | 'unknown_tool'
  | 'tool_disabled'
  | 'missing_api_key'
  | 'invalid_arguments'
  | 'api_error'
  | 'invalid_response'
  | 'host_unavailable';

export class ToolError extends Error {
  constructor(
    public code: ToolErrorCode,
    public retryable: boolean = false,
    message: string = '',
  ) {
    super(message);
    this.name = 'ToolError';
  }
}

export function unknownTool(name: string): ToolError {
  return new ToolError(
    'unknown_tool',
    false,
    `unknown tool: ${name}. Call tools.list to see available tools.`,
  );
}

export function toolDisabled(name: string): ToolError {
  return new ToolError(
    'tool_disabled',
    false,
    `tool is not enabled: ${name}. Call tools.enable or tools.enable_categories first.`,
  );
}

export function missingApiKey(service: string): ToolError {
  return new ToolError('missing_api_key', false, `${service} API key is not configured`);
}

export function invalidArguments(reason: string): ToolError {
  return new ToolError('invalid_arguments', true, `invalid arguments: ${reason}`);
}

export function apiError(detail: string): ToolError {
  return new ToolError('api_error', true, detail);
}

export function invalidResponse(detail: string): ToolError {
  return new ToolError('invalid_response', true, detail);
}

export function hostUnavailable(dependency: string): ToolError {
  return new ToolError('host_unavailable', false, `${dependency} is unavailable`);
}

export function errorResult(error: unknown): InvocationResult {
  if (error instanceof ToolError) {
    return { content: error.message, isError: true };
  }
  return {
    content: `handler error: ${error instanceof Error ? error.message : String(error)}`,
    isError: true,
  };
}
