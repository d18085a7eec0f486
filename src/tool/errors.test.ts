// pattern: Functional Core

import { describe, it, expect } from 'vitest';
import {
  ToolError,
  apiError,
  errorResult,
  hostUnavailable,
  invalidArguments,
  invalidResponse,
  missingApiKey,
  toolDisabled,
  unknownTool,
} from './errors.ts';

describe('ToolError constructors', () => {
  it('should build each code with its message and retryable flag', () => {
    const cases: Array<[ToolError, string, string, boolean]> = [
      [unknownTool('x.y'), 'unknown_tool', 'unknown tool: x.y. Call tools.list to see available tools.', false],
      [
        toolDisabled('x.y'),
        'tool_disabled',
        'tool is not enabled: x.y. Call tools.enable or tools.enable_categories first.',
        false,
      ],
      [missingApiKey('Tavily'), 'missing_api_key', 'Tavily API key is not configured', false],
      [invalidArguments('query is required'), 'invalid_arguments', 'invalid arguments: query is required', true],
      [apiError('upstream 502'), 'api_error', 'upstream 502', true],
      [invalidResponse('not json'), 'invalid_response', 'not json', true],
      [hostUnavailable('context store'), 'host_unavailable', 'context store is unavailable', false],
    ];

    for (const [error, code, message, retryable] of cases) {
      expect(error).toBeInstanceOf(ToolError);
      expect(error.code).toBe(code);
      expect(error.message).toBe(message);
      expect(error.retryable).toBe(retryable);
    }
  });
});

describe('errorResult', () => {
  it('should surface a ToolError message as the envelope content', () => {
    expect(errorResult(missingApiKey('Telegram'))).toEqual({
      content: 'Telegram API key is not configured',
      isError: true,
    });
  });

  it('should prefix other errors with handler error', () => {
    expect(errorResult(new Error('boom'))).toEqual({ content: 'handler error: boom', isError: true });
  });

  it('should stringify non-Error throws', () => {
    expect(errorResult('plain string')).toEqual({ content: 'handler error: plain string', isError: true });
  });
});
