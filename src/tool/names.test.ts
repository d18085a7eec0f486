// pattern: Functional Core

import { describe, it, expect } from 'vitest';
import { desanitizeToolName, sanitizeToolName } from './names.ts';

describe('tool name sanitizing', () => {
  it('should replace every dot so the name matches ^[a-zA-Z0-9_-]+$', () => {
    expect(sanitizeToolName('agent.persona_update')).toBe('agent-_-persona_update');
    expect(sanitizeToolName('a.b.c')).toBe('a-_-b-_-c');
  });

  it('should map sanitized names back', () => {
    expect(desanitizeToolName('agent-_-persona_update')).toBe('agent.persona_update');
  });

  it('should leave names without the separator unchanged', () => {
    expect(desanitizeToolName('tools.list')).toBe('tools.list');
    expect(sanitizeToolName('web_search')).toBe('web_search');
  });
});
