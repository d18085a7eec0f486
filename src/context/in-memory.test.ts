// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { createInMemoryContextStore } from './in-memory.ts';

describe('In-memory context store', () => {
  it('should list agents sorted by name', async () => {
    const store = createInMemoryContextStore([
      { name: 'zed', wake_word: '', description: '' },
      { name: 'ada', wake_word: '', description: '' },
    ]);

    expect(await store.listAgents()).toEqual(['ada', 'zed']);
  });

  it('should refuse to create an existing agent', async () => {
    const store = createInMemoryContextStore([{ name: 'ada', wake_word: '', description: '' }]);

    await expect(store.createAgent({ name: 'ada', wake_word: 'x', description: '' })).rejects.toThrow(
      'agent already exists: ada',
    );
  });

  it('should store and overwrite profiles', async () => {
    const store = createInMemoryContextStore();
    await store.createAgent({ name: 'ada', wake_word: 'hey', description: '' });

    await store.saveAgentConfig({ name: 'ada', wake_word: 'hi', description: 'Updated' });

    expect(await store.loadAgentConfig('ada')).toEqual({ name: 'ada', wake_word: 'hi', description: 'Updated' });
    expect(await store.loadAgentConfig('nobody')).toBeNull();
  });

  it('should read documents as empty until written', async () => {
    const store = createInMemoryContextStore();

    expect(await store.load('ada', 'persona')).toBe('');
  });

  it('should keep persona and memory separate per agent', async () => {
    const store = createInMemoryContextStore();

    await store.save('ada', 'persona', 'Ada persona');
    await store.save('ada', 'memory', '- fact');
    await store.save('zed', 'persona', 'Zed persona');

    expect(await store.load('ada', 'persona')).toBe('Ada persona');
    expect(await store.load('ada', 'memory')).toBe('- fact');
    expect(await store.load('zed', 'persona')).toBe('Zed persona');
  });

  it('should append on a new line', async () => {
    const store = createInMemoryContextStore();

    await store.append('ada', 'memory', '- first');
    await store.append('ada', 'memory', '- second');

    expect(await store.load('ada', 'memory')).toBe('- first\n- second');
  });
});
