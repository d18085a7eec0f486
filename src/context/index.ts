// pattern: Functional Core (barrel export)

export type { ContextDocument, AgentProfile, ContextStore } from './types.ts';
export { createInMemoryContextStore } from './in-memory.ts';
