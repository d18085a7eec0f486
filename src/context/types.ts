// pattern: Functional Core

/**
 * ContextStore port interface.
 * Per-agent text documents (persona and memory) plus each agent's profile.
 * Implementations decide where these live; tools only see this boundary.
 */

export type ContextDocument = 'persona' | 'memory';

export type AgentProfile = {
  readonly name: string;
  readonly wake_word: string;
  readonly description: string;
};

export interface ContextStore {
  listAgents(): Promise<Array<string>>;
  createAgent(profile: AgentProfile): Promise<void>;
  loadAgentConfig(agent: string): Promise<AgentProfile | null>;
  saveAgentConfig(profile: AgentProfile): Promise<void>;

  // Documents read as '' until first written
  load(agent: string, document: ContextDocument): Promise<string>;
  save(agent: string, document: ContextDocument, content: string): Promise<void>;
  append(agent: string, document: ContextDocument, content: string): Promise<void>;
}
