// pattern: Imperative Shell

import type { AgentProfile, ContextDocument, ContextStore } from './types.ts';

function documentKey(agent: string, document: ContextDocument): string {
  return `${agent}/${document}`;
}

export function createInMemoryContextStore(
  agents: ReadonlyArray<AgentProfile> = [],
): ContextStore {
  const profiles = new Map<string, AgentProfile>();
  const documents = new Map<string, string>();

  for (const profile of agents) {
    profiles.set(profile.name, profile);
  }

  return {
    async listAgents(): Promise<Array<string>> {
      return Array.from(profiles.keys()).sort();
    },

    async createAgent(profile: AgentProfile): Promise<void> {
      if (profiles.has(profile.name)) {
        throw new Error(`agent already exists: ${profile.name}`);
      }
      profiles.set(profile.name, profile);
    },

    async loadAgentConfig(agent: string): Promise<AgentProfile | null> {
      return profiles.get(agent) ?? null;
    },

    async saveAgentConfig(profile: AgentProfile): Promise<void> {
      profiles.set(profile.name, profile);
    },

    async load(agent: string, document: ContextDocument): Promise<string> {
      return documents.get(documentKey(agent, document)) ?? '';
    },

    async save(agent: string, document: ContextDocument, content: string): Promise<void> {
      documents.set(documentKey(agent, document), content);
    },

    async append(agent: string, document: ContextDocument, content: string): Promise<void> {
      const key = documentKey(agent, document);
      const current = documents.get(key) ?? '';
      documents.set(key, current.length === 0 ? content : `${current}\n${content}`);
    },
  };
}
