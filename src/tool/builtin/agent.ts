// pattern: Imperative Shell

/**
 * Built-in agent tools.
 * agent.* manages which agents exist and which one is active; agent_edit tools
 * edit an agent's persona, memory and profile through the ContextStore port.
 * Every tool that takes an optional name defaults to the active agent.
 */

import { z } from 'zod';
import { createToolProvider, defineTool } from '../provider.ts';
import { hostUnavailable, invalidArguments } from '../errors.ts';
import type { AgentProfile, ContextStore } from '../../context/types.ts';
import type { SettingsStore } from '../../settings/types.ts';
import type { ToolCategory, ToolProvider } from '../types.ts';

export const AGENT_CATEGORY: ToolCategory = {
  name: 'agent',
  description: 'Create, list and switch between agents',
};

export const AGENT_EDIT_CATEGORY: ToolCategory = {
  name: 'agent_edit',
  description: "Edit an agent's persona, memory and profile",
};

const DEFAULT_AGENT = 'default';

type AgentToolOptions = {
  readonly context?: ContextStore;
  readonly settings?: SettingsStore;
};

type Collaborators = {
  readonly context: ContextStore;
  readonly settings: SettingsStore;
};

const agentName = z.string().optional().describe('Agent name; defaults to the active agent');

function requireCollaborators(options: AgentToolOptions): Collaborators {
  if (!options.context) {
    throw hostUnavailable('context store');
  }
  if (!options.settings) {
    throw hostUnavailable('settings store');
  }
  return { context: options.context, settings: options.settings };
}

function settingString(settings: SettingsStore, key: string): string | undefined {
  const value = settings.get(key);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function resolveAgent(settings: SettingsStore, name: string | undefined): string {
  const trimmed = name?.trim();
  if (trimmed) {
    return trimmed;
  }
  return settingString(settings, 'active_agent') ?? DEFAULT_AGENT;
}

function defaultWakeWord(settings: SettingsStore): string {
  return settingString(settings, 'wake_word') ?? '';
}

function asMemoryEntry(content: string): string {
  return content.startsWith('-') ? content : `- ${content}`;
}

function replaceAllInsensitive(text: string, find: string, replacement: string): string {
  if (find.length === 0) {
    return text;
  }
  const lowerText = text.toLowerCase();
  const lowerFind = find.toLowerCase();
  let result = '';
  let cursor = 0;
  let index = lowerText.indexOf(lowerFind, cursor);
  while (index !== -1) {
    result += text.slice(cursor, index) + replacement;
    cursor = index + find.length;
    index = lowerText.indexOf(lowerFind, cursor);
  }
  return result + text.slice(cursor);
}

function containsInsensitive(line: string, needle: string): boolean {
  return line.toLowerCase().includes(needle.toLowerCase());
}

export function createAgentTools(options: AgentToolOptions = {}): ToolProvider {
  const create = defineTool({
    name: 'agent.create',
    description: 'Create a new agent with an optional wake word and description.',
    risk: 'sensitive',
    args: z.object({
      name: z.string().trim().min(1).describe('Agent name'),
      wake_word: z.string().optional().describe('Wake word; defaults to the configured wake word'),
      description: z.string().optional().describe('Short description of the agent'),
    }),
    run: async ({ name, wake_word, description }) => {
      const { context, settings } = requireCollaborators(options);
      const existing = await context.listAgents();
      if (existing.includes(name)) {
        throw invalidArguments(`agent already exists: ${name}`);
      }

      const profile: AgentProfile = {
        name,
        wake_word: wake_word ?? defaultWakeWord(settings),
        description: description ?? '',
      };
      await context.createAgent(profile);
      console.log(`[agent] created ${name}`);
      return `Created agent '${name}'`;
    },
  });

  const list = defineTool({
    name: 'agent.list',
    description: 'List agent names.',
    baseline: true,
    args: z.object({}),
    run: async () => {
      const { context } = requireCollaborators(options);
      return JSON.stringify(await context.listAgents(), null, 2);
    },
  });

  const setActive = defineTool({
    name: 'agent.set_active',
    description: 'Set the active agent by name.',
    risk: 'sensitive',
    args: z.object({
      name: z.string().trim().min(1).describe('Agent name'),
    }),
    run: async ({ name }) => {
      const { context, settings } = requireCollaborators(options);
      const available = await context.listAgents();
      if (!available.includes(name)) {
        throw invalidArguments(`agent not found: ${name}. Available: ${available.join(', ')}`);
      }
      settings.set('active_agent', name);
      console.log(`[agent] active agent is now ${name}`);
      return `Active agent set to ${name}`;
    },
  });

  return createToolProvider({
    name: 'agent',
    category: AGENT_CATEGORY,
    tools: [create, list, setActive],
  });
}

export function createAgentEditorTools(options: AgentToolOptions = {}): ToolProvider {
  const personaGet = defineTool({
    name: 'agent.persona_get',
    description: "Get an agent's persona.",
    args: z.object({ name: agentName }),
    run: async ({ name }) => {
      const { context, settings } = requireCollaborators(options);
      return context.load(resolveAgent(settings, name), 'persona');
    },
  });

  const personaSearch = defineTool({
    name: 'agent.persona_search',
    description: 'Search the persona and return matching lines with their indices.',
    args: z.object({
      query: z.string().min(1).describe('Case-insensitive text to look for'),
      name: agentName,
    }),
    run: async ({ query, name }) => {
      const { context, settings } = requireCollaborators(options);
      const text = await context.load(resolveAgent(settings, name), 'persona');
      const matches = text
        .split('\n')
        .map((line, index) => ({ index, line }))
        .filter(({ line }) => containsInsensitive(line, query));
      return JSON.stringify(matches, null, 2);
    },
  });

  const personaUpdate = defineTool({
    name: 'agent.persona_update',
    description: 'Update the persona by replacing it or appending to it.',
    risk: 'sensitive',
    args: z.object({
      mode: z.enum(['replace', 'append']).describe('replace overwrites, append adds a paragraph'),
      content: z.string().describe('Persona text'),
      name: agentName,
    }),
    run: async ({ mode, content, name }) => {
      const { context, settings } = requireCollaborators(options);
      const agent = resolveAgent(settings, name);
      let updated = content;
      if (mode === 'append') {
        const current = await context.load(agent, 'persona');
        updated = current.length === 0 ? content : `${current}\n\n${content}`;
      }
      await context.save(agent, 'persona', updated);
      return `Persona updated (mode=${mode})`;
    },
  });

  const personaReplace = defineTool({
    name: 'agent.persona_replace',
    description: "Replace every case-insensitive occurrence of 'find' with 'replace' in the persona.",
    risk: 'sensitive',
    args: z.object({
      find: z.string().min(1).describe('Text to find'),
      replace: z.string().describe('Replacement text'),
      name: agentName,
    }),
    run: async ({ find, replace, name }) => {
      const { context, settings } = requireCollaborators(options);
      const agent = resolveAgent(settings, name);
      const current = await context.load(agent, 'persona');
      await context.save(agent, 'persona', replaceAllInsensitive(current, find, replace));
      return 'Persona replaced occurrences';
    },
  });

  const personaDeleteLines = defineTool({
    name: 'agent.persona_delete_lines',
    description: 'Delete persona lines that contain the given text (case-insensitive).',
    risk: 'sensitive',
    args: z.object({
      contains: z.string().min(1).describe('Text a line must contain to be deleted'),
      name: agentName,
    }),
    run: async ({ contains, name }) => {
      const { context, settings } = requireCollaborators(options);
      const agent = resolveAgent(settings, name);
      const lines = (await context.load(agent, 'persona')).split('\n');
      const kept = lines.filter((line) => !containsInsensitive(line, contains));
      await context.save(agent, 'persona', kept.join('\n'));
      return `Deleted ${lines.length - kept.length} lines`;
    },
  });

  const memoryGet = defineTool({
    name: 'agent.memory_get',
    description: "Get an agent's memory.",
    args: z.object({ name: agentName }),
    run: async ({ name }) => {
      const { context, settings } = requireCollaborators(options);
      return context.load(resolveAgent(settings, name), 'memory');
    },
  });

  const memoryAppend = defineTool({
    name: 'agent.memory_append',
    description: "Append an entry to memory; '- ' is prepended when missing.",
    args: z.object({
      content: z.string().min(1).describe('Memory entry'),
      name: agentName,
    }),
    run: async ({ content, name }) => {
      const { context, settings } = requireCollaborators(options);
      await context.append(resolveAgent(settings, name), 'memory', asMemoryEntry(content));
      return 'Memory appended';
    },
  });

  const memoryReplace = defineTool({
    name: 'agent.memory_replace',
    description: 'Replace the whole memory document.',
    risk: 'sensitive',
    args: z.object({
      content: z.string().describe('New memory content'),
      name: agentName,
    }),
    run: async ({ content, name }) => {
      const { context, settings } = requireCollaborators(options);
      await context.save(resolveAgent(settings, name), 'memory', content);
      return 'Memory replaced';
    },
  });

  const memoryUpdate = defineTool({
    name: 'agent.memory_update',
    description:
      "Update or delete one memory line. Replaces the first line containing 'find' with '- replace'; an empty replace deletes the line.",
    risk: 'sensitive',
    args: z.object({
      find: z.string().min(1).describe('Text identifying the line (case-insensitive)'),
      replace: z.string().describe('New entry, or empty to delete'),
      name: agentName,
    }),
    run: async ({ find, replace, name }) => {
      const { context, settings } = requireCollaborators(options);
      const agent = resolveAgent(settings, name);
      const lines = (await context.load(agent, 'memory')).split('\n');
      const index = lines.findIndex((line) => containsInsensitive(line, find));
      if (index === -1) {
        throw invalidArguments(`no memory line contains '${find}'`);
      }

      if (replace.length === 0) {
        lines.splice(index, 1);
      } else {
        lines[index] = asMemoryEntry(replace);
      }
      await context.save(agent, 'memory', lines.join('\n'));
      return replace.length === 0 ? 'Deleted 1 line' : 'Updated 1 line';
    },
  });

  const configGet = defineTool({
    name: 'agent.config_get',
    description: "Get an agent's profile (wake word and description).",
    args: z.object({ name: agentName }),
    run: async ({ name }) => {
      const { context, settings } = requireCollaborators(options);
      const agent = resolveAgent(settings, name);
      const profile = await context.loadAgentConfig(agent);
      return JSON.stringify(
        {
          name: profile?.name ?? agent,
          wake_word: profile?.wake_word ?? defaultWakeWord(settings),
          description: profile?.description ?? '',
        },
        null,
        2,
      );
    },
  });

  const configUpdate = defineTool({
    name: 'agent.config_update',
    description: "Update fields of an agent's profile.",
    risk: 'sensitive',
    args: z.object({
      name: agentName,
      wake_word: z.string().optional().describe('New wake word'),
      description: z.string().optional().describe('New description'),
    }),
    run: async ({ name, wake_word, description }) => {
      const { context, settings } = requireCollaborators(options);
      const agent = resolveAgent(settings, name);
      const current = await context.loadAgentConfig(agent);
      await context.saveAgentConfig({
        name: agent,
        wake_word: wake_word ?? current?.wake_word ?? defaultWakeWord(settings),
        description: description ?? current?.description ?? '',
      });
      return `Config updated for ${agent}`;
    },
  });

  return createToolProvider({
    name: 'agent_edit',
    category: AGENT_EDIT_CATEGORY,
    tools: [
      personaGet,
      personaSearch,
      personaUpdate,
      personaReplace,
      personaDeleteLines,
      memoryGet,
      memoryAppend,
      memoryReplace,
      memoryUpdate,
      configGet,
      configUpdate,
    ],
  });
}
