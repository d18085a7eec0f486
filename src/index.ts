// pattern: Imperative Shell

/**
 * toolgate entry point.
 * Composition root that wires stores, adapters and tool providers into a tool
 * host, then starts an interactive REPL for calling tools by hand.
 */

import * as readline from 'node:readline';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadConfig, type AppConfig } from './config/index.ts';
import { createInMemorySettingsStore, type SettingsStore, type SettingValue } from './settings/index.ts';
import { createInMemoryContextStore, type ContextStore } from './context/index.ts';
import { createTelegramClient, type TelegramClient } from './telegram/index.ts';
import {
  createAgentEditorTools,
  createAgentTools,
  createSettingsTools,
  createTelegramTools,
  createToolHost,
  createWebTools,
  type ConfirmationHandler,
  type ToolArguments,
  type ToolDescriptor,
  type ToolHost,
} from './tool/index.ts';

export type Command =
  | { readonly kind: 'empty' }
  | { readonly kind: 'tools' }
  | { readonly kind: 'exit' }
  | { readonly kind: 'call'; readonly name: string; readonly args: ToolArguments }
  | { readonly kind: 'invalid'; readonly message: string };

export type LoopOutcome = 'continue' | 'exit';

type InteractionLoopDeps = {
  host: ToolHost;
  write: (text: string) => void;
};

export type Toolgate = {
  readonly host: ToolHost;
  readonly settings: SettingsStore;
  readonly context: ContextStore;
};

type ToolgateOverrides = {
  readonly telegram?: TelegramClient;
  readonly confirm?: ConfirmationHandler;
  readonly clock?: () => number;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse one REPL line: `/tools`, `/exit`, or `<tool> [json arguments]`.
 */
export function parseCommand(line: string): Command {
  const trimmed = line.trim();
  if (trimmed.length === 0) {
    return { kind: 'empty' };
  }
  if (trimmed === '/tools') {
    return { kind: 'tools' };
  }
  if (trimmed === '/exit') {
    return { kind: 'exit' };
  }

  const match = /^(\S+)\s*([\s\S]*)$/.exec(trimmed);
  const name = match?.[1] ?? trimmed;
  const rawArgs = match?.[2] ?? '';
  if (rawArgs.length === 0) {
    return { kind: 'call', name, args: {} };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(rawArgs);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { kind: 'invalid', message: `invalid JSON arguments: ${reason}` };
  }
  if (!isRecord(parsed)) {
    return { kind: 'invalid', message: 'arguments must be a JSON object' };
  }
  return { kind: 'call', name, args: parsed };
}

export function formatAvailableTools(descriptors: ReadonlyArray<ToolDescriptor>): string {
  return descriptors
    .map((descriptor) => {
      const flags = descriptor.isBaseline ? 'baseline' : descriptor.category.name;
      return `${descriptor.name} [${flags}] ${descriptor.description}`;
    })
    .join('\n');
}

/**
 * Build a confirmation handler that asks on the terminal before a
 * sensitive or restricted tool runs.
 */
export function createConfirmationPrompt(
  ask: (prompt: string) => Promise<string>,
): ConfirmationHandler {
  return async (descriptor) => {
    const answer = await ask(`Allow ${descriptor.name} (${descriptor.risk})? (y/n): `);
    const normalized = answer.trim().toLowerCase();
    return normalized === 'y' || normalized === 'yes';
  };
}

/**
 * Seed settings from configuration. Secrets are only set when present.
 */
export function seedSettings(config: AppConfig): Record<string, SettingValue> {
  const initial: Record<string, SettingValue> = {
    active_agent: config.agent.default_name,
    wake_word: config.agent.wake_word,
    telegram_enabled: config.telegram.enabled,
    search_max_results: config.search.max_results,
  };
  if (config.telegram.bot_token) {
    initial['telegram_bot_token'] = config.telegram.bot_token;
  }
  if (config.search.api_key) {
    initial['tavily_api_key'] = config.search.api_key;
  }
  return initial;
}

/**
 * Wire stores, adapters and providers into a tool host.
 * Extracted from main so tests can build the full host without a terminal.
 */
export function createToolgate(config: AppConfig, overrides: ToolgateOverrides = {}): Toolgate {
  const settings = createInMemorySettingsStore(seedSettings(config));
  const context = createInMemoryContextStore([
    { name: config.agent.default_name, wake_word: config.agent.wake_word, description: '' },
  ]);
  const telegram = overrides.telegram ?? createTelegramClient({ baseUrl: config.telegram.api_base_url });

  const host = createToolHost({
    providers: [
      createAgentTools({ context, settings }),
      createAgentEditorTools({ context, settings }),
      createSettingsTools({ settings }),
      createTelegramTools({ client: telegram, settings }),
      createWebTools({
        apiKey: () => {
          const key = settings.get('tavily_api_key');
          return typeof key === 'string' && key.length > 0 ? key : undefined;
        },
        maxResults: () => {
          const limit = settings.get('search_max_results');
          return typeof limit === 'number' && Number.isInteger(limit) && limit > 0
            ? limit
            : config.search.max_results;
        },
      }),
    ],
    clock: overrides.clock,
    confirm: overrides.confirm,
    timeoutMs: config.dispatch.timeout_ms,
  });

  return { host, settings, context };
}

/**
 * Create an interaction loop that can be tested with mock dependencies.
 */
export function createInteractionLoop(
  deps: InteractionLoopDeps,
): (input: string) => Promise<LoopOutcome> {
  return async (input: string) => {
    const command = parseCommand(input);

    switch (command.kind) {
      case 'empty':
        return 'continue';
      case 'exit':
        return 'exit';
      case 'tools':
        deps.write(formatAvailableTools(deps.host.availableTools()));
        return 'continue';
      case 'invalid':
        deps.write(`error: ${command.message}`);
        return 'continue';
      case 'call': {
        const result = await deps.host.invoke(command.name, command.args);
        deps.write(result.isError ? `error: ${result.content}` : result.content);
        return 'continue';
      }
    }
  };
}

/**
 * Prompt for a single line of input from readline.
 * Used for confirmation prompts.
 */
function promptForLine(rl: readline.Interface, prompt: string): Promise<string> {
  return new Promise<string>((resolvePrompt) => {
    rl.question(prompt, (answer: string) => {
      resolvePrompt(answer.trim());
    });
  });
}

/**
 * Create a graceful shutdown handler that closes readline.
 */
export function createShutdownHandler(rl: readline.Interface): () => void {
  return (): void => {
    console.log('\nShutting down...');
    rl.close();
    process.exit(0);
  };
}

/**
 * Main entry point: wires all components and starts the REPL.
 */
async function main(): Promise<void> {
  console.log('toolgate starting...\n');

  const config = loadConfig();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const confirm = config.dispatch.confirm_sensitive
    ? createConfirmationPrompt((prompt) => promptForLine(rl, prompt))
    : undefined;

  const { host } = createToolgate(config, { confirm });
  const interactionHandler = createInteractionLoop({
    host,
    write: (text) => process.stdout.write(`\n${text}\n\n`),
  });

  const shutdownHandler = createShutdownHandler(rl);
  process.on('SIGINT', shutdownHandler);
  process.on('SIGTERM', shutdownHandler);

  console.log('Type /tools to list callable tools, <tool> [json] to call one, /exit to quit:\n');

  rl.setPrompt('> ');
  rl.on('line', (line: string) => {
    interactionHandler(line)
      .then((outcome) => {
        if (outcome === 'exit') {
          shutdownHandler();
          return;
        }
        rl.prompt();
      })
      .catch((error: unknown) => {
        const errorMsg = error instanceof Error ? error.message : String(error);
        console.error(`error: ${errorMsg}`);
        rl.prompt();
      });
  });

  rl.prompt();
}

// Run main entry point only when file is executed directly
const entryPath = process.argv[1];
if (entryPath && resolve(entryPath) === fileURLToPath(import.meta.url)) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
