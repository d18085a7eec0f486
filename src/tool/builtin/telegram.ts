// pattern: Imperative Shell

/**
 * Built-in Telegram tools over the Bot API client.
 * The enabled flag and bot token are read from settings on every call;
 * tools that reach the Bot API refuse to run while telegram_enabled is false.
 */

import { z } from 'zod';
import { createToolProvider, defineTool } from '../provider.ts';
import { ToolError, apiError, hostUnavailable, invalidResponse, missingApiKey } from '../errors.ts';
import { TelegramError, type TelegramClient } from '../../telegram/index.ts';
import type { SettingsStore } from '../../settings/types.ts';
import type { ToolCategory, ToolProvider } from '../types.ts';

export const TELEGRAM_CATEGORY: ToolCategory = {
  name: 'telegram',
  description: 'Configure the Telegram bot and send messages through it',
};

const TOKEN_SETTING = 'telegram_bot_token';
const ENABLED_SETTING = 'telegram_enabled';

type TelegramToolOptions = {
  readonly client?: TelegramClient;
  readonly settings?: SettingsStore;
};

function toToolError(error: unknown): Error {
  if (error instanceof TelegramError && error.code === 'invalid_response') {
    return invalidResponse(error.message);
  }
  return apiError(error instanceof Error ? error.message : String(error));
}

export function createTelegramTools(options: TelegramToolOptions = {}): ToolProvider {
  function requireSettings(): SettingsStore {
    if (!options.settings) {
      throw hostUnavailable('settings store');
    }
    return options.settings;
  }

  function requireClient(): TelegramClient {
    if (!options.client) {
      throw hostUnavailable('telegram client');
    }
    return options.client;
  }

  function requireEnabled(): void {
    if (requireSettings().get(ENABLED_SETTING) !== true) {
      throw new ToolError(
        'host_unavailable',
        false,
        `telegram is disabled. Set ${ENABLED_SETTING} to true with settings.set first.`,
      );
    }
  }

  function requireToken(): string {
    const token = requireSettings().get(TOKEN_SETTING);
    if (typeof token !== 'string' || token.length === 0) {
      throw missingApiKey('Telegram');
    }
    return token;
  }

  const getMe = defineTool({
    name: 'telegram.get_me',
    description: 'Fetch the bot username for the configured token.',
    args: z.object({}),
    run: async () => {
      const client = requireClient();
      requireEnabled();
      const token = requireToken();
      try {
        const user = await client.getMe(token);
        return user.username ? `@${user.username}` : user.first_name;
      } catch (error) {
        throw toToolError(error);
      }
    },
  });

  const sendMessage = defineTool({
    name: 'telegram.send_message',
    description: 'Send a text message to a chat id.',
    risk: 'sensitive',
    args: z.object({
      chat_id: z.number().int().describe('Target chat id'),
      text: z.string().min(1).describe('Message text'),
    }),
    run: async ({ chat_id, text }) => {
      const client = requireClient();
      requireEnabled();
      const token = requireToken();
      try {
        const message = await client.sendMessage(token, chat_id, text);
        console.log(`[telegram] sent message ${message.message_id} to chat ${chat_id}`);
        return `Sent message ${message.message_id} to chat ${chat_id}`;
      } catch (error) {
        throw toToolError(error);
      }
    },
  });

  const setToken = defineTool({
    name: 'telegram.set_token',
    description: 'Set the Telegram bot token.',
    risk: 'restricted',
    args: z.object({
      token: z.string().trim().min(1).describe('Bot API token'),
    }),
    run: async ({ token }) => {
      requireSettings().set(TOKEN_SETTING, token);
      console.log('[telegram] bot token updated');
      return 'Token updated';
    },
  });

  return createToolProvider({
    name: 'telegram',
    category: TELEGRAM_CATEGORY,
    tools: [getMe, sendMessage, setToken],
  });
}
