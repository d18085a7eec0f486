// pattern: Imperative Shell

import { describe, it, expect, beforeEach } from 'vitest';
import { createTelegramTools } from './telegram.ts';
import { createInMemorySettingsStore } from '../../settings/in-memory.ts';
import { TelegramError, type TelegramClient } from '../../telegram/types.ts';
import type { SettingsStore } from '../../settings/types.ts';

describe('Built-in telegram tools', () => {
  let settings: SettingsStore;
  let sent: Array<{ token: string; chatId: number; text: string }>;
  let client: TelegramClient;

  beforeEach(() => {
    settings = createInMemorySettingsStore({ telegram_enabled: true, telegram_bot_token: 'test-token' });
    sent = [];
    client = {
      getMe: async () => ({ id: 1, is_bot: true, first_name: 'Bot', username: 'test_bot' }),
      sendMessage: async (token, chatId, text) => {
        sent.push({ token, chatId, text });
        return { message_id: 99, chat: { id: chatId }, date: 0, text };
      },
    };
  });

  it('should declare risk per tool', () => {
    const descriptors = createTelegramTools({ client, settings }).descriptors();

    expect(descriptors.map((d) => [d.name, d.risk])).toEqual([
      ['telegram.get_me', 'safe'],
      ['telegram.send_message', 'sensitive'],
      ['telegram.set_token', 'restricted'],
    ]);
  });

  it('should return the bot username', async () => {
    const result = await createTelegramTools({ client, settings }).invoke('telegram.get_me', {});

    expect(result).toEqual({ content: '@test_bot', isError: false });
  });

  it('should fall back to the first name when the bot has no username', async () => {
    client = { ...client, getMe: async () => ({ id: 1, is_bot: true, first_name: 'Bot' }) };

    const result = await createTelegramTools({ client, settings }).invoke('telegram.get_me', {});

    expect(result.content).toBe('Bot');
  });

  it('should send a message with the stored token', async () => {
    const result = await createTelegramTools({ client, settings }).invoke('telegram.send_message', {
      chat_id: 12345,
      text: 'hello',
    });

    expect(result).toEqual({ content: 'Sent message 99 to chat 12345', isError: false });
    expect(sent).toEqual([{ token: 'test-token', chatId: 12345, text: 'hello' }]);
  });

  it('should require an integer chat id', async () => {
    const result = await createTelegramTools({ client, settings }).invoke('telegram.send_message', {
      chat_id: '12345',
      text: 'hello',
    });

    expect(result.isError).toBe(true);
    expect(result.content.startsWith('invalid arguments: chat_id: ')).toBe(true);
    expect(sent).toEqual([]);
  });

  it('should report a missing token as a missing API key', async () => {
    const empty = createInMemorySettingsStore({ telegram_enabled: true });

    const result = await createTelegramTools({ client, settings: empty }).invoke('telegram.get_me', {});

    expect(result).toEqual({ content: 'Telegram API key is not configured', isError: true });
  });

  it('should refuse to reach the Bot API while telegram is disabled', async () => {
    settings.set('telegram_enabled', false);
    const tools = createTelegramTools({ client, settings });

    const expected = {
      content: 'telegram is disabled. Set telegram_enabled to true with settings.set first.',
      isError: true,
    };
    expect(await tools.invoke('telegram.send_message', { chat_id: 5, text: 'hi' })).toEqual(expected);
    expect(await tools.invoke('telegram.get_me', {})).toEqual(expected);
    expect(sent).toEqual([]);
  });

  it('should treat an unset enabled flag as disabled', async () => {
    const unset = createInMemorySettingsStore({ telegram_bot_token: 'test-token' });

    const result = await createTelegramTools({ client, settings: unset }).invoke('telegram.send_message', {
      chat_id: 5,
      text: 'hi',
    });

    expect(result.isError).toBe(true);
    expect(sent).toEqual([]);
  });

  it('should store a token while telegram is disabled', async () => {
    settings.set('telegram_enabled', false);

    const result = await createTelegramTools({ client, settings }).invoke('telegram.set_token', {
      token: 'test-token-3',
    });

    expect(result).toEqual({ content: 'Token updated', isError: false });
    expect(settings.get('telegram_bot_token')).toBe('test-token-3');
  });

  it('should store a new token', async () => {
    const result = await createTelegramTools({ client, settings }).invoke('telegram.set_token', {
      token: 'test-token-2',
    });

    expect(result).toEqual({ content: 'Token updated', isError: false });
    expect(settings.get('telegram_bot_token')).toBe('test-token-2');
  });

  it('should map client errors onto api and response errors', async () => {
    client = {
      getMe: async () => {
        throw new TelegramError('invalid_response', 'telegram getMe returned invalid JSON');
      },
      sendMessage: async () => {
        throw new TelegramError('api_error', 'telegram sendMessage failed: Bad Request: chat not found');
      },
    };
    const tools = createTelegramTools({ client, settings });

    expect(await tools.invoke('telegram.get_me', {})).toEqual({
      content: 'telegram getMe returned invalid JSON',
      isError: true,
    });
    expect(await tools.invoke('telegram.send_message', { chat_id: 1, text: 'x' })).toEqual({
      content: 'telegram sendMessage failed: Bad Request: chat not found',
      isError: true,
    });
  });

  it('should report a missing client as host unavailable', async () => {
    const result = await createTelegramTools({ settings }).invoke('telegram.get_me', {});

    expect(result).toEqual({ content: 'telegram client is unavailable', isError: true });
  });
});
