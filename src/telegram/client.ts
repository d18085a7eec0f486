// pattern: Imperative Shell

import { z } from 'zod';
import { TelegramError } from './types.ts';
import type { TelegramClient, TelegramMessage, TelegramUser } from './types.ts';

const DEFAULT_BASE_URL = 'https://api.telegram.org';
const DEFAULT_TIMEOUT_MS = 20000;

const EnvelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
});

const UserSchema = z.object({
  id: z.number(),
  is_bot: z.boolean(),
  first_name: z.string(),
  username: z.string().optional(),
});

const MessageSchema = z.object({
  message_id: z.number(),
  chat: z.object({ id: z.number() }),
  date: z.number(),
  text: z.string().optional(),
});

type TelegramClientOptions = {
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
};

export function createTelegramClient(options: TelegramClientOptions = {}): TelegramClient {
  const baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  async function call<T extends z.ZodType>(
    token: string,
    method: string,
    body: Record<string, unknown>,
    resultSchema: T,
  ): Promise<z.output<T>> {
    const response = await fetch(`${baseUrl}/bot${token}/${method}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      throw new TelegramError(
        'api_error',
        `telegram ${method} failed: ${response.status} ${response.statusText}`,
      );
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch {
      throw new TelegramError('invalid_response', `telegram ${method} returned invalid JSON`);
    }

    const envelope = EnvelopeSchema.safeParse(data);
    if (!envelope.success) {
      throw new TelegramError('invalid_response', `telegram ${method} returned an unexpected response`);
    }
    if (!envelope.data.ok) {
      throw new TelegramError(
        'api_error',
        `telegram ${method} failed: ${envelope.data.description ?? 'unknown error'}`,
      );
    }

    const result = resultSchema.safeParse(envelope.data.result);
    if (!result.success) {
      throw new TelegramError('invalid_response', `telegram ${method} returned an unexpected result`);
    }
    return result.data;
  }

  return {
    async getMe(token: string): Promise<TelegramUser> {
      return call(token, 'getMe', {}, UserSchema);
    },

    async sendMessage(token: string, chatId: number, text: string): Promise<TelegramMessage> {
      return call(token, 'sendMessage', { chat_id: chatId, text }, MessageSchema);
    },
  };
}
