// pattern: Imperative Shell

import { describe, it, expect, afterEach, vi } from 'vitest';
import { createTelegramClient } from './client.ts';
import { TelegramError } from './types.ts';

function stubFetch(response: Response) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => response);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function jsonResponse(body: unknown, init?: ResponseInit): Response {
  return new Response(JSON.stringify(body), { status: 200, ...init });
}

async function failureOf(promise: Promise<unknown>): Promise<TelegramError> {
  const failure = await promise.then(
    () => undefined,
    (error: unknown) => error,
  );
  if (!(failure instanceof TelegramError)) {
    throw new Error(`expected a TelegramError, got ${String(failure)}`);
  }
  return failure;
}

describe('Telegram client', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should call getMe on the bot endpoint and return the user', async () => {
    const fetchMock = stubFetch(
      jsonResponse({ ok: true, result: { id: 7, is_bot: true, first_name: 'Bot', username: 'test_bot' } }),
    );

    const user = await createTelegramClient().getMe('test-token');

    expect(user).toEqual({ id: 7, is_bot: true, first_name: 'Bot', username: 'test_bot' });
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.telegram.org/bottest-token/getMe');
  });

  it('should post sendMessage with chat id and text to a custom base URL', async () => {
    const fetchMock = stubFetch(
      jsonResponse({ ok: true, result: { message_id: 3, chat: { id: 42 }, date: 1700000000, text: 'hi' } }),
    );

    const message = await createTelegramClient({ baseUrl: 'http://localhost:8081' }).sendMessage(
      'test-token',
      42,
      'hi',
    );

    const call = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe('http://localhost:8081/bottest-token/sendMessage');
    expect(call?.[1]?.method).toBe('POST');
    expect(JSON.parse(String(call?.[1]?.body))).toEqual({ chat_id: 42, text: 'hi' });
    expect(message.message_id).toBe(3);
  });

  it('should raise api_error on a non-2xx status', async () => {
    stubFetch(new Response('{}', { status: 502, statusText: 'Bad Gateway' }));

    const failure = await failureOf(createTelegramClient().getMe('test-token'));

    expect(failure.code).toBe('api_error');
    expect(failure.message).toBe('telegram getMe failed: 502 Bad Gateway');
  });

  it('should raise api_error with the description when ok is false', async () => {
    stubFetch(jsonResponse({ ok: false, description: 'Bad Request: chat not found' }));

    const failure = await failureOf(createTelegramClient().sendMessage('test-token', 1, 'x'));

    expect(failure.code).toBe('api_error');
    expect(failure.message).toBe('telegram sendMessage failed: Bad Request: chat not found');
  });

  it('should raise invalid_response on a body that is not JSON', async () => {
    stubFetch(new Response('<html>', { status: 200 }));

    const failure = await failureOf(createTelegramClient().getMe('test-token'));

    expect(failure.code).toBe('invalid_response');
    expect(failure.message).toBe('telegram getMe returned invalid JSON');
  });

  it('should raise invalid_response on an unexpected envelope', async () => {
    stubFetch(jsonResponse({ result: {} }));

    const failure = await failureOf(createTelegramClient().getMe('test-token'));

    expect(failure.message).toBe('telegram getMe returned an unexpected response');
  });

  it('should raise invalid_response on an unexpected result', async () => {
    stubFetch(jsonResponse({ ok: true, result: { id: 'seven' } }));

    const failure = await failureOf(createTelegramClient().getMe('test-token'));

    expect(failure.code).toBe('invalid_response');
    expect(failure.message).toBe('telegram getMe returned an unexpected result');
  });
});
