// pattern: Functional Core

/**
 * Telegram Bot API client port.
 * Only the calls the telegram tools need.
 */

export type TelegramUser = {
  readonly id: number;
  readonly is_bot: boolean;
  readonly first_name: string;
  readonly username?: string;
};

export type TelegramMessage = {
  readonly message_id: number;
  readonly chat: { readonly id: number };
  readonly date: number;
  readonly text?: string;
};

export interface TelegramClient {
  getMe(token: string): Promise<TelegramUser>;
  sendMessage(token: string, chatId: number, text: string): Promise<TelegramMessage>;
}

export type TelegramErrorCode = 'api_error' | 'invalid_response';

export class TelegramError extends Error {
  constructor(
    public code: TelegramErrorCode,
    message: string = '',
  ) {
    super(message);
    this.name = 'TelegramError';
  }
}
