// pattern: Functional Core (barrel export)

export type { TelegramUser, TelegramMessage, TelegramClient, TelegramErrorCode } from './types.ts';
export { TelegramError } from './types.ts';
export { createTelegramClient } from './client.ts';
