import { Api, GrammyError, HttpError } from "grammy";
import { createAppError, describeError, ERROR_CODES } from "../../watcher/errors.js";
import type { Logger } from "../../utils/logger.js";

export type TelegramTransport = {
  sendMessage(chatId: number | string, text: string): Promise<unknown>;
};

export type TelegramNotifier = {
  sendMessage(text: string): Promise<void>;
};

export type TelegramNotifierOptions = {
  bot_token: string;
  chat_id: string;
  logger: Logger;
  transport?: TelegramTransport;
};

function describeTransportError(error: unknown): Record<string, unknown> {
  if (error instanceof GrammyError) {
    return {
      reason: "api_error",
      error_code: error.error_code,
      description: error.description
    };
  }
  if (error instanceof HttpError) {
    return { reason: "network_error", error: describeError(error.error) };
  }
  return { reason: "unknown", error: describeError(error) };
}

export function createTelegramNotifier(
  options: TelegramNotifierOptions
): TelegramNotifier {
  const transport: TelegramTransport =
    options.transport ?? new Api(options.bot_token);
  const logger = options.logger;

  return {
    async sendMessage(text: string): Promise<void> {
      logger.info({
        message: "telegram.send.start",
        chat_id: options.chat_id,
        text
      });
      try {
        await transport.sendMessage(options.chat_id, text);
      } catch (error) {
        throw createAppError({
          code: ERROR_CODES.PROVIDER_TG_SEND_FAILED,
          message: `Telegram message delivery failed: ${describeError(error)}`,
          kind: "SEND",
          details: {
            chat_id: options.chat_id,
            ...describeTransportError(error)
          },
          cause: error
        });
      }
      logger.info({
        message: "telegram.send.success",
        chat_id: options.chat_id
      });
    }
  };
}
