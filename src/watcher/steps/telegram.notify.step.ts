import type { TelegramNotifier } from "../../providers/telegram/index.js";

export type TelegramNotifyInput = {
  text: string;
};

export type TelegramNotifyOptions = {
  notifier: TelegramNotifier;
};

export async function notifyTelegram(
  input: TelegramNotifyInput,
  options: TelegramNotifyOptions
): Promise<void> {
  await options.notifier.sendMessage(input.text);
}
