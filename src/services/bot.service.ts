import type TelegramBot from "node-telegram-bot-api";
import { logger } from "../logger.js";

export interface BotService {
  sendMessage(
    chatId: TelegramBot.ChatId,
    text: string,
    options?: TelegramBot.SendMessageOptions
  ): Promise<TelegramBot.Message | undefined>;

  onText(
    regexp: RegExp,
    callback: (msg: TelegramBot.Message, match: RegExpExecArray | null) => void
  ): void;
}

export function createBotService(bot: TelegramBot): BotService {
  return {
    sendMessage: async (chatId, text, options) => {
      try {
        return await bot.sendMessage(chatId, text, options);
      } catch (error) {
        logger.error("Error sending message:", error);
        return undefined;
      }
    },
    onText: (regexp, callback) => {
      bot.onText(regexp, callback);
    },
  };
}
