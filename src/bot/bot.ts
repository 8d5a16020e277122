import TelegramBot from "node-telegram-bot-api";
import { registerCommands } from "./commands.js";
import { logger } from "../logger.js";
import type { Services } from "../services/services.js";
import { createBotService } from "../services/bot.service.js";
import type { SessionLogService } from "../sessionlog/sessionLogService.js";
import type { SessionRepository } from "../sessionlog/sessionRepository.js";
import { UserRepositorySqlite } from "../users/userRepositorySqlite.js";

export async function createBot(
  token: string,
  sessionLogService: SessionLogService,
  sessionRepository: SessionRepository
): Promise<{ bot: TelegramBot; services: Services }> {
  const bot = new TelegramBot(token, {
    polling: {
      autoStart: false,
      params: {
        timeout: 30,
        limit: 100,
        allowed_updates: ["message"],
      },
    },
  });

  // Keep queued updates so a /log sent before the process came up still arrives
  await bot.deleteWebHook();

  const services: Services = {
    userRepository: new UserRepositorySqlite(),
    botService: createBotService(bot),
    sessionLogService,
    sessionRepository,
  };

  registerCommands(services);

  await bot.startPolling({ restart: true }); // start long-polling
  logger.info("Polling started.");

  const me = await bot.getMe();
  logger.info(`Logged in as @${me.username ?? "unknown"}`);

  return { bot, services };
}
