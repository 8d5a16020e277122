import { config } from "./config.js";
import { logger } from "./logger.js";
import { closeDb, initDb } from "./db/sqlite.js";
import { createBot } from "./bot/bot.js";
import { startScheduler } from "./cron/scheduler.js";
import { installGlobalErrorHandlers } from "./infra/global-errors.js";
import { SessionRepositorySqlite } from "./sessionlog/sessionRepositorySqlite.js";
import { createSessionLogService } from "./sessionlog/sessionLogServiceImpl.js";

async function main(): Promise<void> {
  await initDb(config.DB_FILE);

  const sessionRepository = new SessionRepositorySqlite();
  const sessionLogService = createSessionLogService(
    {
      rulesetsFile: config.RULESETS_FILE,
      rulesetVersion: config.RULESET_VERSION,
      mode: config.SUPERVISION_MODE,
    },
    sessionRepository
  );

  const { bot, services } = await createBot(
    config.BOT_TOKEN,
    sessionLogService,
    sessionRepository
  );

  const summaries = startScheduler(services, config.SUMMARY_CRON);
  installGlobalErrorHandlers(async () => {
    summaries.stop();
    await bot.stopPolling();
    await closeDb();
  });

  bot.on("polling_error", (err) =>
    logger.error("Telegram polling error", { err })
  );
  bot.on("error", (err) => logger.error("Telegram error", { err }));

  logger.info("Bot started. Use /log to record a session.");
}

main().catch((e: unknown) => {
  logger.error("Fatal startup error", { err: e });
  process.exit(1);
});
