import { logger } from "../logger.js";

function logErr(kind: string, err: unknown): void {
  if (err instanceof Error) {
    logger.error(`${kind}: ${err.message}`, { kind, stack: err.stack });
  } else {
    logger.error(`${kind}: ${String(err)}`, { kind, err });
  }
}

export function installGlobalErrorHandlers(
  onShutdown: () => Promise<void> = () => Promise.resolve()
): void {
  process.on("uncaughtException", (err: Error) => {
    logErr("uncaughtException", err);
  });

  process.on("unhandledRejection", (reason: unknown) => {
    logErr("unhandledRejection", reason);
  });

  process.on("warning", (w: Error) => {
    logger.warn(`Process warning: ${w.name}: ${w.message}`, { stack: w.stack });
  });

  const signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];
  for (const sig of signals) {
    process.once(sig, () => {
      logger.info(`Signal received: ${sig}. Shutting down…`);
      void onShutdown()
        .catch((err: unknown) => logErr("shutdown", err))
        .finally(() => setTimeout(() => process.exit(0), 150));
    });
  }
}
