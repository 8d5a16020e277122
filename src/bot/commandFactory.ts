import type TelegramBot from "node-telegram-bot-api";
import type { BaseCommand, BotMessage } from "./commands/baseCommand.js";
import type { Services } from "../services/services.js";
import { logger } from "../logger.js";

export interface CommandClass {
  new (
    msg: BotMessage,
    match: RegExpExecArray | null,
    services: Services
  ): BaseCommand;
  readonly commandId: string;
  readonly regex: RegExp;
}

export function toBotMessage(msg: TelegramBot.Message): BotMessage {
  return {
    chatId: msg.chat.id,
    from: msg.from
      ? {
          id: msg.from.id,
          first_name: msg.from.first_name,
          last_name: msg.from.last_name,
          username: msg.from.username,
        }
      : { id: 0 },
  };
}

export class CommandFactory {
  #commands: Map<string, CommandClass> = new Map();
  #services: Services;

  constructor(services: Services) {
    this.#services = services;
  }

  registerCommand(CommandClass: CommandClass): void {
    this.#commands.set(CommandClass.commandId, CommandClass);
  }

  commandIds(): string[] {
    return [...this.#commands.keys()];
  }

  submit(): void {
    for (const CommandClass of this.#commands.values()) {
      this.#services.botService.onText(CommandClass.regex, (msg, match) => {
        const command = this.createCommand(
          CommandClass.commandId,
          toBotMessage(msg),
          match
        );
        if (!command) return;
        void command.execute();
      });
    }
    logger.info(`Registered commands: ${this.commandIds().join(", ")}`);
  }

  createCommand(
    commandId: string,
    msg: BotMessage,
    match: RegExpExecArray | null
  ): BaseCommand | null {
    const CommandClass = this.#commands.get(commandId);
    if (!CommandClass) return null;
    return new CommandClass(msg, match, this.#services);
  }
}
