import type TelegramBot from "node-telegram-bot-api";
import { logger } from "../../logger.js";
import type { Services } from "../../services/services.js";
import type { BotService } from "../../services/bot.service.js";
import type { UserRepository } from "../../users/userRepository.js";
import type { SessionLogService } from "../../sessionlog/sessionLogService.js";

export interface BotMessageFrom {
  id: number;
  first_name?: string;
  last_name?: string;
  username?: string;
}

export interface BotMessage {
  chatId: number;
  from: BotMessageFrom;
}

export abstract class BaseCommand {
  protected tgId: number;
  protected firstName: string | undefined;
  protected lastName: string | undefined;
  protected username: string | undefined;
  protected msg: BotMessage;
  protected userId!: number;
  protected match: RegExpExecArray | null;
  protected userRepository: UserRepository;
  protected botService: BotService;
  protected sessionLogService: SessionLogService;

  constructor(
    msg: BotMessage,
    match: RegExpExecArray | null,
    services: Services
  ) {
    this.msg = msg;
    this.tgId = msg.from.id;
    this.firstName = msg.from.first_name;
    this.lastName = msg.from.last_name;
    this.username = msg.from.username;
    this.match = match;
    this.userRepository = services.userRepository;
    this.botService = services.botService;
    this.sessionLogService = services.sessionLogService;
  }

  protected async upsertUser(): Promise<number> {
    return await this.userRepository.upsert({
      tgUserId: this.tgId,
      firstName: this.firstName,
      lastName: this.lastName,
      username: this.username,
    });
  }

  protected async sendMessage(
    text: string,
    options: TelegramBot.SendMessageOptions = { parse_mode: "MarkdownV2" }
  ): Promise<void> {
    await this.botService.sendMessage(this.msg.chatId, text, options);
  }

  public async execute(): Promise<void> {
    try {
      this.userId = await this.upsertUser();

      if (!(await this.validate())) {
        return;
      }

      await this.process();
    } catch (error) {
      logger.error(`Error in command ${this.constructor.name} execution`, {
        error,
        chatId: this.msg.chatId,
      });
      await this.sendMessage(
        "Sorry, an error occurred while processing your command.",
        {}
      );
    }
  }

  protected validate(): Promise<boolean> {
    return Promise.resolve(true);
  }

  protected abstract process(): Promise<void>;
}
