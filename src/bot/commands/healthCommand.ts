import { BaseCommand, type BotMessage } from "./baseCommand.js";
import type { Services } from "../../services/services.js";
import type { SessionRepository } from "../../sessionlog/sessionRepository.js";
import { escapeMdV2 as E } from "../views.js";
import { isAdmin } from "../../security/admin.js";

export class HealthCommand extends BaseCommand {
  public static readonly commandId = "health";
  public static readonly regex = /^\/health(?:@\w+)?$/i;

  private readonly repo: SessionRepository;

  constructor(
    msg: BotMessage,
    match: RegExpExecArray | null,
    services: Services
  ) {
    super(msg, match, services);
    this.repo = services.sessionRepository;
  }

  protected async validate(): Promise<boolean> {
    if (!isAdmin(this.tgId)) {
      await this.sendMessage("Admins only\\.");
      return false;
    }
    return true;
  }

  protected async process(): Promise<void> {
    const total = await this.repo.countAll();
    const { resolution } = this.sessionLogService;
    const text =
      `*Health*\n` +
      `sessions stored: *${total}*\n` +
      `ruleset: *${E(resolution.version)}* \\(${E(resolution.origin)}\\)\n` +
      (resolution.reason ? `reason: ${E(resolution.reason)}\n` : "") +
      `DB: ${E(process.env.DB_FILE ?? "")}\n` +
      `rulesets: ${E(process.env.RULESETS_FILE ?? "")}`;
    await this.sendMessage(text);
  }
}
