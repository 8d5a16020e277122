import { BaseCommand } from "./baseCommand.js";

export class DeleteCommand extends BaseCommand {
  public static readonly commandId = "delete";
  public static readonly regex = /^\/delete(?:@\w+)?\s+([A-Za-z0-9_-]+)$/i;

  protected async process(): Promise<void> {
    const id = this.match?.[1] ?? "";
    const removed = await this.sessionLogService.deleteSession(this.userId, id);
    await this.sendMessage(
      removed
        ? `🗑 Deleted \`${id}\`\\. Log the corrected session with /log\\.`
        : `No session \`${id}\` in your log\\.`
    );
  }
}
