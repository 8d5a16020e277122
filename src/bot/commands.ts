import { CommandFactory } from "./commandFactory.js";
import type { Services } from "../services/services.js";
import { StartCommand } from "./commands/startCommand.js";
import { LogCommand } from "./commands/logCommand.js";
import { StatsCommand } from "./commands/statsCommand.js";
import { DayCommand } from "./commands/dayCommand.js";
import { DeleteCommand } from "./commands/deleteCommand.js";
import { RulesCommand } from "./commands/rulesCommand.js";
import { HealthCommand } from "./commands/healthCommand.js";

export function registerCommands(services: Services): CommandFactory {
  const commandFactory = new CommandFactory(services);
  commandFactory.registerCommand(StartCommand);
  commandFactory.registerCommand(LogCommand);
  commandFactory.registerCommand(StatsCommand);
  commandFactory.registerCommand(DayCommand);
  commandFactory.registerCommand(DeleteCommand);
  commandFactory.registerCommand(RulesCommand);
  commandFactory.registerCommand(HealthCommand);

  commandFactory.submit();
  return commandFactory;
}
