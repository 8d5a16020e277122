import type { UserRepository } from "../users/userRepository.js";
import type { BotService } from "./bot.service.js";
import type { SessionLogService } from "../sessionlog/sessionLogService.js";
import type { SessionRepository } from "../sessionlog/sessionRepository.js";

export interface Services {
  userRepository: UserRepository;
  botService: BotService;
  sessionLogService: SessionLogService;
  sessionRepository: SessionRepository;
}
