import "dotenv/config";
import { z } from "zod";
import cron from "node-cron";
import { SUPERVISION_MODES, DEFAULT_RULESET_VERSION } from "./domain/policy.js";

const Env = z.object({
  BOT_TOKEN: z.string().min(10, "BOT_TOKEN is required"),
  DB_FILE: z.string().default("./data/fieldwork.sqlite"),
  RULESETS_FILE: z.string().default("./data/rulesets.json"),
  RULESET_VERSION: z.string().min(1).default(DEFAULT_RULESET_VERSION),
  SUPERVISION_MODE: z.enum(SUPERVISION_MODES).default("Standard"),
  SUMMARY_CRON: z
    .string()
    .default("0 9 1 * *") // 09:00 on the 1st
    .refine((expr) => cron.validate(expr), "SUMMARY_CRON is not a valid cron expression"),
  TZ: z.string().optional(),
  NODE_ENV: z.string().optional(),
});

export type AppConfig = z.infer<typeof Env>;

export const config: AppConfig = Env.parse(process.env);
