import fs from "node:fs";
import path from "node:path";
import type { RuleSetSource } from "./types.js";

export class JsonFileRuleSetSource implements RuleSetSource {
  private readonly filePath: string;

  public constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  public readCatalog(): unknown {
    const raw = fs.readFileSync(this.filePath, "utf8");
    return JSON.parse(raw) as unknown;
  }
}
