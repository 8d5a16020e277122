import sqlite3 from "sqlite3";
import path from "node:path";
import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { logger } from "../logger.js";

let db: sqlite3.Database | null = null;

export async function initDb(dbFile: string): Promise<sqlite3.Database> {
  const dir = path.dirname(dbFile);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });

  db = new sqlite3.Database(dbFile);

  await exec("PRAGMA foreign_keys = ON;");
  await exec("PRAGMA journal_mode = WAL;");

  // Auto-apply schema if the sessions table doesn't exist
  const exists = await tableExists("fieldwork_sessions");
  if (!exists) {
    const schemaPath = locateSchemaPath();
    const sql = fs.readFileSync(schemaPath, "utf8");
    await exec(sql);
    logger.info(`Applied schema from ${schemaPath}`);
  } else {
    logger.info(`SQLite ready at ${dbFile} (schema already present)`);
  }

  return db;
}

export function getDb(): sqlite3.Database {
  if (!db) throw new Error("DB not initialized");
  return db;
}

export function closeDb(): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (!db) return resolve();
    const current = db;
    db = null;
    current.close((err) => (err ? reject(err) : resolve()));
  });
}

function exec(sql: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (!db) return reject(new Error("DB not initialized"));
    db.exec(sql, (err) => (err ? reject(err) : resolve()));
  });
}

function get<T>(sql: string, params: readonly unknown[] = []) {
  return new Promise<T | undefined>((resolve, reject) => {
    if (!db) return reject(new Error("DB not initialized"));
    db.get(sql, params as never, (err, row: T | undefined) =>
      err ? reject(err) : resolve(row)
    );
  });
}

async function tableExists(name: string): Promise<boolean> {
  const row = await get<{ name: string }>(
    `SELECT name FROM sqlite_master WHERE type='table' AND name=? LIMIT 1`,
    [name]
  );
  return !!row;
}

function locateSchemaPath(): string {
  // Prefer compiled asset: dist/db/schema.sql (same folder as this file after build)
  const here = path.dirname(fileURLToPath(import.meta.url));
  const besideCandidate = path.resolve(here, "schema.sql");
  if (fs.existsSync(besideCandidate)) return besideCandidate;

  // Fallback: dev path from project root
  const devCandidate = path.resolve(process.cwd(), "src", "db", "schema.sql");
  if (fs.existsSync(devCandidate)) return devCandidate;

  throw new Error("schema.sql not found in dist/db or src/db");
}
