import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import Database from "better-sqlite3";

export type TriageDb = Database.Database;

export const IN_MEMORY_DB_PATH = ":memory:";

export function resolveTriageDbPath(dbPath: string): string {
  const trimmed = dbPath.trim();
  if (trimmed === IN_MEMORY_DB_PATH) {
    return trimmed;
  }
  if (trimmed === "~" || trimmed.startsWith("~/") || trimmed.startsWith("~\\")) {
    return path.resolve(os.homedir(), trimmed.slice(2));
  }
  return path.resolve(trimmed);
}

export function openTriageDb(dbPath: string): TriageDb {
  const resolvedPath = resolveTriageDbPath(dbPath);
  if (resolvedPath !== IN_MEMORY_DB_PATH) {
    fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });
  }

  const db = new Database(resolvedPath);
  db.pragma("foreign_keys = ON");
  db.pragma("journal_mode = WAL");
  return db;
}

export function closeTriageDb(db: TriageDb): void {
  db.close();
}

export function withTriageTransaction<T>(db: TriageDb, run: () => T): T {
  return db.transaction(run)();
}
