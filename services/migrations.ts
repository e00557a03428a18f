import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { TriageLogger } from "../types/plugin-api.js";
import type { TriageDb } from "./db.js";
import { withTriageTransaction } from "./db.js";
import { resolvePackagePath } from "./paths.js";

export type TriageMigrationRecord = {
  filename: string;
  checksum: string;
  applied_at: string;
};

export type TriageMigrationRunResult = {
  applied: string[];
  skipped: string[];
};

const MIGRATION_TABLE_NAME = "triage_schema_migrations";

function defaultMigrationsDir(): string {
  return resolvePackagePath("db", "migrations");
}

function migrationChecksum(sql: string): string {
  return createHash("sha256").update(sql, "utf8").digest("hex");
}

function ensureMigrationTable(db: TriageDb): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${MIGRATION_TABLE_NAME} (
      filename TEXT PRIMARY KEY,
      checksum TEXT NOT NULL,
      applied_at TEXT NOT NULL
    );
  `);
}

function listMigrationFiles(migrationsDir: string): string[] {
  return fs
    .readdirSync(migrationsDir)
    .filter((name) => name.endsWith(".sql"))
    .sort((left, right) => left.localeCompare(right));
}

function readAppliedMigrations(db: TriageDb): Map<string, TriageMigrationRecord> {
  const rows = db
    .prepare<[], TriageMigrationRecord>(
      `SELECT filename, checksum, applied_at FROM ${MIGRATION_TABLE_NAME} ORDER BY filename ASC`,
    )
    .all();

  return new Map(rows.map((row) => [row.filename, row]));
}

export function runTriageMigrations(params: {
  db: TriageDb;
  migrationsDir?: string;
  logger?: TriageLogger;
}): TriageMigrationRunResult {
  const migrationsDir = path.resolve(params.migrationsDir ?? defaultMigrationsDir());
  if (!fs.existsSync(migrationsDir)) {
    throw new Error(`Triage migrations directory not found: ${migrationsDir}`);
  }

  ensureMigrationTable(params.db);

  const applied = readAppliedMigrations(params.db);
  const result: TriageMigrationRunResult = { applied: [], skipped: [] };

  for (const filename of listMigrationFiles(migrationsDir)) {
    const sql = fs.readFileSync(path.join(migrationsDir, filename), "utf8");
    const checksum = migrationChecksum(sql);
    const existing = applied.get(filename);

    if (existing) {
      if (existing.checksum !== checksum) {
        throw new Error(`Triage migration checksum mismatch for ${filename}`);
      }
      result.skipped.push(filename);
      continue;
    }

    withTriageTransaction(params.db, () => {
      params.db.exec(sql);
      params.db
        .prepare(
          `INSERT INTO ${MIGRATION_TABLE_NAME} (filename, checksum, applied_at) VALUES (?, ?, ?)`,
        )
        .run(filename, checksum, new Date().toISOString());
    });

    params.logger?.info?.(`[symptom-triage] applied migration ${filename}`);
    result.applied.push(filename);
  }

  return result;
}

export function listAppliedTriageMigrations(db: TriageDb): TriageMigrationRecord[] {
  ensureMigrationTable(db);
  return db
    .prepare<[], TriageMigrationRecord>(
      `SELECT filename, checksum, applied_at FROM ${MIGRATION_TABLE_NAME} ORDER BY filename ASC`,
    )
    .all();
}
