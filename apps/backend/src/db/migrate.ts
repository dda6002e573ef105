import fs from "node:fs";
import path from "node:path";
import { createHash } from "node:crypto";
import { fileURLToPath } from "node:url";
import type Database from "better-sqlite3";
import type { Logger } from "pino";

const MIGRATIONS_TABLE = "schema_migrations";

export const MIGRATIONS_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "migrations");

const ensureMigrationsTable = (db: Database.Database) => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
      id TEXT PRIMARY KEY,
      checksum TEXT NOT NULL,
      applied_at INTEGER NOT NULL
    );
  `);
};

const migrationIdFromFile = (fileName: string): string => path.basename(fileName, path.extname(fileName));

const computeChecksum = (contents: string): string => createHash("sha256").update(contents).digest("hex");

const findApplied = (db: Database.Database, id: string): { checksum: string } | undefined =>
  db.prepare<[string], { checksum: string }>(`SELECT checksum FROM ${MIGRATIONS_TABLE} WHERE id = ?`).get(id);

const markApplied = (db: Database.Database, id: string, checksum: string) => {
  db.prepare(
    `INSERT INTO ${MIGRATIONS_TABLE} (id, checksum, applied_at)
     VALUES (@id, @checksum, @applied_at)
     ON CONFLICT(id) DO UPDATE SET checksum = excluded.checksum, applied_at = excluded.applied_at`
  ).run({ id, checksum, applied_at: Date.now() });
};

/**
 * Apply pending *.sql migrations in file-name order. Each file runs in its own
 * transaction together with its bookkeeping row. Returns the applied ids.
 */
export const runMigrations = (
  db: Database.Database,
  logger: Logger,
  migrationsDir: string = MIGRATIONS_DIR
): string[] => {
  ensureMigrationsTable(db);

  const files = fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith(".sql"))
    .filter((file) => !file.endsWith("_down.sql") && !file.endsWith(".down.sql"))
    .sort();

  const applied: string[] = [];
  for (const file of files) {
    const id = migrationIdFromFile(file);
    const sql = fs.readFileSync(path.join(migrationsDir, file), "utf8");
    const checksum = computeChecksum(sql);

    const existing = findApplied(db, id);
    if (existing) {
      if (existing.checksum !== checksum) {
        logger.warn({ migration: id, existing: existing.checksum, current: checksum }, "Migration checksum mismatch");
      }
      continue;
    }

    db.transaction(() => {
      const trimmed = sql.trim();
      if (trimmed) db.exec(trimmed);
      markApplied(db, id, checksum);
    })();
    logger.info({ migration: id }, "Applied migration");
    applied.push(id);
  }

  return applied;
};
