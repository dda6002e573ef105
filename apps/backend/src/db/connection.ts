import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { runtimeConfig } from "../config";

export const IN_MEMORY = ":memory:";

const ensureDir = (filePath: string) => {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

export const openDatabase = (sqlitePath: string = runtimeConfig.sqlitePath) => {
  if (sqlitePath === IN_MEMORY) {
    const db = new Database(IN_MEMORY);
    db.pragma("foreign_keys = ON");
    return db;
  }

  const absolutePath = path.resolve(process.cwd(), sqlitePath);
  ensureDir(absolutePath);
  const db = new Database(absolutePath);
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");
  db.pragma("synchronous = NORMAL");

  // drug_images.drug_id cascades on delete
  db.pragma("foreign_keys = ON");

  return db;
};
