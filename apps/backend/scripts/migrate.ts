#!/usr/bin/env tsx

import { pino } from "pino";
import { runtimeConfig } from "../src/config";
import { openDatabase } from "../src/db/connection";
import { runMigrations } from "../src/db/migrate";

const logger = pino({
  level: runtimeConfig.logLevel,
});

const db = openDatabase(runtimeConfig.sqlitePath);
try {
  const applied = runMigrations(db, logger);
  logger.info({ applied, sqlitePath: runtimeConfig.sqlitePath }, "Migrations applied");
} finally {
  db.close();
}
