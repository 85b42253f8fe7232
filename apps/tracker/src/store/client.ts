import Database from "better-sqlite3";
import {
  type BetterSQLite3Database,
  drizzle,
} from "drizzle-orm/better-sqlite3";
import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import path from "node:path";
import { getEnvVar } from "../shared/env";
import { getLogger } from "../shared/logger";
import { BLOBS_TABLE, DATABASE_FILE_NAME } from "./constants";
import { schema } from "./schema";

const logger = getLogger("database-client", "store");

export type TrackerDatabase = BetterSQLite3Database<typeof schema>;

export type DatabaseHandle = {
  db: TrackerDatabase;
  close: () => void;
};

export const IN_MEMORY_DATABASE = ":memory:";

export const resolveDatabasePath = (explicitPath?: string): string => {
  const configured = explicitPath ?? getEnvVar("TAPMETER_DATABASE_PATH");
  if (configured && configured.trim().length > 0) {
    return configured;
  }
  return path.join(homedir(), ".tapmeter", DATABASE_FILE_NAME);
};

export const openDatabase = (databasePath: string): DatabaseHandle => {
  if (databasePath !== IN_MEMORY_DATABASE) {
    mkdirSync(path.dirname(databasePath), { recursive: true });
  }

  const sqlite = new Database(databasePath);
  if (databasePath !== IN_MEMORY_DATABASE) {
    sqlite.pragma("journal_mode = WAL");
  }
  sqlite
    .prepare(
      `
        CREATE TABLE IF NOT EXISTS ${BLOBS_TABLE} (
          key TEXT PRIMARY KEY NOT NULL,
          value BLOB NOT NULL,
          updated_at INTEGER NOT NULL
        )
      `,
    )
    .run();

  logger.debug("Opened tracker database", { databasePath });

  return {
    db: drizzle(sqlite, { schema }),
    close: () => {
      if (sqlite.open) {
        sqlite.close();
      }
    },
  };
};
