/**
 * SQLite database: opens the catalog file and applies the schema.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";

export type CatalogDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS domain_document (
    identifier TEXT PRIMARY KEY,
    project TEXT NOT NULL,
    service TEXT NOT NULL,
    domain TEXT NOT NULL,
    version INTEGER NOT NULL CHECK (version > 0),
    summary TEXT NOT NULL,
    properties TEXT NOT NULL DEFAULT '[]',
    policies TEXT NOT NULL DEFAULT '[]',
    dependencies TEXT NOT NULL DEFAULT '[]',
    embedding TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    deleted_at TEXT,
    UNIQUE (project, service, domain, version)
  );
  CREATE INDEX IF NOT EXISTS idx_domain_document_project
    ON domain_document (project, deleted_at);

  CREATE TABLE IF NOT EXISTS project_convention (
    identifier TEXT PRIMARY KEY,
    project TEXT NOT NULL,
    category TEXT NOT NULL,
    title TEXT NOT NULL,
    version INTEGER NOT NULL CHECK (version > 0),
    content TEXT NOT NULL,
    example_correct TEXT,
    example_incorrect TEXT,
    embedding TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    deleted_at TEXT,
    UNIQUE (project, category, title, version)
  );
  CREATE INDEX IF NOT EXISTS idx_project_convention_project
    ON project_convention (project, deleted_at);
`;

/** Open (creating if needed) the catalog database. `":memory:"` is accepted. */
export function openDatabase(path: string): CatalogDatabase {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }
  const db = new Database(path);
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");
  db.exec(SCHEMA);
  return db;
}
