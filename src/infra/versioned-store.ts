/**
 * Versioned entity store: append-only versions with whole-key soft delete.
 *
 * One implementation serves both catalogs; a {@link CatalogTable} tells it
 * which columns form the logical key and how the payload maps to columns.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { NotFoundError, PersistenceError, isCatalogError } from "../domain/errors.ts";
import type { LogicalKey, VersionedRecord } from "../domain/types.ts";
import type { CatalogDatabase } from "./database.ts";

export type SqlValue = string | number | null;

export interface CatalogTable<K extends LogicalKey, P, E extends K & P & VersionedRecord> {
  name: string;
  /** Logical key columns, `project` first. */
  keyColumns: readonly string[];
  /** Key values in `keyColumns` order. */
  keyValues(key: K): string[];
  encodePayload(payload: P): Record<string, SqlValue>;
  decode(row: unknown): E;
}

export interface VersionedStoreOptions {
  clock?: () => Date;
  newIdentifier?: () => string;
}

/** Attempts at claiming a version number before a unique conflict surfaces. */
export const MAX_SAVE_ATTEMPTS = 3;

const maxVersionRow = z.object({ max_version: z.number().int().nullable() });
const projectRow = z.object({ project: z.string() });

export class VersionedStore<K extends LogicalKey, P, E extends K & P & VersionedRecord> {
  private readonly clock: () => Date;
  private readonly newIdentifier: () => string;
  private readonly keyWhere: string;

  constructor(
    private readonly db: CatalogDatabase,
    private readonly table: CatalogTable<K, P, E>,
    options: VersionedStoreOptions = {},
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.newIdentifier = options.newIdentifier ?? randomUUID;
    this.keyWhere = table.keyColumns.map((c) => `${c} = ?`).join(" AND ");
  }

  get tableName(): string {
    return this.table.name;
  }

  // ── Writes ──────────────────────────────────────────────────────────

  /**
   * Append a new version for `key`. The next number is `max(version) + 1`
   * over every row of the key, deleted ones included, so a save after a
   * soft delete continues the sequence instead of reusing numbers.
   */
  save(key: K, payload: P): E {
    const keyValues = this.table.keyValues(key);
    const payloadColumns = this.table.encodePayload(payload);

    const insertNext = this.db.transaction((): string => {
      const current = maxVersionRow.parse(
        this.db
          .prepare(`SELECT MAX(version) AS max_version FROM ${this.table.name} WHERE ${this.keyWhere}`)
          .get(...keyValues),
      );
      const identifier = this.newIdentifier();
      const now = this.clock().toISOString();
      const columns: Record<string, SqlValue> = {
        identifier,
        version: (current.max_version ?? 0) + 1,
        ...payloadColumns,
        created_at: now,
        updated_at: now,
      };
      this.table.keyColumns.forEach((column, i) => {
        columns[column] = keyValues[i] ?? null;
      });

      const names = Object.keys(columns);
      this.db
        .prepare(
          `INSERT INTO ${this.table.name} (${names.join(", ")}) VALUES (${names.map(() => "?").join(", ")})`,
        )
        .run(...Object.values(columns));
      return identifier;
    });

    for (let attempt = 1; ; attempt++) {
      try {
        const identifier = insertNext.immediate();
        const saved = this.findByIdentifier(identifier);
        if (!saved) {
          throw new PersistenceError(`${this.table.name}: row ${identifier} vanished after insert`);
        }
        return saved;
      } catch (err) {
        if (isUniqueViolation(err) && attempt < MAX_SAVE_ATTEMPTS) continue;
        throw this.wrap("save", err);
      }
    }
  }

  /** Mark every live version of `key` deleted. Returns the number of rows affected. */
  softDelete(key: K): number {
    return this.guard("softDelete", () => {
      const result = this.db
        .prepare(`UPDATE ${this.table.name} SET deleted_at = ? WHERE ${this.keyWhere} AND deleted_at IS NULL`)
        .run(this.clock().toISOString(), ...this.table.keyValues(key));
      return result.changes;
    });
  }

  /** Replace the embedding of one row in place; no new version is created. */
  updateEmbedding(identifier: string, vector: number[]): void {
    this.guard("updateEmbedding", () => {
      const result = this.db
        .prepare(`UPDATE ${this.table.name} SET embedding = ?, updated_at = ? WHERE identifier = ?`)
        .run(JSON.stringify(vector), this.clock().toISOString(), identifier);
      if (result.changes === 0) {
        throw new NotFoundError(`${this.table.name}: no row with identifier ${identifier}`);
      }
    });
  }

  // ── Reads ───────────────────────────────────────────────────────────

  findLatest(key: K): E | undefined {
    return this.one(
      "findLatest",
      `SELECT * FROM ${this.table.name} WHERE ${this.keyWhere} AND deleted_at IS NULL ORDER BY version DESC LIMIT 1`,
      this.table.keyValues(key),
    );
  }

  findVersion(key: K, version: number): E | undefined {
    return this.one(
      "findVersion",
      `SELECT * FROM ${this.table.name} WHERE ${this.keyWhere} AND version = ? AND deleted_at IS NULL`,
      [...this.table.keyValues(key), version],
    );
  }

  /** Any row, deleted or not. */
  findByIdentifier(identifier: string): E | undefined {
    return this.one(
      "findByIdentifier",
      `SELECT * FROM ${this.table.name} WHERE identifier = ?`,
      [identifier],
    );
  }

  /** Full history of `key`, oldest first, deleted rows included. */
  findAllVersions(key: K): E[] {
    return this.many(
      "findAllVersions",
      `SELECT * FROM ${this.table.name} WHERE ${this.keyWhere} ORDER BY version ASC`,
      this.table.keyValues(key),
    );
  }

  /** Latest live version of every logical key in `project`, ordered by key. */
  findAllLatestForProject(project: string): E[] {
    const t = this.table.name;
    const sameKey = this.table.keyColumns.map((c) => `v.${c} = t.${c}`).join(" AND ");
    return this.many(
      "findAllLatestForProject",
      `SELECT t.* FROM ${t} AS t
        WHERE t.project = ? AND t.deleted_at IS NULL
          AND t.version = (SELECT MAX(v.version) FROM ${t} AS v WHERE ${sameKey} AND v.deleted_at IS NULL)
        ORDER BY ${this.table.keyColumns.map((c) => `t.${c}`).join(", ")}`,
      [project],
    );
  }

  listProjects(): string[] {
    return this.guard("listProjects", () =>
      this.db
        .prepare(`SELECT DISTINCT project FROM ${this.table.name} WHERE deleted_at IS NULL ORDER BY project`)
        .all()
        .map((row) => projectRow.parse(row).project),
    );
  }

  /** Live rows that carry an embedding, in insertion order. */
  findEmbedded(): E[] {
    return this.many(
      "findEmbedded",
      `SELECT * FROM ${this.table.name} WHERE embedding IS NOT NULL AND deleted_at IS NULL ORDER BY rowid`,
      [],
    );
  }

  /** Live rows still waiting for an embedding, in insertion order. */
  findMissingEmbedding(): E[] {
    return this.many(
      "findMissingEmbedding",
      `SELECT * FROM ${this.table.name} WHERE embedding IS NULL AND deleted_at IS NULL ORDER BY rowid`,
      [],
    );
  }

  // ── Helpers ─────────────────────────────────────────────────────────

  private one(op: string, sql: string, params: SqlValue[]): E | undefined {
    return this.guard(op, () => {
      const row = this.db.prepare(sql).get(...params);
      return row === undefined ? undefined : this.table.decode(row);
    });
  }

  private many(op: string, sql: string, params: SqlValue[]): E[] {
    return this.guard(op, () =>
      this.db
        .prepare(sql)
        .all(...params)
        .map((row) => this.table.decode(row)),
    );
  }

  private guard<T>(op: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw this.wrap(op, err);
    }
  }

  private wrap(op: string, err: unknown): Error {
    if (isCatalogError(err)) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new PersistenceError(`${this.table.name}.${op} failed: ${message}`, { cause: err });
  }
}

function isUniqueViolation(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "SQLITE_CONSTRAINT_UNIQUE" || err.code === "SQLITE_CONSTRAINT_PRIMARYKEY")
  );
}
