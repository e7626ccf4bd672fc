import type {
  NormalizedRevisionBatch,
  NormalizedTrackerBatch,
  Stored,
  TrackerKind,
} from "@repometrics/core";
import Database from "better-sqlite3";
import { z } from "zod";
import { RowValidationError, describeZodError, isConstraintError } from "./errors.js";
import { resolveRevisionKeys } from "./resolve-revision-keys.js";
import {
  columnFor,
  quoteIdentifier,
  type ColumnDefinition,
  type TableDefinition,
} from "./schema/table-definition.js";
import { SCHEMA_SQL, TABLES, TRACKER_TABLES } from "./schema/tables.js";

export type AppendResult = {
  written: boolean;
  appended: number;
  skipped: number;
};

export type RevisionBatchInsertResult = {
  commitHashes: number;
  authors: number;
  committers: number;
  commitLogs: number;
  releases: number;
};

export type TrackerBatchInsertResult = {
  kind: TrackerKind;
  itemIds: number;
  items: number;
  /** Stored open items that received their close time. */
  closed: number;
};

type SqlValue = string | number | bigint | null;

const idRowSchema = z.object({ id: z.number().int().positive() });

const closedAtSchema = z.string().datetime({ offset: true });

const toSqlValue = <Row>(value: unknown, definition: ColumnDefinition<Row>): SqlValue => {
  if (definition.json) {
    return JSON.stringify(value);
  }

  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === "string" || typeof value === "number" || typeof value === "bigint") {
    return value;
  }

  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }

  return JSON.stringify(value);
};

const toRecord = (raw: unknown): Record<string, unknown> => {
  if (typeof raw !== "object" || raw === null) {
    throw new TypeError("expected a row object from SQLite");
  }

  return Object.fromEntries(Object.entries(raw));
};

export class MetricsStore {
  private readonly db: Database.Database;
  private readonly statements = new Map<string, Database.Statement>();

  constructor(path: string) {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.migrate();
  }

  private migrate(): void {
    for (const sql of SCHEMA_SQL) {
      this.db.exec(sql);
    }
  }

  private statement(sql: string): Database.Statement {
    const cached = this.statements.get(sql);
    if (cached !== undefined) {
      return cached;
    }

    const prepared = this.db.prepare(sql);
    this.statements.set(sql, prepared);
    return prepared;
  }

  private validate<Row>(table: TableDefinition<Row>, rows: readonly Row[]): void {
    rows.forEach((row, index) => {
      const result = table.schema.safeParse(row);
      if (!result.success) {
        throw new RowValidationError(table.name, index, describeZodError(result.error));
      }
    });
  }

  private insertSql<Row>(table: TableDefinition<Row>): string {
    const columns = table.columns.map((definition) => quoteIdentifier(definition.column));
    const values = table.columns.map((definition) => `@${definition.field}`);
    return `INSERT INTO ${quoteIdentifier(table.name)} (${columns.join(", ")}) VALUES (${values.join(", ")})`;
  }

  private selectSql<Row>(table: TableDefinition<Row>): string {
    const columns = table.columns.map(
      (definition) => `${quoteIdentifier(definition.column)} AS ${quoteIdentifier(definition.field)}`,
    );
    return `SELECT id, ${columns.join(", ")} FROM ${quoteIdentifier(table.name)} ORDER BY id`;
  }

  private toParams<Row>(table: TableDefinition<Row>, row: Row): Record<string, SqlValue> {
    const params: Record<string, SqlValue> = {};
    for (const definition of table.columns) {
      params[definition.field] = toSqlValue(row[definition.field], definition);
    }

    return params;
  }

  private insertRow<Row>(table: TableDefinition<Row>, row: Row): number {
    this.validate(table, [row]);
    const result = this.statement(this.insertSql(table)).run(this.toParams(table, row));
    return Number(result.lastInsertRowid);
  }

  private findId<Row>(table: TableDefinition<Row>, field: keyof Row & string, value: SqlValue): number | null {
    const raw = this.statement(
      `SELECT id FROM ${quoteIdentifier(table.name)} WHERE ${quoteIdentifier(columnFor(table, field))} = ?`,
    ).get(value);
    const parsed = idRowSchema.safeParse(raw);
    return parsed.success ? parsed.data.id : null;
  }

  private naturalKeyOf<Row>(table: TableDefinition<Row>, row: Readonly<Record<string, unknown>>): string {
    return JSON.stringify(table.naturalKey.map((field) => row[field] ?? null));
  }

  /**
   * Appends `rows` inside one transaction. Every row is validated first; a failing row throws
   * {@link RowValidationError} before anything is written. Returns `false` when SQLite rejects
   * the batch with a constraint violation, in which case nothing is written.
   */
  writeTable<Row>(table: TableDefinition<Row>, rows: readonly Row[]): boolean {
    this.validate(table, rows);
    if (rows.length === 0) {
      return true;
    }

    const insert = this.statement(this.insertSql(table));
    const insertAll = this.db.transaction((batch: readonly Row[]) => {
      for (const row of batch) {
        insert.run(this.toParams(table, row));
      }
    });

    try {
      insertAll(rows);
      return true;
    } catch (error) {
      if (isConstraintError(error)) {
        return false;
      }

      throw error;
    }
  }

  /** Appends the rows whose natural key is not stored yet; stored rows are never rewritten. */
  appendNew<Row>(table: TableDefinition<Row>, rows: readonly Row[]): AppendResult {
    const keyColumns = table.naturalKey.map(
      (field) => `${quoteIdentifier(columnFor(table, field))} AS ${quoteIdentifier(field)}`,
    );
    const seen = new Set(
      this.statement(`SELECT ${keyColumns.join(", ")} FROM ${quoteIdentifier(table.name)}`)
        .all()
        .map((raw) => this.naturalKeyOf(table, toRecord(raw))),
    );

    const fresh: Row[] = [];
    for (const row of rows) {
      const record: Record<string, unknown> = {};
      for (const field of table.naturalKey) {
        record[field] = row[field];
      }

      const key = this.naturalKeyOf(table, record);
      if (seen.has(key)) {
        continue;
      }

      seen.add(key);
      fresh.push(row);
    }

    return {
      written: this.writeTable(table, fresh),
      appended: fresh.length,
      skipped: rows.length - fresh.length,
    };
  }

  readTable<Row>(table: TableDefinition<Row>): readonly Stored<Row>[] {
    const storedSchema = z.intersection(table.schema, idRowSchema);
    const jsonFields = table.columns.filter((definition) => definition.json).map((definition) => definition.field);

    return this.statement(this.selectSql(table))
      .all()
      .map((raw, index) => {
        const record = toRecord(raw);
        for (const field of jsonFields) {
          const value = record[field];
          if (typeof value === "string") {
            const decoded: unknown = JSON.parse(value);
            record[field] = decoded;
          }
        }

        const parsed = storedSchema.safeParse(record);
        if (!parsed.success) {
          throw new RowValidationError(table.name, index, describeZodError(parsed.error));
        }

        return parsed.data;
      });
  }

  query(sql: string, params: readonly SqlValue[] = []): readonly Record<string, unknown>[] {
    return this.db
      .prepare(sql)
      .all(...params)
      .map(toRecord);
  }

  storedCommitHashes(): ReadonlySet<string> {
    return new Set(this.readTable(TABLES.commitHashes).map((row) => row.commitHash));
  }

  storedTrackerItemIds(kind: TrackerKind): ReadonlySet<string> {
    return new Set(this.readTable(TRACKER_TABLES[kind].ids).map((row) => row.itemId));
  }

  /**
   * Writes a normalized revision batch in one transaction. Keys generated for each table are
   * collected before the rows that reference them are built; authors and committers already stored
   * under the same email keep their key.
   */
  insertRevisionBatch(batch: NormalizedRevisionBatch): RevisionBatchInsertResult {
    const insertBatch = this.db.transaction((): RevisionBatchInsertResult => {
      const counts = { commitHashes: 0, authors: 0, committers: 0, commitLogs: 0, releases: 0 };

      const storedCommitIndices = new Set<number>();
      const commitHashKeys = batch.commitHashes.map((commitHash, index) => {
        const existing = this.findId(TABLES.commitHashes, "commitHash", commitHash);
        if (existing !== null) {
          storedCommitIndices.add(index);
          return existing;
        }

        counts.commitHashes += 1;
        return this.insertRow(TABLES.commitHashes, { commitHash });
      });

      const authorKeys = batch.authors.map((author) => {
        const existing = this.findId(TABLES.authors, "authorEmail", author.authorEmail);
        if (existing !== null) {
          return existing;
        }

        counts.authors += 1;
        return this.insertRow(TABLES.authors, author);
      });

      const committerKeys = batch.committers.map((committer) => {
        const existing = this.findId(TABLES.committers, "committerEmail", committer.committerEmail);
        if (existing !== null) {
          return existing;
        }

        counts.committers += 1;
        return this.insertRow(TABLES.committers, committer);
      });

      const resolved = resolveRevisionKeys(
        batch,
        { commitHashKeys, authorKeys, committerKeys },
        {
          authorIdByEmail: (email) => this.findId(TABLES.authors, "authorEmail", email),
          commitHashIdByHash: (hash) => this.findId(TABLES.commitHashes, "commitHash", hash),
        },
        storedCommitIndices,
      );

      for (const log of resolved.commitLogs) {
        this.insertRow(TABLES.commitLogs, log);
        counts.commitLogs += 1;
      }

      for (const release of resolved.releases) {
        if (this.findId(TABLES.releases, "tag", release.tag) !== null) {
          continue;
        }

        this.insertRow(TABLES.releases, release);
        counts.releases += 1;
      }

      return counts;
    });

    return insertBatch();
  }

  /**
   * Writes tracker ids and the items referencing them in one transaction. A closure sets the close
   * time of a stored item that is still open; items already closed keep their close time.
   */
  insertTrackerBatch(batch: NormalizedTrackerBatch): TrackerBatchInsertResult {
    const tables = TRACKER_TABLES[batch.kind];
    const insertBatch = this.db.transaction((): TrackerBatchInsertResult => {
      const result = { kind: batch.kind, itemIds: 0, items: 0, closed: 0 };
      const storedIndices = new Set<number>();
      const idKeys = batch.itemIds.map((itemId, index) => {
        const existing = this.findId(tables.ids, "itemId", itemId);
        if (existing !== null) {
          storedIndices.add(index);
          return existing;
        }

        result.itemIds += 1;
        return this.insertRow(tables.ids, { itemId });
      });

      for (const item of batch.items) {
        const itemIdKey = idKeys[item.itemIdIndex];
        if (itemIdKey === undefined) {
          throw new Error(`no tracker id key for ordinal ${item.itemIdIndex}`);
        }

        if (storedIndices.has(item.itemIdIndex)) {
          continue;
        }

        this.insertRow(tables.items, { itemIdKey, createdAt: item.createdAt, closedAt: item.closedAt });
        result.items += 1;
      }

      const closedAtColumn = quoteIdentifier(columnFor(tables.items, "closedAt"));
      const itemIdKeyColumn = quoteIdentifier(columnFor(tables.items, "itemIdKey"));
      const closeItem = this.statement(
        `UPDATE ${quoteIdentifier(tables.items.name)} SET ${closedAtColumn} = ? ` +
          `WHERE ${itemIdKeyColumn} = ? AND ${closedAtColumn} IS NULL`,
      );
      for (const [index, closure] of batch.closures.entries()) {
        const itemIdKey = this.findId(tables.ids, "itemId", closure.itemId);
        if (itemIdKey === null) {
          continue;
        }

        const closedAt = closedAtSchema.safeParse(closure.closedAt);
        if (!closedAt.success) {
          throw new RowValidationError(tables.items.name, index, describeZodError(closedAt.error));
        }

        result.closed += closeItem.run(closedAt.data, itemIdKey).changes;
      }

      return result;
    });

    return insertBatch();
  }

  close(): void {
    this.db.close();
  }
}
