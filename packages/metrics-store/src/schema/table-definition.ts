import type { z } from "zod";

export type ColumnType = "INTEGER" | "TEXT";

export type ColumnDefinition<Row> = {
  field: keyof Row & string;
  column: string;
  type: ColumnType;
  nullable: boolean;
  /** Stored as JSON text. */
  json: boolean;
  /** Table whose `id` this column references. */
  references: string | null;
};

export type TableDefinition<Row> = {
  name: string;
  schema: z.ZodType<Row, z.ZodTypeDef, unknown>;
  columns: readonly ColumnDefinition<Row>[];
  /** Fields that identify a row; enforced with a UNIQUE constraint. */
  naturalKey: readonly (keyof Row & string)[];
};

type ColumnOptions = {
  nullable?: boolean;
  json?: boolean;
  references?: string;
};

const toSnakeCase = (field: string): string =>
  field.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);

export const column = <Row>(
  field: keyof Row & string,
  type: ColumnType,
  options: ColumnOptions = {},
): ColumnDefinition<Row> => ({
  field,
  column: toSnakeCase(field),
  type,
  nullable: options.nullable ?? false,
  json: options.json ?? false,
  references: options.references ?? null,
});

export const defineTable = <Row>(definition: TableDefinition<Row>): TableDefinition<Row> => definition;

export const columnFor = <Row>(table: TableDefinition<Row>, field: keyof Row & string): string =>
  table.columns.find((candidate) => candidate.field === field)?.column ?? field;

export const quoteIdentifier = (identifier: string): string => `"${identifier.replaceAll('"', '""')}"`;

const columnSql = <Row>(definition: ColumnDefinition<Row>): string => {
  const parts = [quoteIdentifier(definition.column), definition.type];
  if (!definition.nullable) {
    parts.push("NOT NULL");
  }

  if (definition.references !== null) {
    parts.push(`REFERENCES ${quoteIdentifier(definition.references)}(id)`);
  }

  return parts.join(" ");
};

export const createTableSql = <Row>(table: TableDefinition<Row>): string => {
  const lines = [
    "id INTEGER PRIMARY KEY",
    ...table.columns.map(columnSql),
    `UNIQUE (${table.naturalKey.map((field) => quoteIdentifier(columnFor(table, field))).join(", ")})`,
  ];

  return `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(table.name)} (\n  ${lines.join(",\n  ")}\n)`;
};
