import type { ZodError } from "zod";

export class RowValidationError extends Error {
  readonly table: string;
  readonly rowIndex: number;

  constructor(table: string, rowIndex: number, detail: string) {
    super(`invalid row ${rowIndex} for table ${table}: ${detail}`);
    this.name = "RowValidationError";
    this.table = table;
    this.rowIndex = rowIndex;
  }
}

export const describeZodError = (error: ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");

export const isConstraintError = (error: unknown): boolean =>
  error instanceof Error &&
  "code" in error &&
  typeof error.code === "string" &&
  error.code.startsWith("SQLITE_CONSTRAINT");
