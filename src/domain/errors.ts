/**
 * Error kinds raised by the record keeper.
 *
 * - ValidationError: a value violates an entity invariant (thrown at mutation time)
 * - NotFoundError: an operation names a semester, module or exam that does not exist
 * - MalformedStoreError: a stored record fails its schema or invariant check on load
 * - RowImportError: a single CSV row is invalid (collected, never thrown)
 */

export class ValidationError extends Error {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = "ValidationError";
    this.field = field;
  }
}

export class NotFoundError extends Error {
  constructor(entity: "semester" | "module" | "exam", key: string | number) {
    super(`${entity.charAt(0).toUpperCase()}${entity.slice(1)} not found: ${key}`);
    this.name = "NotFoundError";
  }
}

export class MalformedStoreError extends Error {
  // e.g. "program.semesters[0].modules[1].credits"
  readonly path: string;
  readonly reason: string;

  constructor(path: string, reason: string) {
    super(`Malformed record at ${path}: ${reason}`);
    this.name = "MalformedStoreError";
    this.path = path;
    this.reason = reason;
  }
}

export class RowImportError extends Error {
  // 1-based data row (the header is not counted)
  readonly row: number;
  readonly column?: string;
  readonly reason: string;

  constructor(row: number, reason: string, column?: string) {
    super(column ? `Row ${row} (${column}): ${reason}` : `Row ${row}: ${reason}`);
    this.name = "RowImportError";
    this.row = row;
    this.column = column;
    this.reason = reason;
  }
}
