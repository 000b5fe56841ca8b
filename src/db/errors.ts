/**
 * True when `err` (or an error it wraps) is SQLite rejecting a duplicate value
 * for `column`, given as `table.column`.
 */
export function isUniqueViolation(err: unknown, column: string): boolean {
  let current: unknown = err;
  for (let depth = 0; current instanceof Error && depth < 5; depth++) {
    const code = 'code' in current ? current.code : undefined;
    if (
      (code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY') &&
      current.message.includes(column)
    ) {
      return true;
    }
    current = current.cause;
  }
  return false;
}
