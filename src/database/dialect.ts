/**
 * SQL dialects
 * Only the "last inserted id" idiom differs between stores for the fixed
 * statement shapes; it backs key resolution on drivers without generated keys.
 */

export const SQL_DIALECTS = {
  postgresql: { selectInsertId: "SELECT currval('logging_event_id_seq')" },
  mysql: { selectInsertId: 'SELECT LAST_INSERT_ID()' },
  sqlite: { selectInsertId: 'SELECT last_insert_rowid()' },
  mssql: { selectInsertId: 'SELECT @@identity id' },
  h2: { selectInsertId: 'CALL IDENTITY()' },
  hsqldb: { selectInsertId: 'CALL IDENTITY()' },
  oracle: { selectInsertId: 'SELECT logging_event_id_seq.currval FROM dual' },
  sybase: { selectInsertId: 'SELECT @@identity' },
} as const;

export type SqlDialectName = keyof typeof SQL_DIALECTS;

export function isSqlDialectName(value: string): value is SqlDialectName {
  return Object.prototype.hasOwnProperty.call(SQL_DIALECTS, value);
}

export function getSelectInsertIdSql(dialect: SqlDialectName): string {
  return SQL_DIALECTS[dialect].selectInsertId;
}
