import { SqlEngine, SqlValue } from '../db/engine';
import { SchemaError } from '../errors';
import { createTableSql, QualifiedName, qualified, quoteIdent } from '../query/render';
import { CellValue, ParsedFile } from '../types/schema';
import { castValue, describeColumns, PRIMARY_KEYS } from '../utils/columns';

const findDuplicates = (columns: string[]) =>
  columns.filter((column, i) => columns.indexOf(column) !== i).filter((c, i, all) => all.indexOf(c) === i);

/**
 * Checks headers and key cells, then casts every cell. Throws before anything
 * is written, so a rejected file never touches the database.
 */
export const validateParsedFile = (parsed: ParsedFile): CellValue[][] => {
  const blank = parsed.columns.findIndex(column => column === '');
  if (blank >= 0) {
    throw new SchemaError(`Column ${blank + 1} has an empty name`, { column: blank + 1 });
  }

  const duplicates = findDuplicates(parsed.columns);
  if (duplicates.length) {
    throw new SchemaError(`Duplicate columns: ${duplicates.join(', ')}`, { duplicates });
  }

  const missing = PRIMARY_KEYS.filter(key => !parsed.columns.includes(key));
  if (missing.length) {
    throw new SchemaError(`Missing primary key columns: ${missing.join(', ')}`, { missing });
  }

  const seenKeys = new Set<string>();
  return parsed.rows.map((row, index) => {
    // header is line 1
    const line = index + 2;
    const emptyKeys = PRIMARY_KEYS.filter(key => !row[key]);
    if (emptyKeys.length) {
      throw new SchemaError(`Row ${line} has empty key columns: ${emptyKeys.join(', ')}`, {
        row: line,
        columns: emptyKeys
      });
    }
    const key = PRIMARY_KEYS.map(k => row[k]).join('|');
    if (seenKeys.has(key)) {
      throw new SchemaError(`Row ${line} repeats key (${PRIMARY_KEYS.map(k => row[k]).join(', ')})`, { row: line });
    }
    seenKeys.add(key);
    return parsed.columns.map(column => castValue(column, row[column]));
  });
};

/** Replaces `schema.name` with the file's rows. Returns the inserted row count. */
export const loadRawTable = async (engine: SqlEngine, target: QualifiedName, parsed: ParsedFile) => {
  const values = validateParsedFile(parsed);
  const columns = describeColumns(parsed.columns);

  const insertSql = `INSERT INTO ${qualified(target)} (${parsed.columns.map(quoteIdent).join(', ')}) VALUES (${parsed.columns
    .map((_c, i) => engine.dialect.placeholder(i + 1))
    .join(', ')})`;

  await engine.ensureSchema(target.schema);
  await engine.transaction(async tx => {
    await tx.execute(`DROP TABLE IF EXISTS ${qualified(target)}`);
    await tx.execute(createTableSql(engine.dialect, target, columns, PRIMARY_KEYS));
    for (const row of values) {
      const params: SqlValue[] = row;
      await tx.execute(insertSql, params);
    }
  });
  console.log(`[ingest] loaded ${target.schema}.${target.name} (${values.length} rows)`);
  return values.length;
};
