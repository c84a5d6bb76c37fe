import { AliasGenerator } from '../query/aliases';
import { col, eq, item, lit, nullOf, Relation, select, table } from '../query/build';
import { ColumnSpec, TableSchema } from '../types/schema';
import { describeColumn, describeColumns, PRIMARY_KEYS } from '../utils/columns';

/**
 * Collects the first-seen ordered column set across tables, then appends a
 * `{stem}_year` partner for every `{stem}_date` that has none anywhere.
 */
export const unionColumns = (tables: TableSchema[]): ColumnSpec[] => {
  const seen = new Map<string, ColumnSpec>();
  for (const t of tables) {
    for (const c of t.columns) {
      if (!seen.has(c.name)) seen.set(c.name, c);
    }
  }

  const columns = Array.from(seen.values());
  for (const c of [...columns]) {
    if (!c.name.endsWith('_date')) continue;
    const yearName = `${c.name.slice(0, -'_date'.length)}_year`;
    if (!seen.has(yearName)) {
      const year = describeColumn(yearName);
      seen.set(yearName, year);
      columns.push(year);
    }
  }
  return columns;
};

export const emptyRelation = (): Relation => {
  const columns = describeColumns([...PRIMARY_KEYS]);
  return {
    query: select({
      items: columns.map(c => item(nullOf(c.type), c.name)),
      where: eq(lit(0), lit(1))
    }),
    columns
  };
};

/**
 * Unions every table's rows over the combined column set. A table missing a
 * column contributes a NULL cast to that column's classified type.
 */
export const unionTables = (tables: TableSchema[], aliases: AliasGenerator): Relation => {
  if (!tables.length) return emptyRelation();

  const columns = unionColumns(tables);
  const selects = tables.map(t => {
    const alias = aliases.next('r');
    const present = new Set(t.columns.map(c => c.name));
    return select({
      items: columns.map(c => item(present.has(c.name) ? col(alias, c.name) : nullOf(c.type), c.name)),
      from: table(t.schema, t.name, alias)
    });
  });

  return {
    query: { kind: 'union', all: true, selects },
    columns
  };
};
