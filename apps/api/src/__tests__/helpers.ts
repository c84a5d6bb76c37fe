import { SqlEngine } from '../db/engine';
import { parseDataFile } from '../ingest/csv';
import { loadRawTable } from '../ingest/raw';
import { Relation } from '../query/build';
import { renderQuery } from '../query/render';
import { describeColumns } from '../utils/columns';
import { TableSchema } from '../types/schema';

export const csvBuffer = (lines: string[]) => Buffer.from(lines.join('\n'));

export const loadCsv = (engine: SqlEngine, schema: string, name: string, lines: string[]) =>
  loadRawTable(engine, { schema, name }, parseDataFile(csvBuffer(lines), `${name}.csv`));

export const tableSchema = (schema: string, name: string, columns: string[]): TableSchema => ({
  schema,
  name,
  columns: describeColumns(columns)
});

const keyOf = (row: Record<string, unknown>) => `${String(row.project_id)}|${String(row.sample)}`;

/** Runs a composed relation, rows sorted by key. */
export const runRelation = async (engine: SqlEngine, relation: Relation) => {
  const rows = await engine.query(renderQuery(relation.query, engine.dialect));
  return rows.sort((a, b) => keyOf(a).localeCompare(keyOf(b)));
};
