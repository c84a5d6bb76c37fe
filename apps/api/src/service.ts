import { SqlEngine } from './db/engine';
import { materialize } from './db/materialize';
import { ConflictError, DataFormatError, NotFoundError, SchemaError } from './errors';
import { isCsvFile, parseDataFile, serializeCsv, stripExt } from './ingest/csv';
import { loadRawTable } from './ingest/raw';
import { QualifiedName, qualified, quoteIdent } from './query/render';
import { ensureReferenceTables, REFERENCE_SCHEMA, replaceSeries, SeriesKey } from './reference/series';
import { fetchSeries } from './reference/worldbank';
import { prodTable, rawSchema, stageSchema } from './schemas';
import { composeProd, composeStage } from './stage';
import { FileStore } from './store';
import { CellValue, ParsedFile, ReferenceRecord, Row, TableSchema, VerificationStatus } from './types/schema';
import { classifyColumn, describeColumns, PRIMARY_KEYS } from './utils/columns';

export type RecordKey = {
  project_id: string;
  sample: string;
};

export type StagingServiceOptions = {
  anchorCountry: string;
  worldBankUrl: string;
  referenceSchema?: string;
};

const toCell = (column: string, value: unknown): CellValue => {
  if (value === null || value === undefined) return null;
  // SQLite hands booleans back as 0/1
  if (classifyColumn(column) === 'boolean' && typeof value === 'number') return value !== 0;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (typeof value === 'bigint') return Number(value);
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  return String(value);
};

const decodeRow = (row: Record<string, unknown>): Row => {
  const decoded: Row = {};
  for (const [column, value] of Object.entries(row)) {
    decoded[column] = toCell(column, value);
  }
  return decoded;
};

const cellText = (value: unknown) => (value === null || value === undefined ? '' : String(value));

const sameKey = (row: Record<string, string>, key: RecordKey) =>
  row.project_id === key.project_id && row.sample === key.sample;

/**
 * Orchestrates the file store, raw tables, staging runs and promotion for
 * both verification statuses.
 */
export class StagingService {
  private readonly referenceSchema: string;

  constructor(
    private readonly engine: SqlEngine,
    private readonly files: FileStore,
    private readonly options: StagingServiceOptions
  ) {
    this.referenceSchema = options.referenceSchema ?? REFERENCE_SCHEMA;
  }

  get store() {
    return this.files;
  }

  async health() {
    await this.engine.ping();
    return { ok: true };
  }

  // raw tables

  async loadRaw(status: VerificationStatus, assetClass: string, fileName: string) {
    const buffer = await this.files.readFile(status, assetClass, fileName);
    const target = { schema: rawSchema(status), name: stripExt(fileName) };
    const rows = await loadRawTable(this.engine, target, parseDataFile(buffer, fileName));
    return { table: target.name, rows };
  }

  listRawTables(status: VerificationStatus) {
    return this.engine.listTables(rawSchema(status));
  }

  async dropRaw(status: VerificationStatus, tableName: string) {
    await this.dropTable({ schema: rawSchema(status), name: tableName });
  }

  // staged tables

  private async rawTablesFor(status: VerificationStatus, assetClass: string): Promise<TableSchema[]> {
    const schema = rawSchema(status);
    const tables: TableSchema[] = [];
    for (const file of await this.files.listFiles(status, assetClass)) {
      const columns = await this.engine.tableColumns(schema, file.tableName);
      // files that were never loaded have no raw table yet
      if (!columns.length) continue;
      tables.push({ schema, name: file.tableName, columns: describeColumns(columns) });
    }
    return tables;
  }

  async stage(status: VerificationStatus, assetClass: string) {
    const tables = await this.rawTablesFor(status, assetClass);
    await ensureReferenceTables(this.engine, this.referenceSchema);
    const relation = composeStage(tables, {
      anchorCountry: this.options.anchorCountry,
      referenceSchema: this.referenceSchema
    });
    const target = { schema: stageSchema(status), name: assetClass };
    await materialize(this.engine, target, relation);
    return { table: assetClass, sources: tables.map(t => t.name), columns: relation.columns.map(c => c.name) };
  }

  listStageTables(status: VerificationStatus) {
    return this.engine.listTables(stageSchema(status));
  }

  async dropStage(status: VerificationStatus, assetClass: string) {
    await this.dropTable({ schema: stageSchema(status), name: assetClass });
  }

  async ratioFields(status: VerificationStatus, assetClass: string) {
    const schema = stageSchema(status);
    const columns = await this.engine.tableColumns(schema, assetClass);
    if (!columns.length) throw new NotFoundError(`Table ${schema}.${assetClass} not found`);
    return columns.filter(c => c.endsWith('_ratio'));
  }

  // production

  async promote(status: VerificationStatus) {
    const schema = stageSchema(status);
    const tables: TableSchema[] = [];
    for (const name of await this.engine.listTables(schema)) {
      tables.push({ schema, name, columns: describeColumns(await this.engine.tableColumns(schema, name)) });
    }
    const relation = composeProd(tables);
    const target = prodTable(status);
    await materialize(this.engine, target, relation);
    return { table: target.name, sources: tables.map(t => t.name), columns: relation.columns.map(c => c.name) };
  }

  // reads

  private async requireTable(target: QualifiedName) {
    if (!(await this.engine.tableExists(target.schema, target.name))) {
      throw new NotFoundError(`Table ${target.schema}.${target.name} not found`);
    }
  }

  private async dropTable(target: QualifiedName) {
    await this.requireTable(target);
    await this.engine.execute(`DROP TABLE ${qualified(target)}`);
  }

  async select(table: string, schema: string): Promise<Row[]> {
    const target = { schema, name: table };
    await this.requireTable(target);
    const rows = await this.engine.query(
      `SELECT * FROM ${qualified(target)} ORDER BY ${PRIMARY_KEYS.map(quoteIdent).join(', ')}`
    );
    return rows.map(decodeRow);
  }

  async selectById(table: string, schema: string, key: RecordKey): Promise<Row | null> {
    const target = { schema, name: table };
    await this.requireTable(target);
    const { placeholder } = this.engine.dialect;
    const rows = await this.engine.query(
      `SELECT * FROM ${qualified(target)} WHERE ${quoteIdent('project_id')} = ${placeholder(1)} AND ${quoteIdent('sample')} = ${placeholder(2)}`,
      [key.project_id, key.sample]
    );
    return rows.length ? decodeRow(rows[0]) : null;
  }

  // record edits: rewrite the backing CSV file, then reload its raw table

  private async editFile(
    status: VerificationStatus,
    tableName: string,
    edit: (parsed: ParsedFile) => ParsedFile
  ) {
    const located = await this.files.locateTable(status, tableName);
    if (!located) throw new NotFoundError(`No stored file backs raw table '${tableName}'`);
    const { assetClass, fileName } = located;
    if (!isCsvFile(fileName)) {
      throw new DataFormatError(`Records can only be edited in CSV files, not '${fileName}'`);
    }

    const parsed = edit(parseDataFile(await this.files.readFile(status, assetClass, fileName), fileName));
    const target = { schema: rawSchema(status), name: tableName };
    // load first: a rejected edit leaves the stored file untouched
    const rows = await loadRawTable(this.engine, target, parsed);
    await this.files.writeFile(status, assetClass, fileName, Buffer.from(serializeCsv(parsed.columns, parsed.rows)));
    return { table: tableName, rows };
  }

  private static recordRow(columns: string[], record: Record<string, unknown>) {
    const unknown = Object.keys(record).filter(k => !columns.includes(k));
    if (unknown.length) throw new SchemaError(`Unknown columns: ${unknown.join(', ')}`, { unknown });
    const row: Record<string, string> = {};
    for (const column of columns) row[column] = cellText(record[column]).trim();
    return row;
  }

  addRecord(status: VerificationStatus, tableName: string, record: Record<string, unknown>) {
    return this.editFile(status, tableName, parsed => {
      const row = StagingService.recordRow(parsed.columns, record);
      if (parsed.rows.some(r => sameKey(r, { project_id: row.project_id, sample: row.sample }))) {
        throw new ConflictError(`Record (${row.project_id}, ${row.sample}) already exists in '${tableName}'`);
      }
      return { ...parsed, rows: [...parsed.rows, row] };
    });
  }

  updateRecord(status: VerificationStatus, tableName: string, key: RecordKey, changes: Record<string, unknown>) {
    return this.editFile(status, tableName, parsed => {
      const index = parsed.rows.findIndex(r => sameKey(r, key));
      if (index < 0) throw new NotFoundError(`Record (${key.project_id}, ${key.sample}) not found in '${tableName}'`);
      const merged = StagingService.recordRow(parsed.columns, { ...parsed.rows[index], ...changes });
      const rows = parsed.rows.map((r, i) => (i === index ? merged : r));
      return { ...parsed, rows };
    });
  }

  deleteRecord(status: VerificationStatus, tableName: string, key: RecordKey) {
    return this.editFile(status, tableName, parsed => {
      const rows = parsed.rows.filter(r => !sameKey(r, key));
      if (rows.length === parsed.rows.length) {
        throw new NotFoundError(`Record (${key.project_id}, ${key.sample}) not found in '${tableName}'`);
      }
      return { ...parsed, rows };
    });
  }

  // reference series

  async replaceReference(key: SeriesKey, records: ReferenceRecord[]) {
    const count = await replaceSeries(this.engine, key, records, this.referenceSchema);
    console.log(`[reference] replaced ${key} with ${count} rows`);
    return { series: key, rows: count };
  }

  async refreshReference(key: SeriesKey) {
    return this.replaceReference(key, await fetchSeries(this.options.worldBankUrl, key));
  }
}
