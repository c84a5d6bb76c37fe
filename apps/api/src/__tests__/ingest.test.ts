import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import { SqliteEngine } from '../db/sqlite';
import { DataFormatError, SchemaError } from '../errors';
import { isDataFile, parseDataFile, serializeCsv, stripExt } from '../ingest/csv';
import { loadRawTable, validateParsedFile } from '../ingest/raw';
import { csvBuffer } from './helpers';

const makeWorkbookBuffer = () => {
  const data = [
    ['Project_ID', 'Sample', 'Start_Year'],
    ['p1', 's1', 2019],
    ['p2', 's1', 2020]
  ];
  const sheet = XLSX.utils.aoa_to_sheet(data);
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, sheet, 'Sheet1');
  return Buffer.from(XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' }));
};

describe('parseDataFile', () => {
  it('parses CSV with normalized headers and trimmed cells', () => {
    const parsed = parseDataFile(csvBuffer(['\uFEFFProject_ID, Sample ,Owner', 'p1,s1, City ', '', 'p2,s1']), 'roads.csv');
    expect(parsed.source).toBe('csv');
    expect(parsed.columns).toEqual(['project_id', 'sample', 'owner']);
    expect(parsed.rows).toEqual([
      { project_id: 'p1', sample: 's1', owner: 'City' },
      { project_id: 'p2', sample: 's1', owner: '' }
    ]);
  });

  it('keeps duplicate headers for validation', () => {
    const parsed = parseDataFile(csvBuffer(['project_id,sample,Owner,owner', 'p1,s1,a,b']), 'dup.csv');
    expect(parsed.columns).toEqual(['project_id', 'sample', 'owner', 'owner']);
  });

  it('parses the first sheet of a workbook', () => {
    const parsed = parseDataFile(makeWorkbookBuffer(), 'roads.xlsx');
    expect(parsed.source).toBe('excel');
    expect(parsed.columns).toEqual(['project_id', 'sample', 'start_year']);
    expect(parsed.rows).toEqual([
      { project_id: 'p1', sample: 's1', start_year: '2019' },
      { project_id: 'p2', sample: 's1', start_year: '2020' }
    ]);
  });

  it('round-trips rows through CSV serialization', () => {
    const text = serializeCsv(['project_id', 'sample', 'owner'], [{ project_id: 'p1', sample: 's1', owner: 'A, B' }]);
    expect(text).toBe('project_id,sample,owner\r\np1,s1,"A, B"');
  });
});

describe('file names', () => {
  it('recognizes data files and strips extensions', () => {
    expect(isDataFile('roads.CSV')).toBe(true);
    expect(isDataFile('notes.txt')).toBe(false);
    expect(stripExt('roads_2020.xlsx')).toBe('roads_2020');
  });
});

describe('validateParsedFile', () => {
  it('rejects duplicate columns', () => {
    const parsed = parseDataFile(csvBuffer(['project_id,sample,owner,owner', 'p1,s1,a,b']), 'dup.csv');
    expect(() => validateParsedFile(parsed)).toThrow(new SchemaError('Duplicate columns: owner'));
  });

  it('rejects blank header cells', () => {
    const parsed = parseDataFile(csvBuffer(['project_id,sample,,owner', 'p1,s1,x,a']), 'blank.csv');
    expect(parsed.columns).toEqual(['project_id', 'sample', '', 'owner']);
    expect(() => validateParsedFile(parsed)).toThrow(new SchemaError('Column 3 has an empty name'));
  });

  it('rejects missing key columns', () => {
    const parsed = parseDataFile(csvBuffer(['project_id,owner', 'p1,a']), 'nokey.csv');
    expect(() => validateParsedFile(parsed)).toThrow('Missing primary key columns: sample');
  });

  it('rejects empty and repeated keys', () => {
    const empty = parseDataFile(csvBuffer(['project_id,sample', 'p1,s1', 'p2,']), 'e.csv');
    expect(() => validateParsedFile(empty)).toThrow('Row 3 has empty key columns: sample');

    const repeated = parseDataFile(csvBuffer(['project_id,sample', 'p1,s1', 'p1,s1']), 'r.csv');
    expect(() => validateParsedFile(repeated)).toThrow('Row 3 repeats key (p1, s1)');
  });

  it('casts cells by column type', () => {
    const parsed = parseDataFile(
      csvBuffer(['project_id,sample,is_active,start_year,start_date', 'p1,s1,yes,2019,2019-05-01']),
      'ok.csv'
    );
    expect(validateParsedFile(parsed)).toEqual([['p1', 's1', true, 2019, '2019-05-01']]);
  });
});

describe('loadRawTable', () => {
  let engine: SqliteEngine;
  const target = { schema: 'raw_verified', name: 'roads' };

  beforeEach(() => {
    engine = new SqliteEngine();
  });

  afterEach(async () => {
    await engine.close();
  });

  it('creates and fills a keyed raw table', async () => {
    const parsed = parseDataFile(csvBuffer(['project_id,sample,is_active,capacity_value', 'p1,s1,t,1.5', 'p2,s1,,']), 'roads.csv');
    expect(await loadRawTable(engine, target, parsed)).toBe(2);
    expect(await engine.query('SELECT * FROM "raw_verified"."roads" ORDER BY "project_id"')).toEqual([
      { project_id: 'p1', sample: 's1', is_active: 1, capacity_value: 1.5 },
      { project_id: 'p2', sample: 's1', is_active: null, capacity_value: null }
    ]);
  });

  it('replaces the table wholesale on reload', async () => {
    await loadRawTable(engine, target, parseDataFile(csvBuffer(['project_id,sample,owner', 'p1,s1,a']), 'roads.csv'));
    await loadRawTable(engine, target, parseDataFile(csvBuffer(['project_id,sample,length_value', 'p2,s1,3']), 'roads.csv'));
    expect(await engine.tableColumns('raw_verified', 'roads')).toEqual(['project_id', 'sample', 'length_value']);
    expect(await engine.query('SELECT "project_id" FROM "raw_verified"."roads"')).toEqual([{ project_id: 'p2' }]);
  });

  it('writes nothing when a cell fails to cast', async () => {
    await loadRawTable(engine, target, parseDataFile(csvBuffer(['project_id,sample,owner', 'p1,s1,a']), 'roads.csv'));
    const bad = parseDataFile(csvBuffer(['project_id,sample,start_year', 'p2,s1,soon']), 'roads.csv');
    await expect(loadRawTable(engine, target, bad)).rejects.toThrow(DataFormatError);
    expect(await engine.tableColumns('raw_verified', 'roads')).toEqual(['project_id', 'sample', 'owner']);
  });

  it('loads a header-only file as an empty table', async () => {
    const parsed = parseDataFile(csvBuffer(['project_id,sample,owner']), 'roads.csv');
    expect(await loadRawTable(engine, target, parsed)).toBe(0);
    expect(await engine.tableColumns('raw_verified', 'roads')).toEqual(['project_id', 'sample', 'owner']);
  });
});
