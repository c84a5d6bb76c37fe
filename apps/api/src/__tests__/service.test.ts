import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { SqliteEngine } from '../db/sqlite';
import { ConflictError, NotFoundError, SchemaError } from '../errors';
import { StagingService } from '../service';
import { FileStore } from '../store';
import { csvBuffer } from './helpers';

const ROADS_A = [
  'project_id,sample,is_toll,start_construction_date,est_construction_completion_date,est_construction_duration,act_construction_duration',
  'p1,s1,yes,2020-01-01,,2,3',
  'p2,s1,no,2020-01-01,,0,1',
  'p3,s1,,2021-01-01,2022-01-01,,'
];
const ROADS_B = ['project_id,sample,owner', 'p4,s1,City'];

describe('StagingService', () => {
  let root: string;
  let engine: SqliteEngine;
  let files: FileStore;
  let service: StagingService;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'staging-'));
    engine = new SqliteEngine();
    files = new FileStore(root);
    service = new StagingService(engine, files, { anchorCountry: 'USA', worldBankUrl: 'http://worldbank.test/v2' });

    await files.createAssetClass('verified', 'roads');
    await files.saveFile('verified', 'roads', 'roads_a.csv', csvBuffer(ROADS_A));
    await files.saveFile('verified', 'roads', 'roads_b.csv', csvBuffer(ROADS_B));
    await service.loadRaw('verified', 'roads', 'roads_a.csv');
    await service.loadRaw('verified', 'roads', 'roads_b.csv');
  });

  afterEach(async () => {
    await engine.close();
    await fs.rm(root, { recursive: true, force: true });
  });

  it('lists loaded raw tables per status', async () => {
    expect(await service.listRawTables('verified')).toEqual(['roads_a', 'roads_b']);
    expect(await service.listRawTables('unverified')).toEqual([]);
  });

  it('stages an asset class into one reconciled table', async () => {
    const result = await service.stage('verified', 'roads');
    expect(result.sources).toEqual(['roads_a', 'roads_b']);
    expect(result.columns).toEqual([
      'project_id',
      'sample',
      'is_toll',
      'start_construction_date',
      'est_construction_completion_date',
      'est_construction_duration',
      'act_construction_duration',
      'owner',
      'start_construction_year',
      'est_construction_completion_year',
      'schedule_construction_ratio'
    ]);

    const rows = await service.select('roads', 'stage_verified');
    expect(rows.map(r => r.project_id)).toEqual(['p1', 'p2', 'p3', 'p4']);
    expect(rows[0]).toMatchObject({ is_toll: true, start_construction_year: 2020, schedule_construction_ratio: 1.5 });
    expect(rows[1]).toMatchObject({ is_toll: false, schedule_construction_ratio: null });
    expect(rows[2]).toMatchObject({ is_toll: null, est_construction_completion_year: 2022, schedule_construction_ratio: null });
    expect(rows[2].est_construction_duration).toBeCloseTo(1.0, 9);
    expect(rows[3]).toMatchObject({ owner: 'City', is_toll: null, est_construction_duration: null });
  });

  it('stages only the rows of its own asset class', async () => {
    await files.createAssetClass('verified', 'ports');
    await expect(files.saveFile('verified', 'ports', 'roads_b.csv', csvBuffer(['project_id,sample', 'x1,s1']))).rejects.toThrow(
      ConflictError
    );

    await files.saveFile('verified', 'ports', 'ports_a.csv', csvBuffer(['project_id,sample', 'x1,s1']));
    await service.loadRaw('verified', 'ports', 'ports_a.csv');
    await service.stage('verified', 'roads');
    await service.stage('verified', 'ports');

    expect((await service.select('roads', 'stage_verified')).map(r => r.project_id)).toEqual(['p1', 'p2', 'p3', 'p4']);
    expect((await service.select('ports', 'stage_verified')).map(r => r.project_id)).toEqual(['x1']);
  });

  it('produces the same table when staged twice', async () => {
    await service.stage('verified', 'roads');
    const first = await service.select('roads', 'stage_verified');
    await service.stage('verified', 'roads');
    expect(await service.select('roads', 'stage_verified')).toEqual(first);
  });

  it('keeps the reconciled schema for a zero-row raw table', async () => {
    await files.createAssetClass('verified', 'ports');
    await files.saveFile('verified', 'ports', 'ports_a.csv', csvBuffer(['project_id,sample,start_dredging_date']));
    await service.loadRaw('verified', 'ports', 'ports_a.csv');

    const result = await service.stage('verified', 'ports');
    expect(result.columns).toEqual([
      'project_id',
      'sample',
      'start_dredging_date',
      'start_dredging_year',
      'est_dredging_completion_date',
      'est_dredging_completion_year',
      'est_dredging_duration',
      'act_dredging_duration',
      'schedule_dredging_ratio'
    ]);
    expect(await service.select('ports', 'stage_verified')).toEqual([]);
  });

  it('leaves normalized costs NULL while reference data is missing', async () => {
    await files.createAssetClass('verified', 'rail');
    await files.saveFile(
      'verified',
      'rail',
      'rail_a.csv',
      csvBuffer(['project_id,sample,country_iso3,est_cost_local_millions,est_cost_local_year', 'r1,s1,FRA,10,2015'])
    );
    await service.loadRaw('verified', 'rail', 'rail_a.csv');
    await service.stage('verified', 'rail');

    const row = await service.selectById('rail', 'stage_verified', { project_id: 'r1', sample: 's1' });
    expect(row).toMatchObject({
      est_cost_local_millions: 10,
      est_cost_norm_millions: null,
      est_cost_norm_ppp_millions: null,
      est_cost_norm_currency: 'USD',
      est_cost_norm_year: null
    });
  });

  it('returns null for an unknown record and fails for an unknown table', async () => {
    await service.stage('verified', 'roads');
    expect(await service.selectById('roads', 'stage_verified', { project_id: 'p1', sample: 's9' })).toBeNull();
    await expect(service.select('missing', 'stage_verified')).rejects.toThrow(NotFoundError);
  });

  it('lists ratio fields of a staged table', async () => {
    await service.stage('verified', 'roads');
    expect(await service.ratioFields('verified', 'roads')).toEqual(['schedule_construction_ratio']);
  });

  it('promotes staged tables into the production table', async () => {
    await service.stage('verified', 'roads');
    const result = await service.promote('verified');
    expect(result).toMatchObject({ table: 'verified_projects', sources: ['roads'] });
    const rows = await service.select('verified_projects', 'prod');
    expect(rows.map(r => r.project_id)).toEqual(['p1', 'p2', 'p3', 'p4']);
  });

  it('promotes an empty stage schema to an empty table', async () => {
    const result = await service.promote('unverified');
    expect(result.columns).toEqual(['project_id', 'sample']);
    expect(await service.select('unverified_projects', 'prod')).toEqual([]);
  });

  it('drops raw and staged tables', async () => {
    await service.stage('verified', 'roads');
    await service.dropStage('verified', 'roads');
    await service.dropRaw('verified', 'roads_b');
    expect(await service.listStageTables('verified')).toEqual([]);
    expect(await service.listRawTables('verified')).toEqual(['roads_a']);
    await expect(service.dropRaw('verified', 'roads_b')).rejects.toThrow(NotFoundError);
  });

  it('edits records in the stored file and reloads the raw table', async () => {
    expect(await service.addRecord('verified', 'roads_b', { project_id: 'p5', sample: 's1', owner: 'Port' })).toEqual({
      table: 'roads_b',
      rows: 2
    });
    await expect(service.addRecord('verified', 'roads_b', { project_id: 'p5', sample: 's1' })).rejects.toThrow(
      ConflictError
    );

    await service.updateRecord('verified', 'roads_b', { project_id: 'p5', sample: 's1' }, { owner: 'Dock' });
    expect(await service.selectById('roads_b', 'raw_verified', { project_id: 'p5', sample: 's1' })).toEqual({
      project_id: 'p5',
      sample: 's1',
      owner: 'Dock'
    });

    await service.deleteRecord('verified', 'roads_b', { project_id: 'p4', sample: 's1' });
    const stored = await files.readFile('verified', 'roads', 'roads_b.csv');
    expect(stored.toString('utf-8')).toBe('project_id,sample,owner\r\np5,s1,Dock');
    await expect(service.deleteRecord('verified', 'roads_b', { project_id: 'p4', sample: 's1' })).rejects.toThrow(
      NotFoundError
    );
  });

  it('rejects records with unknown columns', async () => {
    await expect(service.addRecord('verified', 'roads_b', { project_id: 'p6', sample: 's1', colour: 'red' })).rejects.toThrow(
      SchemaError
    );
  });

  it('replaces a reference series', async () => {
    const result = await service.replaceReference('ppp_rates', [
      { country_iso3: 'FRA', year: 2015, value: 0.4 },
      { country_iso3: 'FRA', year: 2015, value: 0.45 }
    ]);
    expect(result).toEqual({ series: 'ppp_rates', rows: 1 });
    expect(await engine.query('SELECT * FROM "reference"."ppp_rates"')).toEqual([
      { country_iso3: 'FRA', year: 2015, ppp_rate: 0.45 }
    ]);
  });
});
