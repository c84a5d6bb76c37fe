import { SqlEngine } from '../db/engine';
import { createTableSql, qualified, quoteIdent } from '../query/render';
import { ColumnSpec, ReferenceRecord } from '../types/schema';
import { describeColumn } from '../utils/columns';

export const REFERENCE_SCHEMA = 'reference';

export type SeriesKey = 'exchange_rates' | 'gdp_deflators' | 'ppp_rates';

export type SeriesDefinition = {
  key: SeriesKey;
  table: string;
  valueColumn: string;
  /** World Bank indicator code the series is loaded from. */
  indicator: string;
};

export const REFERENCE_SERIES: Record<SeriesKey, SeriesDefinition> = {
  exchange_rates: { key: 'exchange_rates', table: 'exchange_rates', valueColumn: 'exchange_rate', indicator: 'PA.NUS.FCRF' },
  gdp_deflators: { key: 'gdp_deflators', table: 'gdp_deflators', valueColumn: 'gdp_deflator', indicator: 'NY.GDP.DEFL.ZS' },
  ppp_rates: { key: 'ppp_rates', table: 'ppp_rates', valueColumn: 'ppp_rate', indicator: 'PA.NUS.PPP' }
};

export const SERIES_KEYS: SeriesKey[] = ['exchange_rates', 'gdp_deflators', 'ppp_rates'];

export const isSeriesKey = (value: string): value is SeriesKey => SERIES_KEYS.some(key => key === value);

const SERIES_KEY_COLUMNS = ['country_iso3', 'year'] as const;

const seriesColumns = (series: SeriesDefinition): ColumnSpec[] => [
  describeColumn('country_iso3'),
  // bare `year` carries no suffix, so it is typed here rather than classified
  { name: 'year', type: 'integer', role: 'attribute' },
  { name: series.valueColumn, type: 'float', role: 'attribute' }
];

const target = (series: SeriesDefinition, schema: string) => ({ schema, name: series.table });

export const ensureReferenceTables = async (engine: SqlEngine, schema = REFERENCE_SCHEMA) => {
  await engine.ensureSchema(schema);
  for (const key of SERIES_KEYS) {
    const series = REFERENCE_SERIES[key];
    if (await engine.tableExists(schema, series.table)) continue;
    await engine.execute(createTableSql(engine.dialect, target(series, schema), seriesColumns(series), SERIES_KEY_COLUMNS));
  }
};

/** Truncate-and-reload: the series holds exactly `records` afterwards, or is left untouched on failure. */
export const replaceSeries = async (
  engine: SqlEngine,
  key: SeriesKey,
  records: ReferenceRecord[],
  schema = REFERENCE_SCHEMA
) => {
  const series = REFERENCE_SERIES[key];
  await ensureReferenceTables(engine, schema);

  const unique = new Map<string, ReferenceRecord>();
  for (const record of records) {
    unique.set(`${record.country_iso3}|${record.year}`, record);
  }

  const table = qualified(target(series, schema));
  const columns = ['country_iso3', 'year', series.valueColumn].map(quoteIdent).join(', ');
  const placeholders = [1, 2, 3].map(i => engine.dialect.placeholder(i)).join(', ');
  await engine.transaction(async tx => {
    await tx.execute(`DELETE FROM ${table}`);
    for (const record of unique.values()) {
      await tx.execute(`INSERT INTO ${table} (${columns}) VALUES (${placeholders})`, [
        record.country_iso3,
        record.year,
        record.value
      ]);
    }
  });
  return unique.size;
};
