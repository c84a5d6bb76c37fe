import { DataFormatError } from '../errors';
import { CellValue, ColumnRole, ColumnSpec, SemanticType } from '../types/schema';

export const PRIMARY_KEYS = ['project_id', 'sample'] as const;
export const COUNTRY_COLUMN = 'country_iso3';

type TypeRule = {
  type: SemanticType;
  suffixes: string[];
  prefixes: string[];
};

// Order matters: the first matching rule wins and string catches everything else.
const TYPE_RULES: TypeRule[] = [
  { type: 'integer', suffixes: ['_year'], prefixes: [] },
  { type: 'boolean', suffixes: [], prefixes: ['is_'] },
  { type: 'date', suffixes: ['_date'], prefixes: [] },
  {
    type: 'float',
    suffixes: ['_millions', '_value', '_ratio', '_duration', '_thousands', '_rate'],
    prefixes: []
  },
  { type: 'string', suffixes: [''], prefixes: [] }
];

const TRUE_VALUES = new Set(['y', 'yes', 't', 'true', 'on', '1']);
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export const normalizeColumnName = (name: string) => name.trim().toLowerCase();

export const classifyColumn = (name: string): SemanticType => {
  const lower = name.toLowerCase();
  const rule = TYPE_RULES.find(
    r => r.suffixes.some(s => lower.endsWith(s)) || r.prefixes.some(p => lower.startsWith(p))
  );
  return rule ? rule.type : 'string';
};

const isCostLocal = (name: string) =>
  name.includes('_cost') && /_local_(millions|currency|year)$/.test(name);

const isCostNormalized = (name: string) =>
  name.includes('_cost') && /_norm_(millions|ppp_millions|currency|year)$/.test(name);

export const columnRole = (name: string): ColumnRole => {
  const lower = name.toLowerCase();
  if (PRIMARY_KEYS.some(key => key === lower)) return 'primary_key';
  if (lower === COUNTRY_COLUMN) return 'country';
  if (isCostLocal(lower)) return 'cost_local';
  if (isCostNormalized(lower)) return 'cost_normalized';
  if (lower.endsWith('_date')) return 'schedule_date';
  if (lower.endsWith('_year')) return 'schedule_year';
  if (lower.endsWith('_duration')) return 'duration';
  if (lower.endsWith('_ratio')) return 'ratio';
  return 'attribute';
};

export const describeColumn = (name: string): ColumnSpec => ({
  name,
  type: classifyColumn(name),
  role: columnRole(name)
});

export const describeColumns = (names: string[]): ColumnSpec[] => names.map(describeColumn);

export const isValidDate = (value: string) => {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
};

export const castValue = (column: string, raw: unknown): CellValue => {
  if (raw === null || raw === undefined) return null;
  const value = String(raw).trim();
  if (value === '') return null;

  const type = classifyColumn(column);
  switch (type) {
    case 'integer':
    case 'float': {
      const num = Number(value);
      if (!Number.isFinite(num) || (type === 'integer' && !Number.isInteger(num))) {
        throw new DataFormatError(`Column '${column}' expects ${type === 'integer' ? 'an integer' : 'a number'}, got '${value}'`);
      }
      return num;
    }
    case 'boolean':
      return TRUE_VALUES.has(value.toLowerCase());
    case 'date':
      if (!isValidDate(value)) {
        throw new DataFormatError(`Column '${column}' expects a YYYY-MM-DD date, got '${value}'`);
      }
      return value;
    default:
      return value;
  }
};
