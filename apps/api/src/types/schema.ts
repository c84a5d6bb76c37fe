export type SemanticType = 'integer' | 'boolean' | 'date' | 'float' | 'string';

export type ColumnRole =
  | 'primary_key'
  | 'country'
  | 'schedule_date'
  | 'schedule_year'
  | 'duration'
  | 'cost_local'
  | 'cost_normalized'
  | 'ratio'
  | 'attribute';

export type ColumnSpec = {
  name: string;
  type: SemanticType;
  role: ColumnRole;
};

export type TableSchema = {
  schema: string;
  name: string;
  columns: ColumnSpec[];
};

export type VerificationStatus = 'verified' | 'unverified';

export type CellValue = string | number | boolean | null;

export type Row = Record<string, CellValue>;

export type ParsedFile = {
  columns: string[];
  rows: Record<string, string>[];
  source: 'csv' | 'excel';
};

export type ReferenceRecord = {
  country_iso3: string;
  year: number;
  value: number;
};
