import { AliasGenerator } from '../query/aliases';
import {
  and,
  cast,
  caseWhen,
  dateFromYear,
  daysBetween,
  div,
  hasColumn,
  isNotNull,
  isNull,
  item,
  lit,
  nullOf,
  Relation,
  select,
  wrap,
  yearOf
} from '../query/build';
import { Expr, SelectItem } from '../query/ast';
import { ColumnSpec } from '../types/schema';
import { describeColumn } from '../utils/columns';

// A year known without a date is pinned to July 2nd.
export const PLACEHOLDER_MONTH = 7;
export const PLACEHOLDER_DAY = 2;
export const DAYS_PER_YEAR = 365;

const DURATION_PREFIXES = ['est', 'act'] as const;

const stemOf = (name: string, suffix: string) => name.slice(0, -suffix.length);

export const scheduleIds = (columns: ColumnSpec[]): string[] => {
  const ids: string[] = [];
  for (const c of columns) {
    if (!c.name.startsWith('start_') || !c.name.endsWith('_date')) continue;
    let id = stemOf(c.name, '_date').slice('start_'.length);
    if (id.endsWith('_completion')) id = stemOf(id, '_completion');
    if (id && !ids.includes(id)) ids.push(id);
  }
  return ids;
};

export const requiredScheduleColumns = (id: string) => [
  `start_${id}_date`,
  `start_${id}_year`,
  `est_${id}_completion_date`,
  `est_${id}_completion_year`,
  `est_${id}_duration`,
  `act_${id}_duration`
];

/** Appends NULL-filled schedule columns implied by each `start_{id}_date`. */
export const addScheduleColumns = (relation: Relation, aliases: AliasGenerator): Relation => {
  const missing: ColumnSpec[] = [];
  for (const id of scheduleIds(relation.columns)) {
    for (const name of requiredScheduleColumns(id)) {
      if (!hasColumn(relation.columns, name) && !missing.some(c => c.name === name)) {
        missing.push(describeColumn(name));
      }
    }
  }
  if (!missing.length) return relation;

  const { source, ref } = wrap(relation, aliases);
  return {
    query: select({
      items: [
        ...relation.columns.map(c => item(ref(c.name), c.name)),
        ...missing.map(c => item(nullOf(c.type), c.name))
      ],
      from: source
    }),
    columns: [...relation.columns, ...missing]
  };
};

const fillYear = (year: Expr, date: Expr) => caseWhen([{ when: isNull(year), then: yearOf(date) }], year);

const fillDate = (date: Expr, year: Expr) =>
  caseWhen(
    [{ when: and(isNull(date), isNotNull(year)), then: dateFromYear(year, PLACEHOLDER_MONTH, PLACEHOLDER_DAY) }],
    date
  );

/** Fills each `{stem}_year` from its date and each `{stem}_date` from its year. */
export const reconcileDateYears = (relation: Relation, aliases: AliasGenerator): Relation => {
  const pairedStems = relation.columns
    .filter(c => c.name.endsWith('_date'))
    .map(c => stemOf(c.name, '_date'))
    .filter(stem => hasColumn(relation.columns, `${stem}_year`));
  if (!pairedStems.length) return relation;

  const { source, ref } = wrap(relation, aliases);
  const items: SelectItem[] = relation.columns.map(c => {
    if (c.name.endsWith('_date')) {
      const stem = stemOf(c.name, '_date');
      if (pairedStems.includes(stem)) return item(fillDate(ref(c.name), ref(`${stem}_year`)), c.name);
    }
    if (c.name.endsWith('_year')) {
      const stem = stemOf(c.name, '_year');
      if (pairedStems.includes(stem)) return item(fillYear(ref(c.name), ref(`${stem}_date`)), c.name);
    }
    return item(ref(c.name), c.name);
  });

  return { query: select({ items, from: source }), columns: relation.columns };
};

type DurationInputs = {
  startDate: string;
  endDate: string;
};

export const durationInputs = (columns: ColumnSpec[], name: string): DurationInputs | null => {
  if (!name.endsWith('_duration')) return null;
  const prefix = DURATION_PREFIXES.find(p => name.startsWith(`${p}_`));
  if (!prefix) return null;
  const id = stemOf(name, '_duration').slice(prefix.length + 1);
  if (!id) return null;

  const required = [`start_${id}_year`, `start_${id}_date`, `${prefix}_${id}_completion_date`, `${prefix}_${id}_completion_year`];
  if (!required.every(r => hasColumn(columns, r))) return null;
  return { startDate: `start_${id}_date`, endDate: `${prefix}_${id}_completion_date` };
};

/**
 * Computes NULL durations as elapsed years between the reconciled start and
 * completion dates. Expects date/year pairs to be reconciled already.
 */
export const computeDurations = (relation: Relation, aliases: AliasGenerator): Relation => {
  const computable = relation.columns.filter(c => durationInputs(relation.columns, c.name));
  if (!computable.length) return relation;

  const { source, ref } = wrap(relation, aliases);
  const items = relation.columns.map(c => {
    const inputs = durationInputs(relation.columns, c.name);
    if (!inputs) return item(ref(c.name), c.name);
    const elapsed = div(cast(daysBetween(ref(inputs.endDate), ref(inputs.startDate)), 'float'), lit(DAYS_PER_YEAR));
    return item(caseWhen([{ when: isNull(ref(c.name)), then: elapsed }], ref(c.name)), c.name);
  });

  return { query: select({ items, from: source }), columns: relation.columns };
};

export const reconcileSchedule = (relation: Relation, aliases: AliasGenerator): Relation =>
  computeDurations(reconcileDateYears(addScheduleColumns(relation, aliases), aliases), aliases);
