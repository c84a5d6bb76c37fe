import { AliasGenerator } from '../query/aliases';
import { cast, div, hasColumn, item, lit, nullIf, Relation, select, wrap } from '../query/build';
import { ColumnSpec } from '../types/schema';
import { describeColumn } from '../utils/columns';

type RatioPair = {
  name: string;
  actual: string;
  estimate: string;
};

const pairsFor = (columns: ColumnSpec[], suffix: string, nameOf: (stem: string) => string): RatioPair[] =>
  columns
    .filter(c => c.name.startsWith('act_') && c.name.endsWith(suffix))
    .map(c => c.name.slice('act_'.length, -suffix.length))
    .filter(stem => stem && hasColumn(columns, `est_${stem}${suffix}`))
    .map(stem => ({ name: nameOf(stem), actual: `act_${stem}${suffix}`, estimate: `est_${stem}${suffix}` }));

export const ratioPairs = (columns: ColumnSpec[]): RatioPair[] => [
  ...pairsFor(columns, '_duration', stem => `schedule_${stem}_ratio`),
  ...pairsFor(columns, '_norm_millions', stem => `${stem}_usd_gdp_ratio`)
];

/** Adds actual/estimate ratios; a zero or NULL estimate yields NULL. */
export const deriveRatios = (relation: Relation, aliases: AliasGenerator): Relation => {
  const pairs = ratioPairs(relation.columns);
  if (!pairs.length) return relation;

  const { source, ref } = wrap(relation, aliases);
  const kept = relation.columns.filter(c => !pairs.some(p => p.name === c.name));
  const ratios = pairs.map(p => item(div(cast(ref(p.actual), 'float'), nullIf(ref(p.estimate), lit(0))), p.name));

  return {
    query: select({ items: [...kept.map(c => item(ref(c.name), c.name)), ...ratios], from: source }),
    columns: [...kept, ...pairs.map(p => describeColumn(p.name))]
  };
};
