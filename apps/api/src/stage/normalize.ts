import { AliasGenerator } from '../query/aliases';
import { Expr, Join, SelectItem } from '../query/ast';
import {
  and,
  col,
  div,
  eq,
  hasColumn,
  item,
  leftJoin,
  lit,
  max,
  product,
  Relation,
  scalar,
  select,
  subquery,
  table,
  wrap
} from '../query/build';
import { REFERENCE_SCHEMA, REFERENCE_SERIES, SeriesDefinition } from '../reference/series';
import { ColumnSpec } from '../types/schema';
import { COUNTRY_COLUMN, describeColumn } from '../utils/columns';

export type NormalizeOptions = {
  anchorCountry: string;
  referenceSchema?: string;
};

export type CostStem = {
  stem: string;
  millions: string;
  year: string;
};

const LOCAL_MILLIONS = '_local_millions';

export const costStems = (columns: ColumnSpec[]): CostStem[] => {
  if (!hasColumn(columns, COUNTRY_COLUMN)) return [];
  return columns
    .filter(c => c.name.endsWith(LOCAL_MILLIONS) && c.role === 'cost_local')
    .map(c => c.name.slice(0, -LOCAL_MILLIONS.length))
    .filter(stem => hasColumn(columns, `${stem}_local_year`))
    .map(stem => ({ stem, millions: `${stem}${LOCAL_MILLIONS}`, year: `${stem}_local_year` }));
};

export const normalizedColumns = (stem: string) => ({
  millions: `${stem}_norm_millions`,
  pppMillions: `${stem}_norm_ppp_millions`,
  currency: `${stem}_norm_currency`,
  year: `${stem}_norm_year`
});

const latestYear = (series: SeriesDefinition, schema: string, aliases: AliasGenerator): Expr => {
  const alias = aliases.next('m');
  return scalar(select({ items: [item(max(col(alias, 'year')), 'year')], from: table(schema, series.table, alias) }));
};

/**
 * Converts every `{stem}_local_millions` cost to USD at the historical
 * exchange rate and inflates it to the latest deflator year of the row's
 * country. A PPP variant swaps the exchange rate legs for PPP factors. Every
 * lookup is a left join, so missing reference data only nulls the outputs.
 */
export const normalizeCosts = (relation: Relation, aliases: AliasGenerator, options: NormalizeOptions): Relation => {
  const stems = costStems(relation.columns);
  if (!stems.length) return relation;

  const schema = options.referenceSchema ?? REFERENCE_SCHEMA;
  const rates = REFERENCE_SERIES.exchange_rates;
  const deflators = REFERENCE_SERIES.gdp_deflators;
  const ppp = REFERENCE_SERIES.ppp_rates;

  const { source, ref } = wrap(relation, aliases);
  const country = ref(COUNTRY_COLUMN);
  const joins: Join[] = [];

  // One latest-year deflator snapshot shared by every stem keeps cross-stem ratios comparable.
  const snapshotAlias = aliases.next('l');
  const inner = aliases.next('d');
  const snapshotYear = latestYear(deflators, schema, aliases);
  joins.push(
    leftJoin(
      subquery(
        select({
          items: [
            item(col(inner, COUNTRY_COLUMN), COUNTRY_COLUMN),
            item(col(inner, 'year'), 'year'),
            item(col(inner, deflators.valueColumn), deflators.valueColumn)
          ],
          from: table(schema, deflators.table, inner),
          where: eq(col(inner, 'year'), snapshotYear)
        }),
        snapshotAlias
      ),
      eq(country, col(snapshotAlias, COUNTRY_COLUMN))
    )
  );
  const latestDeflator = col(snapshotAlias, deflators.valueColumn);

  const lookup = (series: SeriesDefinition, prefix: string, year: Expr, countryMatch: 'own' | 'anchor') => {
    const alias = aliases.next(prefix);
    const countryCondition =
      countryMatch === 'own' ? eq(country, col(alias, COUNTRY_COLUMN)) : eq(col(alias, COUNTRY_COLUMN), lit(options.anchorCountry));
    joins.push(leftJoin(table(schema, series.table, alias), and(countryCondition, eq(year, col(alias, 'year')))));
    return col(alias, series.valueColumn);
  };

  const derived: SelectItem[] = [];
  const derivedSpecs: ColumnSpec[] = [];
  for (const cost of stems) {
    const local = ref(cost.millions);
    const year = ref(cost.year);
    const ownRate = lookup(rates, 'e', year, 'own');
    const anchorRate = lookup(rates, 'e', year, 'anchor');
    const ownDeflator = lookup(deflators, 'g', year, 'own');
    const ownPpp = lookup(ppp, 'p', year, 'own');
    const anchorPpp = lookup(ppp, 'p', year, 'anchor');

    const names = normalizedColumns(cost.stem);
    derived.push(
      item(div(div(product(local, anchorRate, latestDeflator), ownRate), ownDeflator), names.millions),
      item(div(div(product(local, anchorPpp, latestDeflator), ownPpp), ownDeflator), names.pppMillions),
      item(lit('USD'), names.currency),
      item(latestYear(deflators, schema, aliases), names.year)
    );
    derivedSpecs.push(...[names.millions, names.pppMillions, names.currency, names.year].map(describeColumn));
  }

  // Computed columns replace same-named source columns.
  const kept = relation.columns.filter(c => !derivedSpecs.some(d => d.name === c.name));
  return {
    query: select({
      items: [...kept.map(c => item(ref(c.name), c.name)), ...derived],
      from: source,
      joins
    }),
    columns: [...kept, ...derivedSpecs]
  };
};
