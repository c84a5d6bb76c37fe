import { AliasGenerator } from '../query/aliases';
import { Relation } from '../query/build';
import { TableSchema } from '../types/schema';
import { normalizeCosts, NormalizeOptions } from './normalize';
import { deriveRatios } from './ratios';
import { reconcileSchedule } from './schedule';
import { unionTables } from './union';

export type { NormalizeOptions } from './normalize';

/** Full staging query for one asset class: union, schedule, normalization, ratios. */
export const composeStage = (
  tables: TableSchema[],
  options: NormalizeOptions,
  aliases = new AliasGenerator()
): Relation => {
  const unioned = unionTables(tables, aliases);
  const scheduled = reconcileSchedule(unioned, aliases);
  const normalized = normalizeCosts(scheduled, aliases, options);
  return deriveRatios(normalized, aliases);
};

/** Production query: the union of every staged table in a schema. */
export const composeProd = (tables: TableSchema[], aliases = new AliasGenerator()): Relation =>
  unionTables(tables, aliases);
