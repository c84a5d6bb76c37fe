import { MaterializationError } from '../errors';
import { Relation } from '../query/build';
import { QualifiedName, renderQuery } from '../query/render';
import { PRIMARY_KEYS } from '../utils/columns';
import { SqlEngine } from './engine';

/**
 * Replaces `target` with the rows of `relation` and enforces the
 * (project_id, sample) key, all in one transaction. On failure the previous
 * table is left as it was.
 */
export const materialize = async (engine: SqlEngine, target: QualifiedName, relation: Relation) => {
  await engine.ensureSchema(target.schema);
  const statements = engine.dialect.materialize(
    target,
    relation.columns,
    renderQuery(relation.query, engine.dialect),
    PRIMARY_KEYS
  );

  try {
    await engine.transaction(async tx => {
      for (const statement of statements) {
        await tx.execute(statement);
      }
    });
  } catch (err) {
    throw new MaterializationError(`${target.schema}.${target.name}`, err);
  }
  console.log(`[stage] materialized ${target.schema}.${target.name} (${relation.columns.length} columns)`);
};
