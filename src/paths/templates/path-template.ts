import { ResolvedLabels } from '../../labels/label.types';
import { EntityPair, HopVariant, PathGroup } from '../types/path.types';

export const ENTITY1_VAR = 'entity1';
export const ENTITY2_VAR = 'entity2';

export interface PathTemplate {
  readonly variant: HopVariant;
  readonly defaultPairBatchSize: number;
  readonly defaultLabelBatchSize: number;
  readonly relationVariables: readonly string[];
  readonly intermediateVariables: readonly string[];

  buildQuery(pairs: readonly EntityPair[]): string;

  /** Output lines for one successfully queried batch. */
  formatRecords(
    batch: readonly EntityPair[],
    groups: ReadonlyMap<string, PathGroup>,
    labels: ResolvedLabels,
  ): string[];
}

export function buildValuesClause(pairs: readonly EntityPair[]): string {
  return pairs
    .map((p) => `(wd:${p.source.trim()} wd:${p.target.trim()})`)
    .join(' ');
}
