import { ResolvedLabels } from '../../labels/label.types';
import {
  EntityPair,
  pairKey,
  pairLabel,
  PathGroup,
} from '../types/path.types';
import { buildValuesClause, PathTemplate } from './path-template';

export const NO_RELATION = 'No Relation';

export const oneHopTemplate: PathTemplate = {
  variant: 'one-hop',
  defaultPairBatchSize: 120,
  defaultLabelBatchSize: 40,
  relationVariables: ['property'],
  intermediateVariables: [],

  buildQuery(pairs) {
    return `
SELECT ?entity1 ?entity2 ?property
WHERE {
  VALUES (?entity1 ?entity2) {
    ${buildValuesClause(pairs)}
  }
  ?entity1 ?property ?entity2.
}
`.trim();
  },

  // One line per distinct pair of the batch, in input order. Pairs the
  // endpoint found nothing for still get a line.
  formatRecords(
    batch: readonly EntityPair[],
    groups: ReadonlyMap<string, PathGroup>,
    labels: ResolvedLabels,
  ): string[] {
    const ordered = new Map<string, PathGroup>();
    for (const pair of batch) {
      const key = pairKey(pair);
      if (!ordered.has(key)) {
        ordered.set(key, groups.get(key) ?? { pair, paths: [] });
      }
    }
    for (const [key, group] of groups) {
      if (!ordered.has(key)) ordered.set(key, group);
    }

    const lines: string[] = [];
    for (const group of ordered.values()) {
      const names =
        group.paths.length > 0
          ? group.paths.map(
              (path) => labels.relations.get(path.relations[0]) ?? NO_RELATION,
            )
          : [NO_RELATION];
      lines.push(`${pairLabel(group.pair)}\t${names.join('$')}`);
    }
    return lines;
  },
};
