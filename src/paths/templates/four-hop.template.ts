import { ResolvedLabels } from '../../labels/label.types';
import {
  EntityPair,
  pairLabel,
  PathBinding,
  PathGroup,
} from '../types/path.types';
import { buildValuesClause, PathTemplate } from './path-template';

/**
 * relation1 -> x -> relation2 -> y -> relation3 -> z -> relation4.
 *
 * A well-connected pair can match thousands of chains; SAMPLE per variable
 * grouped by the pair collapses them to one representative path.
 */
export const fourHopTemplate: PathTemplate = {
  variant: 'four-hop',
  defaultPairBatchSize: 10,
  defaultLabelBatchSize: 10,
  relationVariables: ['relation1', 'relation2', 'relation3', 'relation4'],
  intermediateVariables: ['x', 'y', 'z'],

  buildQuery(pairs) {
    return `
SELECT ?entity1 ?entity2
  (SAMPLE(?relation1) AS ?relation1) (SAMPLE(?x) AS ?x)
  (SAMPLE(?relation2) AS ?relation2) (SAMPLE(?y) AS ?y)
  (SAMPLE(?relation3) AS ?relation3) (SAMPLE(?z) AS ?z)
  (SAMPLE(?relation4) AS ?relation4)
WHERE {
  VALUES (?entity1 ?entity2) {
    ${buildValuesClause(pairs)}
  }
  ?entity1 ?relation1 ?x.
  ?x ?relation2 ?y.
  ?y ?relation3 ?z.
  ?z ?relation4 ?entity2.
}
GROUP BY ?entity1 ?entity2
`.trim();
  },

  formatRecords(
    _batch: readonly EntityPair[],
    groups: ReadonlyMap<string, PathGroup>,
    labels: ResolvedLabels,
  ): string[] {
    const lines: string[] = [];
    for (const group of groups.values()) {
      for (const path of group.paths) {
        lines.push(
          `${pairLabel(group.pair)}\t${describePath(path, labels).join('#')}`,
        );
      }
    }
    return lines;
  },
};

function describePath(path: PathBinding, labels: ResolvedLabels): string[] {
  const steps: string[] = [];
  path.relations.forEach((relation, i) => {
    steps.push(labels.relations.get(relation) ?? relation);
    const entity = path.intermediates[i];
    if (entity !== undefined) {
      steps.push(labels.entities.get(entity) ?? entity);
    }
  });
  return steps;
}
