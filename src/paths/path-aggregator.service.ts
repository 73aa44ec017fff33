import { Injectable, Logger } from '@nestjs/common';
import { normalizeIdentifier } from '../wikidata/identifiers';
import { SparqlBinding } from '../wikidata/wikidata.types';
import { ENTITY1_VAR, ENTITY2_VAR, PathTemplate } from './templates';
import {
  AggregationResult,
  EntityPair,
  pairKey,
  PathBinding,
  PathGroup,
} from './types/path.types';

@Injectable()
export class PathAggregatorService {
  private readonly logger = new Logger(PathAggregatorService.name);

  aggregate(
    bindings: readonly SparqlBinding[],
    template: PathTemplate,
  ): AggregationResult {
    const groups = new Map<string, PathGroup>();
    const allRelations: string[] = [];
    const allEntities: string[] = [];
    let dropped = 0;

    for (const binding of bindings) {
      const parsed = parseBinding(binding, template);
      if (!parsed) {
        dropped++;
        continue;
      }

      const { pair, path } = parsed;
      const key = pairKey(pair);
      const group = groups.get(key);
      if (group) {
        group.paths.push(path);
      } else {
        groups.set(key, { pair, paths: [path] });
      }

      allRelations.push(...path.relations);
      allEntities.push(...path.intermediates);
    }

    if (dropped > 0) {
      this.logger.warn(
        `Dropped ${dropped} of ${bindings.length} bindings missing a ${template.variant} variable`,
      );
    }

    return {
      groups,
      relationCodes: new Set(allRelations),
      entityCodes: new Set(allEntities),
    };
  }
}

function parseBinding(
  binding: SparqlBinding,
  template: PathTemplate,
): { pair: EntityPair; path: PathBinding } | null {
  const read = (variable: string): string | undefined => {
    const term = binding[variable];
    return typeof term?.value === 'string' && term.value.length > 0
      ? term.value
      : undefined;
  };

  const source = read(ENTITY1_VAR);
  const target = read(ENTITY2_VAR);
  const relations = template.relationVariables.map(read).filter(isPresent);
  const intermediates = template.intermediateVariables
    .map(read)
    .filter(isPresent);
  if (
    source === undefined ||
    target === undefined ||
    relations.length !== template.relationVariables.length ||
    intermediates.length !== template.intermediateVariables.length
  ) {
    return null;
  }

  return {
    pair: {
      source: normalizeIdentifier(source, 'endpoint'),
      target: normalizeIdentifier(target, 'endpoint'),
    },
    path: {
      relations: relations.map((r) => normalizeIdentifier(r, 'relation')),
      intermediates: intermediates.map((e) =>
        normalizeIdentifier(e, 'intermediate'),
      ),
    },
  };
}

function isPresent(value: string | undefined): value is string {
  return value !== undefined;
}
