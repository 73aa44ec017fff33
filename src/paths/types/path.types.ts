export type HopVariant = 'one-hop' | 'four-hop';

export const HOP_VARIANTS: readonly HopVariant[] = ['one-hop', 'four-hop'];

export interface EntityPair {
  readonly source: string;
  readonly target: string;
}

/**
 * One discovered path. `relations` has one more element than
 * `intermediates`; reading them interleaved gives the walk from source to
 * target (r1, x, r2, y, r3, z, r4 for four hops).
 */
export interface PathBinding {
  relations: string[];
  intermediates: string[];
}

export interface PathGroup {
  pair: EntityPair;
  paths: PathBinding[];
}

export interface AggregationResult {
  // keyed by pairKey(), insertion order = first time the pair was seen
  groups: Map<string, PathGroup>;
  relationCodes: Set<string>;
  entityCodes: Set<string>;
}

// identifiers are read from tab-separated columns, so they never hold a tab
export function pairKey(pair: EntityPair): string {
  return `${pair.source}\t${pair.target}`;
}

/** The `source#target` column of an output record. */
export function pairLabel(pair: EntityPair): string {
  return `${pair.source}#${pair.target}`;
}
