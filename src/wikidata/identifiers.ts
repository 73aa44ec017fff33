export type IdentifierRole = 'endpoint' | 'relation' | 'intermediate';

/**
 * Reduces a resource URI from the query service to the bare identifier.
 *
 * Every value keeps only its last path segment
 * (`http://www.wikidata.org/prop/direct/P31` -> `P31`). Intermediate nodes may
 * be statement nodes (`.../statement/Q42-1AB2...`), so for them only the part
 * before the first `-` is kept and upper-cased. Output files produced by
 * earlier runs depend on exactly this reduction; keep it byte-for-byte.
 */
export function normalizeIdentifier(value: string, role: IdentifierRole): string {
  const segments = value.split('/');
  const tail = segments[segments.length - 1];

  if (role !== 'intermediate') {
    return tail;
  }
  return tail.split('-')[0].toUpperCase();
}
