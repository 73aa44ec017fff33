import fs from 'node:fs/promises';
import { InputFormatError } from '../common/errors/pipeline.errors';
import { EntityPair } from '../paths/types/path.types';

/**
 * Reads the whole pair list. One `source<TAB>target` per line, no header;
 * blank lines are ignored and anything else without exactly two non-empty
 * columns is rejected.
 */
export async function readEntityPairs(filePath: string): Promise<EntityPair[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  return parseEntityPairs(content, filePath);
}

export function parseEntityPairs(
  content: string,
  filePath = '<input>',
): EntityPair[] {
  const pairs: EntityPair[] = [];

  content.split(/\r?\n/).forEach((line, index) => {
    if (!line.trim()) return;

    const columns = line.trimEnd().split('\t');
    if (columns.length !== 2) {
      throw new InputFormatError(
        filePath,
        index + 1,
        `expected 2 tab-separated columns, found ${columns.length}`,
      );
    }

    const [source, target] = columns.map((c) => c.trim());
    if (!source || !target) {
      throw new InputFormatError(filePath, index + 1, 'empty identifier');
    }
    pairs.push(Object.freeze({ source, target }));
  });

  return pairs;
}
