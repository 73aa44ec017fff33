import { normalizeIdentifier } from './identifiers';

describe('normalizeIdentifier', () => {
  it('keeps the last path segment of entity and property URIs', () => {
    expect(
      normalizeIdentifier('http://www.wikidata.org/entity/Q42', 'endpoint'),
    ).toBe('Q42');
    expect(
      normalizeIdentifier('http://www.wikidata.org/prop/direct/P31', 'relation'),
    ).toBe('P31');
  });

  it('does not touch case or dashes outside intermediate nodes', () => {
    expect(
      normalizeIdentifier('http://schema.org/about-x', 'relation'),
    ).toBe('about-x');
  });

  it('strips the statement suffix of intermediate nodes and upper-cases them', () => {
    expect(
      normalizeIdentifier(
        'http://www.wikidata.org/entity/statement/q100-1ab2cd3e',
        'intermediate',
      ),
    ).toBe('Q100');
    expect(
      normalizeIdentifier('http://www.wikidata.org/entity/Qx-1ab2', 'intermediate'),
    ).toBe('QX');
  });

  it('returns plain intermediate identifiers upper-cased', () => {
    expect(
      normalizeIdentifier('http://www.wikidata.org/entity/Q5', 'intermediate'),
    ).toBe('Q5');
  });

  it('returns values without a slash unchanged', () => {
    expect(normalizeIdentifier('Q7', 'endpoint')).toBe('Q7');
  });
});
