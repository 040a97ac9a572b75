import { buildFindQuery, escapeRegex } from '../../src/clients/vocabulary-repository';

describe('buildFindQuery', () => {
  it('should default to newest first with no filter', () => {
    expect(buildFindQuery({})).toEqual({
      filter: {},
      sort: { dateAdded: -1, word: 1 },
      collation: undefined,
      limit: undefined
    });
  });

  it('should match language exactly and search word or translation', () => {
    const query = buildFindQuery({ language: 'spanish', search: ' c.t ', limit: 5 });

    expect(query.filter).toEqual({
      language: 'spanish',
      $or: [
        { word: { $regex: 'c\\.t', $options: 'i' } },
        { translation: { $regex: 'c\\.t', $options: 'i' } }
      ]
    });
    expect(query.limit).toBe(5);
  });

  it('should sort alphabetically without regard to case', () => {
    const query = buildFindQuery({ sort: 'alphabetical' });

    expect(query.sort).toEqual({ word: 1 });
    expect(query.collation).toEqual({ locale: 'en', strength: 2 });
  });

  it('should put the least confident and longest unreviewed words first', () => {
    expect(buildFindQuery({ sort: 'least-confident' }).sort).toEqual({ confidenceScore: 1, lastReviewed: 1, word: 1 });
  });

  it('should escape regular expression syntax', () => {
    expect(escapeRegex('a+b(c)?')).toBe('a\\+b\\(c\\)\\?');
  });
});
