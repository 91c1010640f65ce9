import { describe, expect, it } from 'vitest';
import { Filter } from './filter.js';
import { buildSearchBody, joinUnique } from './searchBody.js';
import { Sort } from './sort.js';

const matchClause = (algorithm: string, language: string, name: string) => ({
  [algorithm]: {
    [`NameCombined_${language}`]: { query: name, fuzziness: 'AUTO', prefix_length: 1, max_expansions: 50 },
  },
});

describe('joinUnique', () => {
  it('drops duplicates and joins with commas', () => {
    expect(joinUnique(['Item', 'Item', 'Recipe'])).toBe('Item,Recipe');
  });
});

describe('buildSearchBody', () => {
  it('builds one should clause per language with offset pagination', () => {
    const body = buildSearchBody({
      name: 'Fire',
      indexes: ['Spell'],
      columns: ['ID', 'Name'],
      algorithm: 'match',
      page: 0,
      perPage: 10,
    });

    expect(body).toEqual({
      indexes: 'Spell',
      columns: 'ID,Name',
      body: {
        query: {
          bool: {
            should: [
              matchClause('match', 'en', 'Fire'),
              matchClause('match', 'de', 'Fire'),
              matchClause('match', 'fr', 'Fire'),
              matchClause('match', 'ja', 'Fire'),
            ],
          },
        },
        from: 0,
        size: 10,
      },
    });
  });

  it('uses the chosen algorithm as the clause key', () => {
    const body = buildSearchBody({
      name: 'Potion',
      indexes: ['Item'],
      columns: ['ID'],
      algorithm: 'wildcard_plus',
      page: 2,
      perPage: 25,
    });

    expect(body.body.query.bool.should[0]).toEqual(matchClause('wildcard_plus', 'en', 'Potion'));
    expect(body.body.from).toBe(2);
    expect(body.body.size).toBe(25);
  });

  it('adds filters and sort only when given', () => {
    const [, levelFilter] = Filter.create('LevelItem', 'gte', 100);
    const [, equipFilter] = Filter.create('LevelEquip', 'lt', 80);
    if (!levelFilter || !equipFilter) {
      throw new Error('expected valid filters');
    }

    const body = buildSearchBody({
      name: 'Sword',
      indexes: ['Item', 'Item'],
      columns: ['ID', 'Name', 'ID'],
      algorithm: 'match',
      filters: [levelFilter, equipFilter],
      sort: new Sort('LevelItem', false),
      page: 0,
      perPage: 10,
    });

    expect(body.indexes).toBe('Item');
    expect(body.columns).toBe('ID,Name');
    expect(body.body.query.bool.filter).toEqual([
      { range: { LevelItem: { gte: 100 } } },
      { range: { LevelEquip: { lt: 80 } } },
    ]);
    expect(body.body.sort).toEqual([{ LevelItem: 'desc' }]);
  });

  it('omits filter and sort keys when absent', () => {
    const body = buildSearchBody({
      name: 'Sword',
      indexes: ['Item'],
      columns: ['ID'],
      algorithm: 'match',
      filters: [],
      page: 0,
      perPage: 10,
    });

    expect('filter' in body.body.query.bool).toBe(false);
    expect('sort' in body.body).toBe(false);
  });
});
