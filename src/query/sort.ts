/** Serialized form of a {@link Sort}: `{ LevelItem: 'desc' }`. */
export type SortClause = Record<string, 'asc' | 'desc'>;

/** Immutable single-field sort directive for an index search. */
export class Sort {
  readonly field: string;
  readonly ascending: boolean;

  constructor(field: string, ascending = true) {
    this.field = field;
    this.ascending = ascending;
    Object.freeze(this);
  }

  toClause(): SortClause {
    return { [this.field]: this.ascending ? 'asc' : 'desc' };
  }
}
