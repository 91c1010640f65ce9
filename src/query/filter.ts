import { z } from 'zod';
import { InvalidFilterError } from '../error/argumentErrors.js';
import { validator } from '../utils/validator.js';
import type { SafeWrap } from '../utils/wrap.js';

/** Numeric comparisons supported by DQL range filters. */
export const FILTER_COMPARISONS = ['gt', 'gte', 'lt', 'lte'] as const;

/** One of {@link FILTER_COMPARISONS}. */
export type FilterComparison = (typeof FILTER_COMPARISONS)[number];

/** Serialized form of a {@link Filter}: `{ range: { LevelItem: { gte: 100 } } }`. */
export interface RangeClause {
  range: Record<string, Record<string, number>>;
}

const comparisonSchema = z.string().toLowerCase().pipe(z.enum(FILTER_COMPARISONS));

/**
 * Immutable DQL range filter applied to an index search, e.g. `LevelItem >= 100`.
 *
 * Built through {@link Filter.create}, which validates the comparison up front so a
 * search call never has to.
 */
export class Filter {
  readonly field: string;
  readonly comparison: FilterComparison;
  readonly value: number;

  private constructor(field: string, comparison: FilterComparison, value: number) {
    this.field = field;
    this.comparison = comparison;
    this.value = value;
    Object.freeze(this);
  }

  /**
   * Creates a filter. The comparison is matched case-insensitively and stored lower-cased.
   *
   * @example
   * const [err, filter] = Filter.create('LevelItem', 'GTE', 100);
   */
  static create(field: string, comparison: string, value: number): SafeWrap<InvalidFilterError, Filter> {
    const [err, parsed] = validator(
      comparison,
      comparisonSchema,
      InvalidFilterError,
      `"${comparison.toLowerCase()}" is not a valid DQL filter comparison.`,
    );
    if (err) {
      return [err, null];
    }

    return [null, new Filter(field, parsed, value)];
  }

  /** Range clause for the `filter` list of a search query. */
  toClause(): RangeClause {
    return { range: { [this.field]: { [this.comparison]: this.value } } };
  }
}
