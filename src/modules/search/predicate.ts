/**
 * Boolean test over one record. Predicates compose into a tree with the
 * combinators below so one instance can be shared by count and fetch.
 */
export type Predicate<T> = (item: T) => boolean;

export const always = <T>(): Predicate<T> => () => true;

export const and = <T>(...predicates: Predicate<T>[]): Predicate<T> =>
  item => predicates.every(predicate => predicate(item));

export const or = <T>(...predicates: Predicate<T>[]): Predicate<T> =>
  item => predicates.some(predicate => predicate(item));

export const not = <T>(predicate: Predicate<T>): Predicate<T> => item => !predicate(item);

export const isFilled = (value: string | null | undefined): boolean =>
  value !== null && value !== undefined && value !== '';

/**
 * Non-empty test on a single string field
 */
export const fieldFilled = <T>(accessor: (item: T) => string | null | undefined): Predicate<T> =>
  item => isFilled(accessor(item));
