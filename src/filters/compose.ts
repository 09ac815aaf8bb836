import { FilterQuery } from "mongoose";
import { escapeRegex } from "../utils/text";

export type Predicate<T> = FilterQuery<T>;

/** Builds one predicate from a criteria object, or null when its criterion is absent. */
export type PredicateFactory<C, T> = (criteria: C) => Predicate<T> | null;

export const isPresent = <V>(value: V | null | undefined): value is V =>
  value !== undefined && value !== null && value !== "";

/**
 * AND of every non-null predicate. No predicates means no constraint;
 * the result does not depend on the order of the list.
 */
export const composePredicates = <T>(
  predicates: Array<Predicate<T> | null>
): Predicate<T> => {
  const clauses = predicates.filter(
    (predicate): predicate is Predicate<T> => predicate !== null
  );
  return clauses.length === 0 ? {} : { $and: clauses };
};

export const applyFactories = <C, T>(
  factories: Array<PredicateFactory<C, T>>,
  criteria: C
): Predicate<T> => composePredicates(factories.map((factory) => factory(criteria)));

// Case-insensitive substring match, value taken literally
export const containsText = (value: string) => ({
  $regex: escapeRegex(value),
  $options: "i",
});

// Case-sensitive literal prefix
export const startsWithText = (value: string) => ({
  $regex: `^${escapeRegex(value)}`,
});
