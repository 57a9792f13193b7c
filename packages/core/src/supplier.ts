import { Model } from "./model";
import { Draft, Entity, Scalar, Whenever } from "./types";

export type Condition = { $eq: Scalar } | { $in: readonly Scalar[] };

/**
 * Maps stored attribute names to conditions. A record matches when every
 * condition holds.
 */
export type Query = Readonly<Record<string, Condition>>;

export interface Store {
  /**
   * Searches for a record with the specified id. If no record exists, return
   * null.
   */
  findById(id: string): Whenever<Entity | null>;

  filter(query: Query): Whenever<Entity[]>;

  /**
   * Stores a new record and returns it with its assigned id. Throw if a
   * constraint is violated.
   */
  insert(draft: Draft): Whenever<Entity>;

  /**
   * Replaces the record with the same id. Throw an error if the update fails
   */
  save(entity: Entity): Whenever<void>;

  delete(id: string): Whenever<void>;
}

export interface StoreFactory {
  createStore(model: Model): Whenever<Store>;
}

export class Supplier {
  private stores: Record<string, Whenever<Store>> = {};

  constructor(private storeFactory: StoreFactory) {}

  store(model: Model): Whenever<Store> {
    return (this.stores[model.name] ??= this.storeFactory.createStore(model));
  }
}

/**
 * Values a condition accepts, in the order they were given
 */
export const conditionValues = (condition: Condition): readonly Scalar[] =>
  "$eq" in condition ? [condition.$eq] : condition.$in;

const sameValue = (a: unknown, b: unknown) =>
  a instanceof Date && b instanceof Date
    ? a.getTime() === b.getTime()
    : a === b;

export const matches = (value: unknown, condition: Condition) =>
  conditionValues(condition).some((expected) =>
    Array.isArray(value)
      ? value.some((item) => sameValue(item, expected))
      : sameValue(value, expected)
  );

/**
 * Combines two conditions on the same attribute; the result accepts only
 * values both accept.
 */
export const intersect = (a: Condition, b: Condition): Condition => {
  const accepted = conditionValues(b);
  return {
    $in: conditionValues(a).filter((value) =>
      accepted.some((other) => sameValue(value, other))
    ),
  };
};
