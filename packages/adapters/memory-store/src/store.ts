import {
  Draft,
  Entity,
  Model,
  Query,
  Store,
  Supplier,
  fieldEntries,
  matches,
} from "@jquest/resources-core";
import { v4 as uuid } from "uuid";

/**
 * Keeps the records of one model in a map. Records are copied on the way in
 * and out, so callers never share a reference with the store.
 */
export const memoryStore = (model: Model): Store => {
  const records = new Map<string, Entity>();
  const uniqueFields = fieldEntries(model)
    .filter(([, field]) => field.unique)
    .map(([name]) => name);

  const checkUnique = (entity: Entity) => {
    for (const name of uniqueFields) {
      const value = entity[name];
      if (value === undefined || value === null) continue;

      for (const other of records.values()) {
        if (other.id !== entity.id && other[name] === value) {
          throw new Error(
            `A ${model.name} with ${name} '${String(value)}' already exists.`
          );
        }
      }
    }
  };

  return {
    findById(id: string) {
      const record = records.get(id);
      return record ? structuredClone(record) : null;
    },

    filter(query: Query) {
      const conditions = Object.entries(query);
      return [...records.values()]
        .filter((record) =>
          conditions.every(([name, condition]) => matches(record[name], condition))
        )
        .map((record) => structuredClone(record));
    },

    insert(draft: Draft) {
      const entity: Entity = { ...structuredClone(draft), id: uuid() };
      checkUnique(entity);
      records.set(entity.id, entity);
      return structuredClone(entity);
    },

    save(entity: Entity) {
      if (!records.has(entity.id)) {
        throw new Error(`No ${model.name} with id '${entity.id}' to save.`);
      }
      checkUnique(entity);
      records.set(entity.id, structuredClone(entity));
    },

    delete(id: string) {
      records.delete(id);
    },
  };
};

/**
 * A supplier whose stores live as long as the supplier itself
 */
export const memorySupplier = () =>
  new Supplier({ createStore: (model) => memoryStore(model) });
