import {
  Draft,
  Entity,
  Model,
  Query,
  Store,
  Supplier,
  conditionValues,
  fieldEntries,
  isPlainObject,
} from "@jquest/resources-core";
import mongoose from "mongoose";
import { config } from "./config";

type Document = Record<string, unknown>;

export const schemaDefinition = (model: Model): mongoose.SchemaDefinition =>
  Object.fromEntries(
    fieldEntries(model).map(([name, field]) => [
      name,
      { type: field.type, unique: field.unique ?? false },
    ])
  );

export const store = (model: Model): mongoose.Model<Document> =>
  mongoose.models[model.name] ??
  mongoose.model<Document>(
    model.name,
    new mongoose.Schema(schemaDefinition(model), { versionKey: false })
  );

/**
 * Translates a store query into a mongo filter. `id` is matched against
 * `_id`; ids that are not object ids match nothing.
 */
export const toMongoFilter = (query: Query): Document =>
  Object.fromEntries(
    Object.entries(query).map(([name, condition]) => {
      const values = conditionValues(condition);
      if (name !== "id") return [name, { $in: values }];

      return [
        "_id",
        {
          $in: values.filter(
            (value) => typeof value === "string" && mongoose.isValidObjectId(value)
          ),
        },
      ];
    })
  );

const toEntity = (doc: unknown): Entity | null => {
  if (!isPlainObject(doc)) return null;
  const { _id, ...attributes } = doc;
  return { ...attributes, id: String(_id) };
};

const adapter = (collection: mongoose.Model<Document>): Store => ({
  async findById(id) {
    if (!mongoose.isValidObjectId(id)) return null;
    const doc: unknown = await collection.findById(id).lean().exec();
    return toEntity(doc);
  },

  async filter(query) {
    const docs: unknown[] = await collection.find(toMongoFilter(query)).lean().exec();
    return docs.map(toEntity).filter((entity): entity is Entity => entity !== null);
  },

  async insert(draft: Draft) {
    const created = await collection.create(draft);
    const entity = toEntity(created.toObject());
    if (!entity) throw new Error(`Could not read back the created ${collection.modelName}`);
    return entity;
  },

  async save({ id, ...attributes }) {
    await collection.replaceOne({ _id: id }, attributes).exec();
  },

  async delete(id) {
    if (!mongoose.isValidObjectId(id)) return;
    await collection.deleteOne({ _id: id }).exec();
  },
});

export const mongoSupplier = () =>
  new Supplier({
    createStore(model) {
      return adapter(store(model));
    },
  });

const { user, password, name, host, port } = config.db;
export const uri = `mongodb://${user}:${password}@${host}:${port}/${name}`;

export const connect = async () => {
  return await mongoose.connect(uri);
};
