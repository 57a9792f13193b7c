import { Api, ApiOptions } from "./api";
import type { RestRequest } from "./bundle";
import { AdditionalModelResource } from "./detail";
import { fields } from "./fields";
import { ALL, ALL_WITH_RELATIONS } from "./filtering";
import { Model } from "./model";
import { Client, TrustedAuthentication } from "./policy";
import { ModelResource } from "./resource";
import { Store, Supplier, matches } from "./supplier";
import { Entity } from "./types";

export const SUPERUSER: Client = {
  id: "1",
  username: "admin",
  isSuperuser: true,
  permissions: [],
};

/**
 * Store with sequential ids, starting at "1"
 */
export const mapStore = (): Store => {
  const records = new Map<string, Entity>();
  let next = 1;

  return {
    findById: (id) => records.get(id) ?? null,
    filter: (query) =>
      [...records.values()].filter((record) =>
        Object.entries(query).every(([name, condition]) =>
          matches(record[name], condition)
        )
      ),
    insert: (draft) => {
      const entity = { ...draft, id: String(next++) };
      records.set(entity.id, entity);
      return entity;
    },
    save: (entity) => {
      records.set(entity.id, entity);
    },
    delete: (id) => {
      records.delete(id);
    },
  };
};

export const testApi = (
  resources: ModelResource[],
  options: Partial<ApiOptions> = {}
) => {
  const api = new Api({
    apiName: "v1",
    supplier: new Supplier({ createStore: mapStore }),
    authentication: new TrustedAuthentication(SUPERUSER),
    ...options,
  });
  for (const resource of resources) api.register(resource);
  return api;
};

export const request = (
  method: string,
  url: string,
  { body, headers = {} }: { body?: unknown; headers?: Record<string, string> } = {}
): RestRequest => {
  const parsed = new URL(url, "https://api.example.com");
  return {
    method,
    path: parsed.pathname,
    origin: parsed.origin,
    query: Object.fromEntries(parsed.searchParams),
    headers,
    body,
  };
};

////////////
// MODELS //
////////////

export const Author: Model = {
  name: "Author",
  fields: {
    name: { type: String },
    bio: { type: String, blank: true },
    born: { type: Date, null: true },
  },
};

export const Book: Model = {
  name: "Book",
  fields: {
    title: { type: String },
    author: { type: String, references: "Author" },
    tags: { type: Array, blank: true },
    published: { type: Boolean, default: false },
    pages: { type: Number, null: true },
  },
};

export const authorResource = () =>
  new AdditionalModelResource({
    resourceName: "author",
    model: Author,
    additionalDetailFields: {
      books: fields.toMany("book", { reverse: "author", null: true }),
    },
    filtering: {
      name: ALL,
      born: ALL,
      books: ALL_WITH_RELATIONS,
    },
  });

export const bookResource = () =>
  new ModelResource({
    resourceName: "book",
    model: Book,
    fields: {
      author: fields.toOne("author"),
    },
    filtering: {
      title: ALL,
      tags: ALL,
      published: ALL,
      author: ALL_WITH_RELATIONS,
      resource_uri: ALL,
    },
  });

export const libraryApi = (options: Partial<ApiOptions> = {}) =>
  testApi([authorResource(), bookResource()], options);
