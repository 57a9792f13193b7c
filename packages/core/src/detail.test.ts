import { describe, expect, it } from "vitest";
import { Bundle, RequestContext } from "./bundle";
import { AdditionalModelResource } from "./detail";
import { ToManyField, fields } from "./fields";
import { ModelResource } from "./resource";
import {
  Author,
  Book,
  SUPERUSER,
  authorResource,
  bookResource,
  libraryApi,
  request,
  testApi,
} from "./test-utils";

const context = (path: string): RequestContext => ({
  method: "GET",
  path,
  origin: "https://api.example.com",
  query: {},
  body: undefined,
  client: SUPERUSER,
});

const seed = async (api: ReturnType<typeof libraryApi>) => {
  const authors = await api.supplier.store(Author);
  const books = await api.supplier.store(Book);
  await authors.insert({ name: "Ada", bio: "", born: null });
  await books.insert({ title: "Notes", author: "1", tags: [] });
};

describe("detail requests", () => {
  it("include the additional fields", async () => {
    const api = libraryApi();
    await seed(api);

    const response = await api.dispatch(request("GET", "/api/v1/author/1/"));

    expect(response.body).toEqual({
      id: "1",
      name: "Ada",
      bio: "",
      born: null,
      resource_uri: "/api/v1/author/1/",
      books: ["/api/v1/book/1/"],
    });
  });

  it("are not made by listing a single object", async () => {
    const api = libraryApi();
    await seed(api);

    const response = await api.dispatch(request("GET", "/api/v1/author/"));

    expect(response.body).toEqual({
      meta: { limit: 20, next: null, offset: 0, previous: null, total_count: 1 },
      objects: [
        { id: "1", name: "Ada", bio: "", born: null, resource_uri: "/api/v1/author/1/" },
      ],
    });
  });

  it("are recognised by an exact path match", async () => {
    const api = libraryApi();
    await seed(api);
    const resource = api.resource("author");
    const obj = await resource.objGet("1");

    const detail = await resource.fullDehydrate(new Bundle(obj, context("/api/v1/author/1/")));
    const unslashed = await resource.fullDehydrate(new Bundle(obj, context("/api/v1/author/1")));

    expect(detail.data.books).toEqual(["/api/v1/book/1/"]);
    expect(unslashed.data).not.toHaveProperty("books");
  });

  it("run the overrides of additional fields", async () => {
    const resource = new AdditionalModelResource({
      resourceName: "author",
      model: Author,
      additionalDetailFields: {
        books: fields.toMany("book", { reverse: "author" }),
      },
      dehydrate: {
        books: ({ data }) => (Array.isArray(data.books) ? data.books.length : 0),
      },
    });
    const api = testApi([resource, bookResource()]);
    await seed(api);

    const response = await api.dispatch(request("GET", "/api/v1/author/1/"));

    expect(response.body).toMatchObject({ books: 1 });
  });

  it("embed full related objects without their own additional fields", async () => {
    const resource = new ModelResource({
      resourceName: "book",
      model: Book,
      include: ["title"],
      fields: { author: fields.toOne("author", { full: true }) },
    });
    const api = testApi([authorResource(), resource]);
    await seed(api);

    const response = await api.dispatch(request("GET", "/api/v1/book/1/"));

    expect(response.body).toMatchObject({ author: { name: "Ada" } });
    expect(response.body).not.toHaveProperty("author.books");
  });
});

describe("field construction", () => {
  it("publishes blank model attributes as blank", () => {
    const resource = authorResource();

    expect(resource.fields.get("bio")?.blank).toBe(true);
    expect(resource.fields.get("name")?.blank).toBe(false);
  });

  it("ignores the blank marker on plain resources", () => {
    const resource = new ModelResource({ resourceName: "author", model: Author });

    expect(resource.fields.get("bio")?.blank).toBe(false);
  });

  it("binds additional related fields when they are looked up", () => {
    const api = libraryApi();
    const field = api.resource("author").findField("books");

    expect(field).toBeInstanceOf(ToManyField);
    expect(field instanceof ToManyField && field.namespace).toEqual({
      api,
      resourceName: "author",
    });
  });

  it("marks additional fields in the schema", async () => {
    const api = libraryApi();

    const response = await api.dispatch(request("GET", "/api/v1/author/schema/"));

    expect(response.body).toMatchObject({
      fields: {
        bio: { blank: true },
        books: { type: "related", related_type: "to_many", detail_only: true },
      },
    });
  });
});
