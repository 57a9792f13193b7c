import { memoryStore, memorySupplier } from "@jquest/memory-store-adapter";
import {
  Draft,
  Model,
  ModelResource,
  RestRequest,
  Supplier,
  TrustedAuthentication,
} from "@jquest/resources-core";
import { describe, expect, it } from "vitest";
import { createApi } from "./api";
import { Instance, instanceResource } from "./resources/instance";
import { Mission } from "./resources/mission";
import { MissionRelationship } from "./resources/mission-relationship";
import { User, UserResource } from "./resources/user";
import { UserOauth } from "./resources/user-oauth";
import { UserProgression } from "./resources/user-progression";

const ORIGIN = "https://api.example.com";

const setup = () => {
  const supplier = memorySupplier();
  const api = createApi({
    supplier,
    authentication: new TrustedAuthentication({
      id: "root",
      username: "root",
      isSuperuser: true,
      permissions: [],
    }),
  });
  return { supplier, api };
};

const request = (method: string, url: string, body?: unknown): RestRequest => {
  const parsed = new URL(url, ORIGIN);
  return {
    method,
    path: parsed.pathname,
    origin: parsed.origin,
    query: Object.fromEntries(parsed.searchParams),
    headers: {},
    body,
  };
};

const account = (username: string) => ({
  username,
  first_name: "",
  last_name: "",
  email: "",
  password: "",
  is_active: true,
  is_staff: false,
  is_superuser: false,
  date_joined: new Date("2024-01-01T00:00:00.000Z"),
  last_login: null,
  user_permissions: [],
});

const insert = async (supplier: Supplier, model: Model, draft: Record<string, unknown>) =>
  (await supplier.store(model)).insert(draft);

const all = async (supplier: Supplier, model: Model) =>
  (await supplier.store(model)).filter({});

const seedCourse = async (supplier: Supplier) => {
  const instance = await insert(supplier, Instance, { slug: "intro", name: "Intro", host: "" });
  const mission = await insert(supplier, Mission, {
    name: "First steps",
    description: "",
    instance: instance.id,
    image: "/img/x.png",
  });
  return { instance, mission };
};

describe("user", () => {
  it("adds progressions to the detail projection only", async () => {
    const { supplier, api } = setup();
    const user = await insert(supplier, User, account("ada"));
    const { mission } = await seedCourse(supplier);
    const progression = await insert(supplier, UserProgression, {
      user: user.id,
      mission: mission.id,
      state: "accepted",
    });

    const detail = await api.dispatch(request("GET", `/api/v1/user/${user.id}/`));
    const list = await api.dispatch(request("GET", "/api/v1/user/"));

    expect(detail.body).toEqual({
      id: user.id,
      username: "ada",
      first_name: "",
      last_name: "",
      is_active: true,
      is_staff: false,
      is_superuser: false,
      date_joined: "2024-01-01T00:00:00.000Z",
      resource_uri: `/api/v1/user/${user.id}/`,
      progressions: [
        {
          id: progression.id,
          state: "Accepted",
          user: `/api/v1/user/${user.id}/`,
          mission: `/api/v1/mission/${mission.id}/`,
          resource_uri: `/api/v1/user_progression/${progression.id}/`,
        },
      ],
    });
    expect(list.body).toMatchObject({ meta: { total_count: 1 } });
    expect(list.body).not.toHaveProperty("objects.0.progressions");
  });

  it("creates one oauth link per entry of a list", async () => {
    const { supplier, api } = setup();

    const response = await api.dispatch(
      request("POST", "/api/v1/user/", {
        username: "ada",
        oauths: [
          { consumer: "a", consumer_user_id: "1" },
          { consumer: "b", consumer_user_id: "2" },
        ],
      })
    );

    const [user] = await all(supplier, User);
    const oauths = await all(supplier, UserOauth);
    expect(response.status).toBe(201);
    expect(response.headers).toEqual({
      Location: `${ORIGIN}/api/v1/user/${user.id}/`,
    });
    expect(response.body).toMatchObject({ id: user.id, username: "ada" });
    expect(response.body).not.toHaveProperty("progressions");
    expect(oauths).toEqual([
      { id: oauths[0].id, consumer: "a", consumer_user_id: "1", user: user.id },
      { id: oauths[1].id, consumer: "b", consumer_user_id: "2", user: user.id },
    ]);
  });

  it("creates a single oauth link from a mapping", async () => {
    const { supplier, api } = setup();

    const response = await api.dispatch(
      request("POST", "/api/v1/user/", {
        username: "ada",
        oauths: { consumer: "a", consumer_user_id: "1" },
      })
    );

    const [user] = await all(supplier, User);
    expect(response.status).toBe(201);
    expect(await all(supplier, UserOauth)).toEqual([
      expect.objectContaining({ consumer: "a", consumer_user_id: "1", user: user.id }),
    ]);
  });

  it("refuses malformed oauths before writing the account", async () => {
    const { supplier, api } = setup();

    const scalar = await api.dispatch(
      request("POST", "/api/v1/user/", { username: "ada", oauths: "github" })
    );
    const partial = await api.dispatch(
      request("POST", "/api/v1/user/", { username: "ada", oauths: [{ consumer: "a" }] })
    );

    expect(scalar).toEqual({
      status: 400,
      headers: {},
      body: { error: "The 'oauths' field must be a list or a single object." },
    });
    expect(partial.body).toEqual({
      error: "Each entry of 'oauths' needs a 'consumer' and a 'consumer_user_id'.",
    });
    expect(await all(supplier, User)).toEqual([]);
    expect(await all(supplier, UserOauth)).toEqual([]);
  });

  it("deletes the account when one of its oauth links cannot be stored", async () => {
    const supplier = new Supplier({
      createStore(model) {
        const store = memoryStore(model);
        if (model.name !== UserOauth.name) return store;

        let inserts = 0;
        return {
          ...store,
          insert(draft: Draft) {
            inserts += 1;
            if (inserts > 1) throw new Error("oauth store unavailable");
            return store.insert(draft);
          },
        };
      },
    });
    const api = createApi({
      supplier,
      authentication: new TrustedAuthentication({
        id: "root",
        username: "root",
        isSuperuser: true,
        permissions: [],
      }),
    });

    await expect(
      api.dispatch(
        request("POST", "/api/v1/user/", {
          username: "ada",
          oauths: [
            { consumer: "a", consumer_user_id: "1" },
            { consumer: "b", consumer_user_id: "2" },
          ],
        })
      )
    ).rejects.toThrow("oauth store unavailable");

    expect(await all(supplier, User)).toEqual([]);
    expect(await all(supplier, UserOauth)).toEqual([]);
  });

  it("fills the fields the account may leave blank", async () => {
    const { supplier, api } = setup();

    await api.dispatch(request("POST", "/api/v1/user/", { username: "ada" }));

    const [user] = await all(supplier, User);
    expect(user).toMatchObject({
      username: "ada",
      first_name: "",
      last_name: "",
      is_active: true,
      is_staff: false,
      is_superuser: false,
    });
    expect(user.date_joined).toBeInstanceOf(Date);
  });

  it("publishes blank attributes as blank", () => {
    const resource = new UserResource();
    const plain = new ModelResource({ resourceName: "user", model: User });

    expect(resource.fields.get("first_name")?.blank).toBe(true);
    expect(resource.fields.get("username")?.blank).toBe(false);
    expect(plain.fields.get("first_name")?.blank).toBe(false);
    expect(instanceResource().fields.get("host")?.blank).toBe(true);
  });
});

describe("user_progression", () => {
  it("translates unknown state codes to null", async () => {
    const { supplier, api } = setup();
    const user = await insert(supplier, User, account("ada"));
    const { mission } = await seedCourse(supplier);
    const progression = await insert(supplier, UserProgression, {
      user: user.id,
      mission: mission.id,
      state: "archived",
    });

    const response = await api.dispatch(
      request("GET", `/api/v1/user_progression/${progression.id}/`)
    );

    expect(response.body).toMatchObject({ state: null });
  });

  it("refuses states outside the enumeration", async () => {
    const { supplier, api } = setup();
    const user = await insert(supplier, User, account("ada"));
    const { mission } = await seedCourse(supplier);

    const response = await api.dispatch(
      request("POST", "/api/v1/user_progression/", {
        user: `/api/v1/user/${user.id}/`,
        mission: `/api/v1/mission/${mission.id}/`,
        state: "archived",
      })
    );

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: "'archived' is not a valid choice for the 'state' field.",
    });
  });

  it("defaults new progressions to pending", async () => {
    const { supplier, api } = setup();
    const user = await insert(supplier, User, account("ada"));
    const { mission } = await seedCourse(supplier);

    const response = await api.dispatch(
      request("POST", "/api/v1/user_progression/", {
        user: user.id,
        mission: `/api/v1/mission/${mission.id}/`,
      })
    );

    expect(response.status).toBe(201);
    expect(response.body).toMatchObject({
      state: "Pending",
      user: `/api/v1/user/${user.id}/`,
      mission: `/api/v1/mission/${mission.id}/`,
    });
  });
});

describe("mission", () => {
  it("anchors images at the request origin", async () => {
    const { supplier, api } = setup();
    const { mission } = await seedCourse(supplier);

    const response = await api.dispatch(request("GET", `/api/v1/mission/${mission.id}/`));

    expect(response.body).toMatchObject({ image: "https://api.example.com/img/x.png" });
  });

  it("accepts absolute image URLs", async () => {
    const { supplier, api } = setup();
    const { instance } = await seedCourse(supplier);

    const response = await api.dispatch(
      request("POST", "/api/v1/mission/", {
        name: "Hosted",
        instance: `/api/v1/instance/${instance.id}/`,
        image: "https://cdn.example.com/a.png",
      })
    );

    expect(response.status).toBe(201);
    expect(response.body).toMatchObject({ image: "https://cdn.example.com/a.png" });
  });

  it("refuses image paths that do not resolve to a URL", async () => {
    const { supplier, api } = setup();
    const { instance } = await seedCourse(supplier);

    const response = await api.dispatch(
      request("POST", "/api/v1/mission/", {
        name: "Broken",
        instance: `/api/v1/instance/${instance.id}/`,
        image: "//",
      })
    );

    expect(response).toEqual({
      status: 400,
      headers: {},
      body: { error: "The 'image' field needs a path or URL, not '//'." },
    });
    expect(await all(supplier, Mission)).toHaveLength(1);
  });

  it("publishes stored images that do not resolve as null", async () => {
    const { supplier, api } = setup();
    const { instance, mission } = await seedCourse(supplier);
    const broken = await insert(supplier, Mission, {
      name: "Broken",
      description: "",
      instance: instance.id,
      image: "//",
    });

    const response = await api.dispatch(request("GET", "/api/v1/mission/"));

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      objects: [
        { id: mission.id, image: "https://api.example.com/img/x.png" },
        { id: broken.id, image: null },
      ],
    });
  });

  it("yields null without an image", async () => {
    const { supplier, api } = setup();
    const { instance } = await seedCourse(supplier);
    const plain = await insert(supplier, Mission, {
      name: "Plain",
      description: "",
      instance: instance.id,
      image: null,
    });

    const response = await api.dispatch(request("GET", `/api/v1/mission/${plain.id}/`));

    expect(response.body).toMatchObject({ image: null });
  });

  it("embeds its relationships", async () => {
    const { supplier, api } = setup();
    const { instance, mission } = await seedCourse(supplier);
    const next = await insert(supplier, Mission, {
      name: "Next steps",
      description: "",
      instance: instance.id,
      image: null,
    });
    const edge = await insert(supplier, MissionRelationship, {
      parent: mission.id,
      mission: next.id,
    });

    const response = await api.dispatch(request("GET", `/api/v1/mission/${next.id}/`));

    expect(response.body).toEqual({
      id: next.id,
      name: "Next steps",
      description: "",
      image: null,
      instance: `/api/v1/instance/${instance.id}/`,
      relationships: [
        {
          id: edge.id,
          parent: `/api/v1/mission/${mission.id}/`,
          mission: `/api/v1/mission/${next.id}/`,
          resource_uri: `/api/v1/mission_relationship/${edge.id}/`,
        },
      ],
      resource_uri: `/api/v1/mission/${next.id}/`,
    });
  });
});

describe("instance", () => {
  it("lists its missions on detail requests", async () => {
    const { supplier, api } = setup();
    const { instance, mission } = await seedCourse(supplier);

    const response = await api.dispatch(request("GET", `/api/v1/instance/${instance.id}/`));

    expect(response.body).toMatchObject({
      slug: "intro",
      missions: [{ id: mission.id, name: "First steps" }],
    });
  });

  it("filters by the id of its missions", async () => {
    const { supplier, api } = setup();
    await seedCourse(supplier);
    const other = await insert(supplier, Instance, { slug: "advanced", name: "Advanced", host: "" });
    const mission = await insert(supplier, Mission, {
      name: "Recursion",
      description: "",
      instance: other.id,
      image: null,
    });

    const response = await api.dispatch(
      request("GET", `/api/v1/instance/?missions__id=${mission.id}`)
    );

    expect(response.body).toMatchObject({
      meta: { total_count: 1 },
      objects: [{ id: other.id, slug: "advanced" }],
    });
  });
});

describe("user_oauth", () => {
  it("matches no account for a URI with malformed percent-encoding", async () => {
    const { supplier, api } = setup();
    const ada = await insert(supplier, User, account("ada"));
    await insert(supplier, UserOauth, { consumer: "github", consumer_user_id: "1", user: ada.id });

    const response = await api.dispatch(
      request("GET", "/api/v1/user_oauth/?user=/api/v1/user/%25E0/")
    );

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({ meta: { total_count: 0 }, objects: [] });
  });

  it("embeds its account and filters through it", async () => {
    const { supplier, api } = setup();
    const ada = await insert(supplier, User, account("ada"));
    const grace = await insert(supplier, User, account("grace"));
    await insert(supplier, UserOauth, { consumer: "github", consumer_user_id: "1", user: ada.id });
    await insert(supplier, UserOauth, { consumer: "github", consumer_user_id: "2", user: grace.id });

    const response = await api.dispatch(
      request("GET", "/api/v1/user_oauth/?user__username=grace")
    );

    expect(response.body).toMatchObject({
      meta: { total_count: 1 },
      objects: [
        {
          consumer_user_id: "2",
          user: { id: grace.id, username: "grace", resource_uri: `/api/v1/user/${grace.id}/` },
        },
      ],
    });
  });
});
