// Resources publish stored records over the api.
//
// A resource is built from a model: every attribute of the model's schema
// becomes a field of the resource unless the resource leaves it out, and
// the resource may declare further fields of its own (relationships,
// computed values) or override how a field is projected.
//
// Reading a record runs it through the projection: each field is
// dehydrated in declaration order into the bundle's data, the field's
// override (if any) replaces the value, and the final `dehydrate` hook
// sees the whole bundle. Writing runs the other way: each writable field
// hydrates its value from the payload into a draft the store persists.
//
// Access is mediated by the resource's authentication, which identifies
// the client, and its authorization policy (see ./policy.ts).
//

import type { Api } from "./api";
import type { Namespace } from "./fields";
import {
  Bundle,
  HttpMethod,
  RequestContext,
  RestRequest,
  RestResponse,
  buildAbsoluteUri,
} from "./bundle";
import {
  BAD_REQUEST,
  HTTPError,
  METHOD_NOT_ALLOWED,
  NOT_FOUND,
} from "./errors";
import { ApiField, AttributeField, RelatedField } from "./fields";
import { Filtering, buildQuery } from "./filtering";
import { Model, ModelField, fieldEntries } from "./model";
import {
  ACCESS_ALLOW,
  Action,
  Authentication,
  Client,
  Policy,
  throwPolicy,
} from "./policy";
import { Store } from "./supplier";
import { Draft, Entity, Whenever, decodeComponent, isPlainObject } from "./types";

/**
 * Replaces the dehydrated value of a single field
 */
export type Dehydrator = (bundle: Bundle) => Whenever<unknown>;

export interface ResourceOptions {
  resourceName: string;
  model: Model;

  /**
   * Fields declared on top of (or in place of) the ones built from the model
   */
  fields?: Readonly<Record<string, ApiField>>;

  /**
   * When given, only these model attributes become fields
   */
  include?: readonly string[];
  excludes?: readonly string[];

  filtering?: Filtering;
  dehydrate?: Readonly<Partial<Record<string, Dehydrator>>>;

  /**
   * Answer writes with the projection of the written object
   */
  alwaysReturnData?: boolean;

  /**
   * Falls back to the api's authentication
   */
  authentication?: Authentication;

  /**
   * Falls back to the api's authorization
   */
  authorization?: Policy;

  limit?: number;
  maxLimit?: number;
  listAllowedMethods?: readonly HttpMethod[];
  detailAllowedMethods?: readonly HttpMethod[];
}

export type Endpoint = "list" | "detail" | "schema";

const HTTP_METHODS: readonly string[] = ["GET", "POST", "PUT", "PATCH", "DELETE"];

const isHttpMethod = (method: string): method is HttpMethod =>
  HTTP_METHODS.includes(method);

export class ModelResource {
  readonly resourceName: string;
  readonly model: Model;
  readonly fields: ReadonlyMap<string, ApiField>;
  readonly filtering: Filtering;
  readonly alwaysReturnData: boolean;
  readonly limit: number;
  readonly maxLimit: number;
  readonly listAllowedMethods: readonly HttpMethod[];
  readonly detailAllowedMethods: readonly HttpMethod[];

  protected readonly dehydrators: Readonly<Partial<Record<string, Dehydrator>>>;

  private attachment: { api: Api; store: Whenever<Store> } | null = null;

  constructor(protected readonly options: ResourceOptions) {
    this.resourceName = options.resourceName;
    this.model = options.model;
    this.filtering = options.filtering ?? {};
    this.dehydrators = options.dehydrate ?? {};
    this.alwaysReturnData = options.alwaysReturnData ?? false;
    this.limit = options.limit ?? 20;
    this.maxLimit = options.maxLimit ?? 1000;
    this.listAllowedMethods = options.listAllowedMethods ?? ["GET", "POST"];
    this.detailAllowedMethods = options.detailAllowedMethods ?? [
      "GET",
      "PUT",
      "PATCH",
      "DELETE",
    ];

    this.fields = this.buildFields();
  }

  ////////////////////////
  // FIELD CONSTRUCTION //
  ////////////////////////

  private buildFields() {
    const fields = new Map<string, ApiField>();

    fields.set("id", new AttributeField(String, { readonly: true, unique: true }));

    for (const [name, field] of fieldEntries(this.model)) {
      if (this.skipModelField(name, field)) continue;
      fields.set(name, AttributeField.fromModelField(field));
    }

    for (const [name, field] of Object.entries(this.options.fields ?? {})) {
      if (this.options.excludes?.includes(name)) continue;
      fields.set(name, field);
    }

    fields.set(
      "resource_uri",
      new AttributeField(String, {
        attribute: (bundle) => this.getResourceUri(bundle.obj),
        readonly: true,
      })
    );

    for (const [name, field] of fields) field.contribute(name);
    this.postProcessFields(fields);

    return fields;
  }

  private skipModelField(name: string, field: ModelField) {
    const { include, excludes } = this.options;
    if (include && !include.includes(name)) return true;
    if (excludes?.includes(name)) return true;

    // Relationships are only published through declared related fields
    return field.references !== undefined;
  }

  /**
   * Runs once the fields are constructed, before the resource is used
   */
  protected postProcessFields(_fields: Map<string, ApiField>): void {}

  /**
   * Looks up a field by name, e.g. to resolve a filter
   */
  findField(name: string): ApiField | undefined {
    return this.fields.get(name);
  }

  ///////////////
  // ATTACHING //
  ///////////////

  /** @internal */
  attach(api: Api) {
    this.attachment = { api, store: api.supplier.store(this.model) };

    const namespace = this.namespace;
    for (const field of this.fields.values()) {
      if (field instanceof RelatedField) field.bind(namespace);
    }
  }

  get api(): Api {
    return this.attached.api;
  }

  get namespace(): Namespace {
    return { api: this.api, resourceName: this.resourceName };
  }

  get store(): Promise<Store> {
    return Promise.resolve(this.attached.store);
  }

  get authentication(): Authentication {
    return this.options.authentication ?? this.api.authentication;
  }

  get authorization(): Policy {
    return this.options.authorization ?? this.api.authorization;
  }

  private get attached() {
    if (!this.attachment) {
      throw new HTTPError(
        500,
        `The '${this.resourceName}' resource is not registered with an api.`
      );
    }
    return this.attachment;
  }

  //////////
  // URIS //
  //////////

  getResourceListUri() {
    return `${this.api.urlPrefix}/${this.resourceName}/`;
  }

  getResourceUri(obj: Entity) {
    return `${this.getResourceListUri()}${encodeURIComponent(obj.id)}/`;
  }

  getSchemaUri() {
    return `${this.getResourceListUri()}schema/`;
  }

  /**
   * Extracts an object id from a resource URI (relative or absolute), a bare
   * id, or an object carrying either
   */
  idFromValue(value: unknown): string | null {
    if (typeof value === "number") return String(value);
    if (isPlainObject(value)) {
      if (typeof value.resource_uri === "string") return this.idFromValue(value.resource_uri);
      if (typeof value.id === "string" || typeof value.id === "number") {
        return String(value.id);
      }
      return null;
    }
    if (typeof value !== "string" || value === "") return null;
    if (!value.includes("/")) return value;

    let path = value;
    if (/^[a-z][a-z\d+.-]*:\/\//i.test(value)) {
      try {
        path = new URL(value).pathname;
      } catch {
        return null;
      }
    }

    const prefix = this.getResourceListUri();
    if (!path.startsWith(prefix)) return null;

    const match = path.slice(prefix.length).match(/^([^/]+)\/?$/);
    return match ? decodeComponent(match[1]) : null;
  }

  ////////////////
  // PROJECTION //
  ////////////////

  /**
   * Dehydrates every field into `bundle.data`, then runs the `dehydrate` hook
   */
  async fullDehydrate(bundle: Bundle): Promise<Bundle> {
    for (const [name, field] of this.fields) {
      await this.dehydrateField(bundle, name, field);
    }
    return this.dehydrate(bundle);
  }

  protected async dehydrateField(bundle: Bundle, name: string, field: ApiField) {
    bundle.data[name] = await field.dehydrate(bundle);

    const override = this.dehydrators[name];
    if (override) bundle.data[name] = await override(bundle);
  }

  /**
   * Last pass over a projected object
   */
  protected async dehydrate(bundle: Bundle): Promise<Bundle> {
    return bundle;
  }

  /**
   * Builds a storable draft from a write payload. A partial hydration only
   * touches the fields present in the payload.
   */
  async hydrate(data: unknown, { partial = false } = {}): Promise<Draft> {
    if (!isPlainObject(data)) {
      throw BAD_REQUEST("The request body must be a JSON object.");
    }

    const draft: Draft = {};
    for (const [name, field] of this.fields) {
      const attribute = field.attributeName;
      if (field.readonly || attribute === null) continue;

      if (!(name in data)) {
        if (partial) continue;

        const missing = field.missing();
        if (!missing) {
          throw BAD_REQUEST(
            `The '${name}' field has no data and doesn't allow a default or null value.`
          );
        }
        if (missing.value !== undefined) draft[attribute] = missing.value;
        continue;
      }

      draft[attribute] = await field.hydrate(data[name]);
    }

    return draft;
  }

  ////////////////
  // OPERATIONS //
  ////////////////

  async objGet(id: string): Promise<Entity> {
    const obj = await (await this.store).findById(id);
    if (!obj) throw NOT_FOUND(`No ${this.resourceName} matches the given id.`);
    return obj;
  }

  async objCreate(data: unknown, request: RequestContext): Promise<Bundle> {
    const draft = await this.hydrate(data);
    const obj = await (await this.store).insert(draft);
    return new Bundle(obj, request);
  }

  async objUpdate(
    obj: Entity,
    data: unknown,
    request: RequestContext,
    { partial = false } = {}
  ): Promise<Bundle> {
    const draft = await this.hydrate(data, { partial });
    const updated: Entity = { ...obj, ...draft, id: obj.id };
    await (await this.store).save(updated);
    return new Bundle(updated, request);
  }

  async objDelete(obj: Entity): Promise<void> {
    await (await this.store).delete(obj.id);
  }

  protected async authorize(action: Action, target: Entity | null, client: Client) {
    throwPolicy(await this.authorization.call(this, target, client, action));
  }

  ///////////////
  // ENDPOINTS //
  ///////////////

  /**
   * Answers a request routed to one of the resource's endpoints. `id` is
   * given for detail requests.
   */
  async dispatch(
    endpoint: Endpoint,
    request: RestRequest,
    id?: string
  ): Promise<RestResponse> {
    const method = request.method.toUpperCase();
    const allowed: readonly HttpMethod[] =
      endpoint === "list"
        ? this.listAllowedMethods
        : endpoint === "detail"
        ? this.detailAllowedMethods
        : ["GET"];
    if (!isHttpMethod(method) || !allowed.includes(method)) {
      throw METHOD_NOT_ALLOWED(allowed);
    }

    const client = await this.authentication.authenticate(request);
    const context: RequestContext = {
      method,
      path: request.path,
      origin: request.origin,
      query: request.query,
      body: request.body,
      client,
    };

    if (endpoint === "schema") return { status: 200, body: this.buildSchema() };
    if (endpoint === "list") {
      if (method === "POST") return this.postList(context);
      return this.getList(context);
    }

    if (id === undefined) throw NOT_FOUND();
    switch (method) {
      case "GET":
        return this.getDetail(context, id);
      case "PUT":
        return this.putDetail(context, id);
      case "PATCH":
        return this.patchDetail(context, id);
      case "DELETE":
        return this.deleteDetail(context, id);
      default:
        throw METHOD_NOT_ALLOWED(allowed);
    }
  }

  async getList(request: RequestContext): Promise<RestResponse> {
    const query = await buildQuery(this, request.query);
    const candidates = await (await this.store).filter(query);

    const objects: Entity[] = [];
    for (const obj of candidates) {
      const access = await this.authorization.call(this, obj, request.client, "read");
      if (access === ACCESS_ALLOW) objects.push(obj);
    }

    const { limit, offset } = this.pagination(request.query);
    const page = objects.slice(offset, offset + limit);

    const data: unknown[] = [];
    for (const obj of page) {
      data.push((await this.fullDehydrate(new Bundle(obj, request))).data);
    }

    const pageUri = (pageOffset: number) =>
      `${request.path}?${new URLSearchParams({
        ...request.query,
        limit: String(limit),
        offset: String(pageOffset),
      })}`;

    return {
      status: 200,
      body: {
        meta: {
          limit,
          next: offset + limit < objects.length ? pageUri(offset + limit) : null,
          offset,
          previous: offset > 0 ? pageUri(Math.max(offset - limit, 0)) : null,
          total_count: objects.length,
        },
        objects: data,
      },
    };
  }

  async getDetail(request: RequestContext, id: string): Promise<RestResponse> {
    const obj = await this.objGet(id);
    await this.authorize("read", obj, request.client);

    const bundle = await this.fullDehydrate(new Bundle(obj, request));
    return { status: 200, body: bundle.data };
  }

  async postList(request: RequestContext): Promise<RestResponse> {
    await this.authorize("create", null, request.client);

    const bundle = await this.objCreate(request.body, request);
    const uri = this.getResourceUri(bundle.obj);
    const headers = {
      Location: buildAbsoluteUri(request, uri) ?? uri,
    };

    if (!this.alwaysReturnData) return { status: 201, headers };
    return { status: 201, headers, body: (await this.fullDehydrate(bundle)).data };
  }

  async putDetail(request: RequestContext, id: string): Promise<RestResponse> {
    const obj = await this.objGet(id);
    await this.authorize("update", obj, request.client);

    const bundle = await this.objUpdate(obj, request.body, request);
    if (!this.alwaysReturnData) return { status: 204 };
    return { status: 202, body: (await this.fullDehydrate(bundle)).data };
  }

  async patchDetail(request: RequestContext, id: string): Promise<RestResponse> {
    const obj = await this.objGet(id);
    await this.authorize("update", obj, request.client);

    const bundle = await this.objUpdate(obj, request.body, request, { partial: true });
    if (!this.alwaysReturnData) return { status: 202 };
    return { status: 202, body: (await this.fullDehydrate(bundle)).data };
  }

  async deleteDetail(request: RequestContext, id: string): Promise<RestResponse> {
    const obj = await this.objGet(id);
    await this.authorize("delete", obj, request.client);

    await this.objDelete(obj);
    return { status: 204 };
  }

  buildSchema() {
    return {
      allowed_detail_http_methods: this.detailAllowedMethods.map((m) => m.toLowerCase()),
      allowed_list_http_methods: this.listAllowedMethods.map((m) => m.toLowerCase()),
      default_format: "application/json",
      default_limit: this.limit,
      fields: Object.fromEntries(
        [...this.fields].map(([name, field]) => [name, field.describe()])
      ),
      filtering: { ...this.filtering },
    };
  }

  private pagination(query: Readonly<Record<string, string>>) {
    const limit = parseCount(query.limit, "limit") ?? this.limit;
    const offset = parseCount(query.offset, "offset") ?? 0;
    return {
      limit: limit === 0 ? this.maxLimit : Math.min(limit, this.maxLimit),
      offset,
    };
  }
}

const parseCount = (value: string | undefined, name: string) => {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) {
    throw BAD_REQUEST(`Invalid ${name} '${value}' provided. Please provide a non-negative integer.`);
  }
  return Number(value);
};

