import { RestRequest, RestResponse } from "./bundle";
import { HTTPError, METHOD_NOT_ALLOWED, NOT_FOUND } from "./errors";
import { Authentication, MODEL_PERMISSIONS, Policy } from "./policy";
import type { ModelResource } from "./resource";
import { Supplier } from "./supplier";
import { decodeComponent } from "./types";

export interface ApiOptions {
  apiName: string;
  /**
   * Path the api is mounted under. Defaults to `/api`.
   */
  basePath?: string;
  supplier: Supplier;
  /**
   * Used by every resource that does not declare its own
   */
  authentication: Authentication;
  authorization?: Policy;
}

/**
 * Registry of the resources published under one api name, e.g. `v1`.
 * Related fields resolve their target resources here.
 */
export class Api {
  readonly apiName: string;
  readonly basePath: string;
  readonly supplier: Supplier;
  readonly authentication: Authentication;
  readonly authorization: Policy;

  private readonly resources = new Map<string, ModelResource>();

  constructor(options: ApiOptions) {
    this.apiName = options.apiName;
    this.basePath = (options.basePath ?? "/api").replace(/\/+$/, "");
    this.supplier = options.supplier;
    this.authentication = options.authentication;
    this.authorization = options.authorization ?? MODEL_PERMISSIONS;
  }

  get urlPrefix() {
    return `${this.basePath}/${this.apiName}`;
  }

  register(resource: ModelResource) {
    if (this.resources.has(resource.resourceName)) {
      throw new Error(
        `A resource named '${resource.resourceName}' is already registered in api '${this.apiName}'.`
      );
    }
    this.resources.set(resource.resourceName, resource);
    resource.attach(this);
    return this;
  }

  find(resourceName: string) {
    return this.resources.get(resourceName);
  }

  resource(resourceName: string) {
    const resource = this.find(resourceName);
    if (!resource) throw NOT_FOUND(`No resource named '${resourceName}'.`);
    return resource;
  }

  /**
   * Describes every registered resource
   */
  topLevel() {
    return Object.fromEntries(
      [...this.resources].map(([name, resource]) => [
        name,
        {
          list_endpoint: resource.getResourceListUri(),
          schema: resource.getSchemaUri(),
        },
      ])
    );
  }

  /**
   * Routes a request to the resource it addresses. Errors that map onto a
   * status code are answered; anything else is left to the transport.
   */
  async dispatch(request: RestRequest): Promise<RestResponse> {
    try {
      return await this.route(request);
    } catch (error) {
      if (!(error instanceof HTTPError)) throw error;
      return {
        status: error.code,
        headers: error.headers,
        body: { error: error.message },
      };
    }
  }

  private async route(request: RestRequest): Promise<RestResponse> {
    const { path } = request;
    const prefix = this.urlPrefix;
    if (path !== prefix && !path.startsWith(`${prefix}/`)) throw NOT_FOUND();

    if (!path.endsWith("/")) {
      const search = new URLSearchParams(request.query).toString();
      return {
        status: 308,
        headers: { Location: `${path}/${search ? `?${search}` : ""}` },
      };
    }

    const segments = path.slice(prefix.length).split("/").filter(Boolean);
    if (segments.length === 0) {
      if (request.method.toUpperCase() !== "GET") throw METHOD_NOT_ALLOWED(["GET"]);
      return { status: 200, body: this.topLevel() };
    }

    const [name, id] = segments.map(decodeComponent);
    if (name === null || id === null) throw NOT_FOUND();
    const resource = this.resource(name);

    if (segments.length === 1) return resource.dispatch("list", request);
    if (segments.length === 2 && id === "schema") {
      return resource.dispatch("schema", request);
    }
    if (segments.length === 2) return resource.dispatch("detail", request, id);

    throw NOT_FOUND();
  }
}
