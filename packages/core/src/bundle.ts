import type { Client } from "./policy";
import { Entity } from "./types";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

/**
 * A request as the transport hands it to the dispatcher
 */
export interface RestRequest {
  readonly method: string;
  /** Path without the query string, e.g. `/api/v1/user/3/` */
  readonly path: string;
  /** Scheme and host the request was addressed to, e.g. `https://api.example.com` */
  readonly origin: string;
  readonly query: Readonly<Record<string, string>>;
  readonly headers: Readonly<Record<string, string | undefined>>;
  readonly body?: unknown;
}

export interface RestResponse {
  readonly status: number;
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: unknown;
}

/**
 * What the projection layer knows about the request it is serving
 */
export interface RequestContext {
  readonly method: HttpMethod;
  readonly path: string;
  readonly origin: string;
  readonly query: Readonly<Record<string, string>>;
  readonly body: unknown;
  readonly client: Client;
}

/**
 * Carries one object through dehydration. `data` is filled field by field,
 * so overrides can look at the values of fields dehydrated before them.
 */
export class Bundle {
  readonly data: Record<string, unknown> = {};

  constructor(readonly obj: Entity, readonly request: RequestContext) {}
}

const parseUri = (path: string, base: string) => {
  try {
    return new URL(path, base);
  } catch {
    return null;
  }
};

/**
 * Anchors a path at the origin of the request. Null when the path does not
 * resolve to a URL, e.g. `//`.
 */
export const buildAbsoluteUri = (request: RequestContext, path: string) =>
  parseUri(path, request.origin)?.href ?? null;

/**
 * Whether a path would resolve against any http origin
 */
export const isResolvablePath = (path: string) =>
  parseUri(path, "http://localhost") !== null;
