// Policies mediate how clients can access a resource.
//
// Every request is first authenticated: the resource's authentication
// turns the credentials on the request into a client, or refuses the
// request. The resource's authorization policy then decides, for the
// requested action and (where there is one) the target object, whether
// the client may go ahead.
//
// A policy answers with an access type rather than a boolean so that it
// can hide an object altogether: "never" is reported as a missing object,
// "deny" as a forbidden one.
//

import type { ModelResource } from "./resource";
import type { RestRequest } from "./bundle";
import { FORBIDDEN, NOT_FOUND, UNAUTHORIZED } from "./errors";
import { Entity, Whenever } from "./types";

export interface Client {
  id: string;
  username: string;
  isSuperuser: boolean;
  permissions: readonly string[];
}

export const ACCESS_NEVER = "never";
export const ACCESS_DENY = "deny";
export const ACCESS_ALLOW = "allow";
export type AccessType =
  | typeof ACCESS_NEVER
  | typeof ACCESS_DENY
  | typeof ACCESS_ALLOW;

export type Action = "read" | "create" | "update" | "delete";

export type Policy = (
  this: ModelResource,
  target: Entity | null,
  client: Client,
  action: Action
) => Whenever<AccessType>;

export const throwPolicy = (access: AccessType) => {
  if (access === ACCESS_NEVER) throw NOT_FOUND();
  if (access === ACCESS_DENY) throw FORBIDDEN();
};

/**
 * Can only be read/executed internally
 */
export const ALLOW_NONE: Policy = () => ACCESS_NEVER;

/**
 * Can be read/executed by anyone who authenticated
 */
export const ALLOW_ALL: Policy = () => ACCESS_ALLOW;

const PERMISSION_VERBS: Record<Exclude<Action, "read">, string> = {
  create: "add",
  update: "change",
  delete: "delete",
};

/**
 * Reads are open to authenticated clients. Writes need the model permission
 * for the action, e.g. `add_mission` to create a mission. Superusers hold
 * every permission.
 */
export function MODEL_PERMISSIONS(
  this: ModelResource,
  _target: Entity | null,
  client: Client,
  action: Action
): AccessType {
  if (action === "read" || client.isSuperuser) return ACCESS_ALLOW;
  const codename = `${PERMISSION_VERBS[action]}_${this.model.name.toLowerCase()}`;
  return client.permissions.includes(codename) ? ACCESS_ALLOW : ACCESS_DENY;
}

////////////////////
// AUTHENTICATION //
////////////////////

export interface Authentication {
  /**
   * Resolves the client making the request. Throws when the request does not
   * authenticate.
   */
  authenticate(request: RestRequest): Promise<Client>;
}

export type CredentialVerifier = (
  username: string,
  password: string
) => Whenever<Client | null>;

/**
 * Credentials are sent as `Authorization: Basic base64(username:password)`
 */
export class BasicAuthentication implements Authentication {
  private readonly realm: string;

  constructor(
    private readonly verify: CredentialVerifier,
    { realm = "jquest" }: { realm?: string } = {}
  ) {
    this.realm = realm;
  }

  async authenticate(request: RestRequest): Promise<Client> {
    const credentials = parseBasicCredentials(request.headers.authorization);
    if (!credentials) throw UNAUTHORIZED(this.realm);

    const client = await this.verify(credentials.username, credentials.password);
    if (!client) throw UNAUTHORIZED(this.realm);

    return client;
  }
}

export const parseBasicCredentials = (header: string | undefined) => {
  const match = header?.match(/^Basic\s+(\S+)$/i);
  if (!match) return null;

  const decoded = Buffer.from(match[1], "base64").toString("utf8");
  const separator = decoded.indexOf(":");
  if (separator < 0) return null;

  return {
    username: decoded.slice(0, separator),
    password: decoded.slice(separator + 1),
  };
};

/**
 * Lets every request through as the given client. Meant for internal use
 * and tests.
 */
export class TrustedAuthentication implements Authentication {
  constructor(private readonly client: Client) {}

  async authenticate(): Promise<Client> {
    return this.client;
  }
}
