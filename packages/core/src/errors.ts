/**
 * An error that maps onto an HTTP response. `code` is the status code the
 * dispatcher answers with.
 */
export class HTTPError extends Error {
  constructor(
    readonly code: number,
    message: string,
    readonly headers: Readonly<Record<string, string>> = {}
  ) {
    super(message);
    this.name = "HTTPError";
  }
}

/**
 * Raised while dehydrating a field, e.g. when a relationship cannot be
 * resolved or a non-nullable attribute is empty. Always fatal to the request.
 */
export class ApiFieldError extends HTTPError {
  constructor(message: string) {
    super(500, message);
    this.name = "ApiFieldError";
  }
}

export const BAD_REQUEST = (message = "Bad Request") =>
  new HTTPError(400, message);

export const UNAUTHORIZED = (realm: string, message = "Unauthorized") =>
  new HTTPError(401, message, { "WWW-Authenticate": `Basic realm="${realm}"` });

export const FORBIDDEN = (message = "Forbidden") => new HTTPError(403, message);

export const NOT_FOUND = (message = "Not Found") => new HTTPError(404, message);

export const METHOD_NOT_ALLOWED = (allowed: readonly string[]) =>
  new HTTPError(405, "Method Not Allowed", { Allow: allowed.join(", ") });
