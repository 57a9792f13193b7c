import { Api, RestRequest, RestResponse } from "@jquest/resources-core";
import asyncHandler from "express-async-handler";
import express, { ErrorRequestHandler, Request, Response, Router } from "express";

export const debug = (...args: unknown[]) => {
  if (process.env.NODE_ENV === "development") console.log(...args);
};

type QueryValue = Request["query"][string];

const lastString = (value: QueryValue): string | undefined => {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) {
    const strings = value.filter((item): item is string => typeof item === "string");
    return strings[strings.length - 1];
  }
  return undefined;
};

/**
 * Reduces an express request to what the api dispatcher reads. Repeated
 * query parameters keep their last value.
 */
export const toRestRequest = (
  req: Pick<
    Request,
    "method" | "baseUrl" | "path" | "protocol" | "query" | "body" | "headers"
  >
): RestRequest => {
  const query: Record<string, string> = {};
  for (const [key, value] of Object.entries(req.query)) {
    const string = lastString(value);
    if (string !== undefined) query[key] = string;
  }

  const headers: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(req.headers)) {
    headers[key] = Array.isArray(value) ? value.join(", ") : value;
  }

  return {
    method: req.method,
    path: `${req.baseUrl}${req.path}`,
    origin: `${req.protocol}://${req.headers.host ?? "localhost"}`,
    query,
    headers,
    body: req.body,
  };
};

const send = (res: Response, response: RestResponse) => {
  res.status(response.status);
  for (const [name, value] of Object.entries(response.headers ?? {})) {
    res.setHeader(name, value);
  }
  if (response.body === undefined) res.end();
  else res.json(response.body);
};

const malformedBody: ErrorRequestHandler = (error, req, res, next) => {
  if (!(error instanceof SyntaxError)) return next(error);

  debug(`> Rejecting malformed body for ${req.method} ${req.originalUrl}`);
  res.status(400).json({ error: "The request body is not valid JSON." });
};

/**
 * Serves an api over express. Mount the router at the api's base path, or at
 * the root of the app.
 */
export class ResourceServer {
  constructor(readonly api: Api) {}

  router() {
    const handler = asyncHandler(async (req: Request, res: Response) => {
      debug(`> Received ${req.method} ${req.originalUrl}`);

      try {
        send(res, await this.api.dispatch(toRestRequest(req)));
      } catch (e) {
        console.error(
          `Error while handling request (${req.method} ${req.originalUrl}):`,
          e
        );
        res.status(500);
        if (process.env.NODE_ENV === "development" && e instanceof Error) {
          res.json({ error: e.message, stack: e.stack });
        } else {
          res.json({ error: "Internal Server Error" });
        }
      }
    });

    const router = Router();
    router.use(express.json());
    router.use(malformedBody);
    router.all("*", handler);
    return router;
  }
}
