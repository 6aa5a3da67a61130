import { AppError, type ApiErrorResponse, ValidationError } from "@mediasift/utils";
import type { ApiContext } from "./context.js";
import * as artifacts from "./routes/artifacts.js";
import * as jobs from "./routes/jobs.js";
import * as status from "./routes/status.js";

type Handler = (request: Request, ctx: ApiContext, ...params: string[]) => Promise<Response>;

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
  paramNames: string[];
}

function route(method: string, path: string, handler: Handler): Route {
  const paramNames: string[] = [];
  const patternStr = path.replace(/:(\w+)/g, (_, name: string) => {
    paramNames.push(name);
    return "([^/]+)";
  });
  return {
    method,
    pattern: new RegExp(`^${patternStr}$`),
    handler,
    paramNames,
  };
}

const routes: Route[] = [
  route("GET", "/status", status.getStatus),

  // Jobs
  route("POST", "/jobs", jobs.submitJob),
  route("GET", "/jobs", jobs.listJobs),
  route("GET", "/jobs/:id", jobs.getJob),
  route("DELETE", "/jobs/:id", jobs.cancelJob),
  route("POST", "/jobs/:id/resubmit", jobs.resubmitJob),
  route("POST", "/jobs/:id/purge", jobs.purgeJob),

  // Artifacts
  route("GET", "/artifacts/:hash", artifacts.getArtifact),
];

function errorResponse(err: AppError): Response {
  const body: ApiErrorResponse = { error: { code: err.code, message: err.message } };
  if (err instanceof ValidationError && err.details) body.error.details = err.details;
  return Response.json(body, { status: err.statusCode });
}

export function createApiHandler(ctx: ApiContext) {
  return async (request: Request): Promise<Response> => {
    const url = new URL(request.url);
    const method = request.method;
    const path = url.pathname;

    for (const r of routes) {
      if (r.method !== method) continue;
      const match = path.match(r.pattern);
      if (!match) continue;

      const params = match.slice(1);
      try {
        return await r.handler(request, ctx, ...params);
      } catch (err) {
        if (err instanceof AppError) {
          return errorResponse(err);
        }

        console.error(`Unhandled API error on ${method} ${path}:`, err);
        return Response.json(
          { error: { code: "INTERNAL_ERROR", message: "Internal server error" } },
          { status: 500 },
        );
      }
    }

    return Response.json(
      { error: { code: "NOT_FOUND", message: "Route not found" } },
      { status: 404 },
    );
  };
}
