import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { logDebug, logInfo, logTrace, type CorrelationContext } from "./logger.js";

type RequestTraceMode = "off" | "debug" | "trace";

const requestStartTimes = new WeakMap<FastifyRequest, number>();
const boundTaskIds = new WeakMap<FastifyRequest, string>();

const applicationBodySchema = z.object({ application_id: z.string().trim().min(1) });
const taskParamsSchema = z.object({ id: z.string().min(1) });
const searchOptionsBodySchema = z.object({ options: z.record(z.unknown()) });

export const resolveRequestTraceMode = (value = process.env.BACKEND_REQUEST_TRACE_MODE): RequestTraceMode => {
  const normalized = value?.trim().toLowerCase();
  return normalized === "debug" || normalized === "trace" ? normalized : "off";
};

/** Records the task a request created so later log lines carry its id. */
export const bindTaskToRequest = (request: FastifyRequest, taskId: string): void => {
  boundTaskIds.set(request, taskId);
};

/**
 * Correlation ids for a request: `X-Request-Id` when the client sends one,
 * the task from the route or from {@link bindTaskToRequest}, and the
 * application from the body. Body fields are only seen once it is parsed.
 */
export const getRequestCorrelation = (request: FastifyRequest): CorrelationContext => {
  const header = request.headers["x-request-id"];
  const params = taskParamsSchema.safeParse(request.params);
  const body = applicationBodySchema.safeParse(request.body);

  return {
    requestId: typeof header === "string" && header.trim().length > 0 ? header.trim() : request.id,
    taskId: boundTaskIds.get(request) ?? (params.success ? params.data.id : null),
    applicationId: body.success ? body.data.application_id : null
  };
};

const getRoutePath = (request: FastifyRequest): string | null => {
  const routeUrl: unknown = request.routeOptions?.url;
  return typeof routeUrl === "string" ? routeUrl : null;
};

const traceRequest = (
  mode: Exclude<RequestTraceMode, "off">,
  request: FastifyRequest,
  reply: FastifyReply,
  event: string,
  fields: Record<string, unknown> = {}
): void => {
  const baseFields: Record<string, unknown> = {
    method: request.method,
    route: getRoutePath(request),
    status_code: reply.statusCode || null,
    ...fields
  };

  if (mode === "trace") {
    logTrace(event, getRequestCorrelation(request), baseFields);
    return;
  }
  logDebug(event, getRequestCorrelation(request), baseFields);
};

export const registerRequestTraceHooks = (app: FastifyInstance, mode = resolveRequestTraceMode()): void => {
  if (mode === "off") {
    return;
  }

  logInfo("http.trace.enabled", {}, { mode });

  app.addHook("onRequest", async (request) => {
    requestStartTimes.set(request, Date.now());
  });

  if (mode === "trace") {
    app.addHook("preHandler", async (request, reply) => {
      const options = searchOptionsBodySchema.safeParse(request.body);
      traceRequest(mode, request, reply, "http.request.received", {
        option_keys: options.success ? Object.keys(options.data.options) : []
      });
    });
  }

  app.addHook("onError", async (request, reply, error) => {
    traceRequest(mode, request, reply, "http.request.error", {
      error_name: error.name,
      error_message: error.message
    });
  });

  app.addHook("onResponse", async (request, reply) => {
    const startedAt = requestStartTimes.get(request) ?? Date.now();
    requestStartTimes.delete(request);
    traceRequest(mode, request, reply, "http.request.complete", {
      duration_ms: Date.now() - startedAt
    });
  });
};
