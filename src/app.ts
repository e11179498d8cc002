import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { registerClientLifecycle } from "./clients/lifecycle.js";
import { registerHealthRoute } from "./api/routes/health.js";
import { registerInfrastructureHealthRoute } from "./api/routes/infrastructure-health.js";
import { registerApiRoutes } from "./api/routes/index.js";
import type { LlmRoutesDependencies } from "./api/routes/llm.js";
import { SearchPipeline } from "./modules/pipeline/search-pipeline.js";
import { TaskRegistry } from "./modules/tasks/task-registry.js";
import { registerMetricsRoutes, registerRequestMetricsHooks } from "./observability/metrics.js";
import { registerRequestTraceHooks } from "./observability/request-tracing.js";

export interface BuildAppOptions {
  /** Supplied by tests; otherwise one pipeline over a swept in-memory registry is created. */
  pipeline?: SearchPipeline;
  llm?: LlmRoutesDependencies;
  registerInfrastructureHealth?: boolean;
}

export function buildAllowedFrontendOrigins(rawOrigin: string | undefined): string[] {
  const configured = rawOrigin
    ?.split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  const origins = new Set<string>(
    configured && configured.length > 0
      ? configured
      : ["http://localhost:5173", "http://127.0.0.1:5173"]
  );

  for (const origin of [...origins]) {
    let url: URL;
    try {
      url = new URL(origin);
    } catch {
      continue;
    }
    if (url.hostname === "localhost") {
      url.hostname = "127.0.0.1";
      origins.add(url.toString().replace(/\/$/, ""));
    } else if (url.hostname === "127.0.0.1") {
      url.hostname = "localhost";
      origins.add(url.toString().replace(/\/$/, ""));
    }
  }

  return [...origins];
}

const createDefaultPipeline = (): { pipeline: SearchPipeline; stopBackgroundWork: () => void } => {
  const registry = new TaskRegistry();
  registry.startSweeper();
  return { pipeline: new SearchPipeline({ registry }), stopBackgroundWork: () => registry.stopSweeper() };
};

export async function buildApp(options?: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: true });
  const frontendOrigins = buildAllowedFrontendOrigins(process.env.FRONTEND_ORIGIN);
  const { pipeline, stopBackgroundWork } = options?.pipeline
    ? { pipeline: options.pipeline, stopBackgroundWork: () => undefined }
    : createDefaultPipeline();

  await app.register(cors, {
    origin: frontendOrigins,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Request-Id"]
  });

  registerRequestMetricsHooks(app);
  registerRequestTraceHooks(app);
  registerClientLifecycle(app, { stopBackgroundWork });
  await registerHealthRoute(app, { pipeline });
  await registerMetricsRoutes(app);
  if (options?.registerInfrastructureHealth !== false) {
    await registerInfrastructureHealthRoute(app);
  }
  await registerApiRoutes(app, { tasks: { pipeline }, llm: options?.llm });

  return app;
}
