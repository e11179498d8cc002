import type { FastifyInstance } from "fastify";
import type { SearchPipeline } from "../../modules/pipeline/search-pipeline.js";

export interface HealthRouteDependencies {
  pipeline: Pick<SearchPipeline, "activeCount">;
}

/** Liveness only; collaborator health is served by /infra/health. */
export async function registerHealthRoute(app: FastifyInstance, dependencies: HealthRouteDependencies): Promise<void> {
  app.get("/health", async () => ({ status: "ok", active_tasks: dependencies.pipeline.activeCount }));
}
