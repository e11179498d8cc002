import type { FastifyInstance } from "fastify";
import { registerLlmRoutes, type LlmRoutesDependencies } from "./llm.js";
import { registerTaskRoutes, type TaskRoutesDependencies } from "./tasks.js";

export interface ApiRoutesDependencies {
  tasks: TaskRoutesDependencies;
  llm?: LlmRoutesDependencies;
}

export async function registerApiRoutes(app: FastifyInstance, dependencies: ApiRoutesDependencies): Promise<void> {
  await registerTaskRoutes(app, dependencies.tasks);
  await registerLlmRoutes(app, dependencies.llm);
}
