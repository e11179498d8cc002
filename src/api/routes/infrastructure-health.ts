import type { FastifyInstance } from "fastify";

type ClientHealth = { status: string; details?: string };

export interface InfrastructureClients {
  postgres: () => Promise<{ healthCheck: () => Promise<ClientHealth> }>;
  openai: () => Promise<{ healthCheck: () => Promise<ClientHealth> }>;
  qdrant: () => Promise<{ healthCheck: () => Promise<ClientHealth> }>;
}

const loadInfrastructureClients = async (): Promise<InfrastructureClients> => {
  const [openaiModule, postgresModule, qdrantModule] = await Promise.all([
    import("../../clients/openai.js"),
    import("../../clients/postgres.js"),
    import("../../clients/qdrant.js")
  ]);
  return {
    postgres: postgresModule.getPostgresClient,
    openai: openaiModule.getOpenAIClient,
    qdrant: qdrantModule.getQdrantClient
  };
};

export async function registerInfrastructureHealthRoute(
  app: FastifyInstance,
  loadClients: () => Promise<InfrastructureClients> = loadInfrastructureClients
): Promise<void> {
  app.get("/infra/health", async (_request, reply) => {
    try {
      const clients = await loadClients();
      const [postgres, openai, qdrant] = await Promise.all([clients.postgres(), clients.openai(), clients.qdrant()]);

      const [postgresHealth, openaiHealth, qdrantHealth] = await Promise.all([
        postgres.healthCheck(),
        openai.healthCheck(),
        qdrant.healthCheck()
      ]);

      const degraded = [postgresHealth, openaiHealth, qdrantHealth].some((health) => health.status !== "ok");
      return {
        status: degraded ? "degraded" : "ok",
        clients: {
          postgres: postgresHealth,
          openai: openaiHealth,
          qdrant: qdrantHealth
        }
      };
    } catch (error) {
      const detail = error instanceof Error ? error.message : "unknown error";
      reply.code(503);
      return {
        status: "error",
        detail
      };
    }
  });
}
