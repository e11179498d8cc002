import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { logWarn, serializeError } from "../../observability/logger.js";
import { getRequestCorrelation } from "../../observability/request-tracing.js";
import { createLlmService, type LlmService } from "../../modules/llm/llm-service.js";
import { LlmUnavailableError, toSafeUserErrorMessage } from "../../modules/search/errors.js";

const modelParamsSchema = z.object({
  name: z.string().trim().min(1, "name is required")
});

export interface LlmRoutesDependencies {
  llm?: LlmService;
}

export async function registerLlmRoutes(app: FastifyInstance, dependencies?: LlmRoutesDependencies): Promise<void> {
  let llm = dependencies?.llm ?? null;
  const resolveLlm = (): LlmService => {
    llm ??= createLlmService();
    return llm;
  };

  app.get("/llm/models", async (request, reply) => {
    try {
      return { models: await resolveLlm().listModels() };
    } catch (error) {
      if (error instanceof LlmUnavailableError) {
        logWarn("api.llm.models.unavailable", getRequestCorrelation(request), serializeError(error));
        reply.code(503).send({ detail: toSafeUserErrorMessage(error) });
        return;
      }
      throw error;
    }
  });

  app.get("/llm/models/:name", async (request, reply) => {
    const parsedParams = modelParamsSchema.safeParse(request.params);
    if (!parsedParams.success) {
      reply.code(422).send({
        detail: parsedParams.error.issues.map((issue) => ({
          type: issue.code,
          loc: ["params", ...issue.path],
          msg: issue.message
        }))
      });
      return;
    }

    try {
      return await resolveLlm().modelInfo(parsedParams.data.name);
    } catch (error) {
      if (error instanceof LlmUnavailableError) {
        logWarn("api.llm.model_info.unavailable", getRequestCorrelation(request), {
          model: parsedParams.data.name,
          ...serializeError(error)
        });
        reply.code(503).send({ detail: toSafeUserErrorMessage(error) });
        return;
      }
      throw error;
    }
  });
}
