import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import { logInfo, logWarn } from "../../observability/logger.js";
import { bindTaskToRequest, getRequestCorrelation } from "../../observability/request-tracing.js";
import { TaskNotFoundError, type SearchPipeline } from "../../modules/pipeline/search-pipeline.js";
import { ValidationError, type ValidationIssue } from "../../modules/search/errors.js";

const searchBodySchema = z.object({
  application_id: z.string().trim().min(1, "application_id is required"),
  query: z.string({ required_error: "query is required" }),
  options: z.record(z.unknown()).optional()
});

const analysisBodySchema = z.object({
  application_id: z.string().trim().min(1, "application_id is required"),
  checklist_id: z.union([z.string(), z.number().int()]).transform((value) => String(value).trim())
});

const taskParamsSchema = z.object({
  id: z.string().min(1, "id is required")
});

const toValidationDetail = (error: z.ZodError, source: "params" | "body") => ({
  detail: error.issues.map((issue) => ({
    type: issue.code,
    loc: [source, ...issue.path],
    msg: issue.message
  }))
});

const toBodyValidationDetail = (issues: ValidationIssue[]) => ({
  detail: issues.map((issue) => ({ type: issue.type, loc: ["body", ...issue.loc], msg: issue.msg }))
});

const sendTaskNotFound = (reply: FastifyReply, taskId: string): void => {
  reply.code(404).send({ detail: `Task ${taskId} not found` });
};

export interface TaskRoutesDependencies {
  pipeline: SearchPipeline;
}

export async function registerTaskRoutes(app: FastifyInstance, dependencies: TaskRoutesDependencies): Promise<void> {
  const { pipeline } = dependencies;

  app.post("/search", async (request, reply) => {
    const parsedBody = searchBodySchema.safeParse(request.body ?? {});
    if (!parsedBody.success) {
      reply.code(422).send(toValidationDetail(parsedBody.error, "body"));
      return;
    }

    try {
      const taskId = pipeline.submitSearch({
        applicationId: parsedBody.data.application_id,
        query: parsedBody.data.query,
        options: parsedBody.data.options
      });
      bindTaskToRequest(request, taskId);
      logInfo("api.search.accepted", getRequestCorrelation(request));
      reply.code(202).send({ task_id: taskId });
    } catch (error) {
      if (error instanceof ValidationError) {
        logWarn("api.search.rejected", getRequestCorrelation(request), { issues: error.issues.length });
        reply.code(422).send(toBodyValidationDetail(error.issues));
        return;
      }
      throw error;
    }
  });

  app.post("/analysis", async (request, reply) => {
    const parsedBody = analysisBodySchema.safeParse(request.body ?? {});
    if (!parsedBody.success) {
      reply.code(422).send(toValidationDetail(parsedBody.error, "body"));
      return;
    }

    try {
      const taskId = await pipeline.submitAnalysis({
        applicationId: parsedBody.data.application_id,
        checklistId: parsedBody.data.checklist_id
      });
      bindTaskToRequest(request, taskId);
      logInfo("api.analysis.accepted", getRequestCorrelation(request), {
        checklist_id: parsedBody.data.checklist_id
      });
      reply.code(202).send({ task_id: taskId });
    } catch (error) {
      if (error instanceof ValidationError) {
        reply.code(422).send(toBodyValidationDetail(error.issues));
        return;
      }
      throw error;
    }
  });

  app.get("/tasks/:id/status", async (request, reply) => {
    const parsedParams = taskParamsSchema.safeParse(request.params);
    if (!parsedParams.success) {
      reply.code(422).send(toValidationDetail(parsedParams.error, "params"));
      return;
    }

    try {
      return pipeline.getStatus(parsedParams.data.id);
    } catch (error) {
      if (error instanceof TaskNotFoundError) {
        sendTaskNotFound(reply, parsedParams.data.id);
        return;
      }
      throw error;
    }
  });

  app.post("/tasks/:id/cancel", async (request, reply) => {
    const parsedParams = taskParamsSchema.safeParse(request.params);
    if (!parsedParams.success) {
      reply.code(422).send(toValidationDetail(parsedParams.error, "params"));
      return;
    }

    try {
      const acknowledgement = pipeline.cancel(parsedParams.data.id);
      logInfo("api.task.cancel", getRequestCorrelation(request), { status: acknowledgement.status });
      return acknowledgement;
    } catch (error) {
      if (error instanceof TaskNotFoundError) {
        sendTaskNotFound(reply, parsedParams.data.id);
        return;
      }
      throw error;
    }
  });
}
