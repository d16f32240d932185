import Fastify, { FastifyInstance } from "fastify";
import sensible from "@fastify/sensible";
import { ZodError, z } from "zod";
import { NotFoundError, StepNotFoundError, ValidationError } from "./errors";
import { metricsRegistry } from "./metrics";
import { FOCUS_MODES, formatIssues } from "./schemas";
import type { StatusService } from "./services/statusService";
import type { WorkflowOrchestrator } from "./services/workflowOrchestrator";
import type { JobRecord } from "./types/job";

export interface ServerDeps {
  orchestrator: WorkflowOrchestrator;
  status: StatusService;
  stepProvider: string;
  logLevel?: string;
}

const meetingContextSchema = z.union([z.string(), z.record(z.unknown())]);

const prepareSchema = z.object({
  meeting_context: meetingContextSchema.optional(),
  user_preferences: z.record(z.unknown()).optional(),
  include_slack: z.boolean().optional(),
  include_agenda: z.boolean().optional(),
  focus_mode: z.enum(FOCUS_MODES).optional(),
});

const prepareCustomSchema = z.object({
  steps: z.array(z.string()),
  meeting_context: meetingContextSchema.optional(),
  user_preferences: z.record(z.unknown()).optional(),
  calendar_data: z.unknown().optional(),
  people_data: z.unknown().optional(),
  technical_data: z.unknown().optional(),
  slack_data: z.unknown().optional(),
});

const agendaSchema = z.object({
  meeting_context: z.record(z.unknown()),
  focus_mode: z.enum(FOCUS_MODES).optional(),
  participant_roles: z.record(z.string()).optional(),
});

const stepRunSchema = z.object({
  inputs: z.record(z.unknown()).optional(),
});

const quickAgendaSchema = z.object({
  meeting_context: z.record(z.unknown()),
});

const idParamSchema = z.object({ id: z.string().min(1) });
const stepParamSchema = z.object({ name: z.string().min(1) });
const focusParamSchema = z.object({ focusMode: z.string() });

function toJobResponse(job: JobRecord) {
  return {
    job_id: job.id,
    status: job.status,
    created_at: job.created_at,
    updated_at: job.updated_at,
    progress: job.progress,
    results: job.results,
    error: job.error,
  };
}

function accepted(jobId: string, message: string) {
  return { job_id: jobId, status: "started" as const, message };
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const { orchestrator, status } = deps;
  const app = Fastify({
    logger: {
      level: deps.logLevel ?? process.env.LOG_LEVEL ?? "info",
    },
  });
  await app.register(sensible);

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.badRequest(`Invalid request: ${formatIssues(error).join("; ")}`);
    }
    if (error instanceof ValidationError) {
      return reply.badRequest(error.issues.length ? `${error.message} (${error.issues.join("; ")})` : error.message);
    }
    if (error instanceof NotFoundError || error instanceof StepNotFoundError) {
      return reply.notFound(error.message);
    }
    request.log.error({ err: error }, "Request failed");
    return reply.send(error);
  });

  app.get("/healthz", async () => ({ status: "ok", step_provider: deps.stepProvider }));
  app.get("/metrics", async (_, reply) => {
    reply.header("content-type", metricsRegistry.contentType);
    return metricsRegistry.metrics();
  });

  app.post("/api/v1/meetings/prepare", async (request, reply) => {
    const body = prepareSchema.parse(request.body ?? {});
    const jobId = await orchestrator.startFull({
      meetingContext: body.meeting_context,
      userPreferences: body.user_preferences,
      includeSlack: body.include_slack,
      includeAgenda: body.include_agenda,
      focusMode: body.focus_mode,
    });
    reply.code(202);
    return accepted(jobId, "Meeting preparation started");
  });

  app.post("/api/v1/meetings/prepare-custom", async (request, reply) => {
    const body = prepareCustomSchema.parse(request.body ?? {});
    const jobId = await orchestrator.startCustom(body.steps, {
      meetingContext: body.meeting_context,
      userPreferences: body.user_preferences,
      calendarData: body.calendar_data,
      peopleData: body.people_data,
      technicalData: body.technical_data,
      slackData: body.slack_data,
    });
    reply.code(202);
    return accepted(jobId, "Custom meeting preparation started");
  });

  app.post("/api/v1/agenda/comprehensive", async (request, reply) => {
    const body = agendaSchema.parse(request.body ?? {});
    const jobId = await orchestrator.startAgenda(body.meeting_context, body.focus_mode, body.participant_roles);
    reply.code(202);
    return accepted(jobId, "Agenda preparation started");
  });

  app.post("/api/v1/agenda/quick/:focusMode", async (request) => {
    const params = focusParamSchema.parse(request.params);
    const body = quickAgendaSchema.parse(request.body ?? {});
    return orchestrator.quickAgenda(params.focusMode, body.meeting_context);
  });

  app.post("/api/v1/steps/:name", async (request) => {
    const params = stepParamSchema.parse(request.params);
    const body = stepRunSchema.parse(request.body ?? {});
    return orchestrator.runStep(params.name, body.inputs);
  });

  app.get("/api/v1/jobs", async () => ({ jobs: await status.listAll() }));

  app.get("/api/v1/jobs/:id", async (request) => {
    const params = idParamSchema.parse(request.params);
    return toJobResponse(await status.getStatus(params.id));
  });

  app.post("/api/v1/jobs/:id/cancel", async (request) => {
    const params = idParamSchema.parse(request.params);
    return toJobResponse(await orchestrator.cancel(params.id));
  });

  app.delete("/api/v1/jobs/:id", async (request) => {
    const params = idParamSchema.parse(request.params);
    return status.delete(params.id);
  });

  return app;
}
