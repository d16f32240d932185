import { JobCancelledError, NotFoundError, StepNotFoundError, ValidationError } from "../errors";
import { logger as rootLogger, type Logger } from "../logger";
import type { CreateJobInput, JobStore } from "../repositories/jobStore";
import {
  CustomSeedData,
  FullWorkflowOptions,
  ParticipantRoles,
  agendaRequestSchema,
  customSeedSchema,
  focusModeSchema,
  fullWorkflowOptionsSchema,
  parseOrThrow,
  stepInputsSchema,
  stepNamesSchema,
} from "../schemas";
import type { FocusMode, JobRecord, StepDescriptor, WorkflowType } from "../types/job";
import type { PipelineExecutor } from "./pipelineExecutor";
import type { StepInputs, StepRegistry } from "./stepRegistry";
import { agendaWorkflowSteps, countEnabled, customWorkflowSteps, describeStep, fullWorkflowSteps } from "./workflows";

export interface WorkflowOrchestratorDeps {
  store: JobStore;
  registry: StepRegistry;
  executor: PipelineExecutor;
  logger?: Logger;
}

export interface StepRunResult {
  step: string;
  status: "success";
  output: unknown;
}

interface ActiveTask {
  controller: AbortController;
  done: Promise<void>;
}

function defined(entries: Record<string, unknown>): StepInputs {
  return Object.fromEntries(Object.entries(entries).filter(([, value]) => value !== undefined));
}

export class WorkflowOrchestrator {
  private readonly store: JobStore;
  private readonly registry: StepRegistry;
  private readonly executor: PipelineExecutor;
  private readonly logger: Logger;
  private readonly tasks = new Map<string, ActiveTask>();

  constructor(deps: WorkflowOrchestratorDeps) {
    this.store = deps.store;
    this.registry = deps.registry;
    this.executor = deps.executor;
    this.logger = (deps.logger ?? rootLogger).child({ component: "orchestrator" });
  }

  async startFull(options: FullWorkflowOptions = {}): Promise<string> {
    const request = parseOrThrow(fullWorkflowOptionsSchema, options, "Invalid meeting preparation request");
    const steps = fullWorkflowSteps(request);
    this.assertRegistered(steps);
    return this.dispatch("full", steps, defined({
      meeting_context: request.meetingContext,
      user_preferences: request.userPreferences,
      focus_mode: request.focusMode,
    }));
  }

  async startCustom(stepNames: readonly string[], seedData: CustomSeedData = {}): Promise<string> {
    const names = parseOrThrow(stepNamesSchema, stepNames, "Invalid custom workflow request");
    const seed = parseOrThrow(customSeedSchema, seedData, "Invalid custom workflow request");

    const unknown = names.filter((name) => !this.registry.has(name));
    if (unknown.length) {
      throw new ValidationError(`Unknown steps: ${unknown.join(", ")}`, unknown.map((name) => `steps: ${name}`));
    }
    const duplicates = names.filter((name, idx) => names.indexOf(name) !== idx);
    if (duplicates.length) {
      throw new ValidationError(`Steps requested more than once: ${[...new Set(duplicates)].join(", ")}`);
    }
    const steps = customWorkflowSteps(names);
    const produced = steps.flatMap((step) => step.produces);
    const clashes = produced.filter((key, idx) => produced.indexOf(key) !== idx);
    if (clashes.length) {
      throw new ValidationError(`Steps write the same result: ${[...new Set(clashes)].join(", ")}`);
    }

    return this.dispatch(
      "custom",
      steps,
      defined({
        meeting_context: seed.meetingContext,
        user_preferences: seed.userPreferences,
        calendar: seed.calendarData,
        people_research: seed.peopleData,
        technical_context: seed.technicalData,
        slack_context: seed.slackData,
      }),
      { requestedSteps: names },
    );
  }

  async startAgenda(
    meetingContext: Record<string, unknown>,
    focusMode: FocusMode = "balanced",
    participantRoles?: ParticipantRoles,
  ): Promise<string> {
    const request = parseOrThrow(
      agendaRequestSchema,
      { meetingContext, focusMode, participantRoles },
      "Invalid agenda request",
    );
    const hasRoles = Boolean(request.participantRoles && Object.keys(request.participantRoles).length);
    const steps = agendaWorkflowSteps(hasRoles);
    this.assertRegistered(steps);
    return this.dispatch(
      "agenda",
      steps,
      defined({
        meeting_context: request.meetingContext,
        focus_mode: request.focusMode,
        participant_roles: hasRoles ? request.participantRoles : undefined,
      }),
      { focusMode: request.focusMode },
    );
  }

  /**
   * Runs a single registered step synchronously, without creating a job.
   * The step sees only the inputs it declares.
   */
  async runStep(name: string, inputs: StepInputs = {}, options: { signal?: AbortSignal } = {}): Promise<StepRunResult> {
    if (!this.registry.has(name)) {
      throw new StepNotFoundError(name);
    }
    const parsed = parseOrThrow(stepInputsSchema, inputs, "Invalid step inputs");
    const output = await this.executor.runStep(describeStep(name), parsed, options);
    return { step: name, status: "success", output };
  }

  /** Builds an agenda for one focus mode without creating a job. */
  async quickAgenda(
    focusMode: string,
    meetingContext: Record<string, unknown>,
    options: { signal?: AbortSignal } = {},
  ): Promise<StepRunResult & { focus_mode: FocusMode }> {
    const mode = parseOrThrow(focusModeSchema, focusMode, "Invalid focus mode");
    const result = await this.runStep("agenda_builder", { meeting_context: meetingContext, focus_mode: mode }, options);
    return { ...result, focus_mode: mode };
  }

  /** Aborts a live job and resolves with its failed record. */
  async cancel(jobId: string): Promise<JobRecord> {
    const task = this.tasks.get(jobId);
    if (!task) {
      const job = await this.store.get(jobId);
      if (!job) {
        throw new NotFoundError(jobId);
      }
      throw new ValidationError(`Job ${jobId} is already ${job.status}`);
    }
    this.logger.info({ jobId }, "Cancelling job");
    task.controller.abort(new JobCancelledError());
    await task.done;
    const job = await this.store.get(jobId);
    if (!job) {
      throw new NotFoundError(jobId);
    }
    return job;
  }

  get activeJobs() {
    return this.tasks.size;
  }

  async waitForIdle(): Promise<void> {
    while (this.tasks.size) {
      await Promise.all([...this.tasks.values()].map((task) => task.done));
    }
  }

  private assertRegistered(steps: readonly StepDescriptor[]) {
    const missing = steps
      .filter((step) => (!step.optional || step.enabled) && !this.registry.has(step.name))
      .map((step) => step.name);
    if (missing.length) {
      throw new ValidationError(`Steps not available: ${missing.join(", ")}`);
    }
  }

  private async dispatch(
    workflow: WorkflowType,
    steps: StepDescriptor[],
    initialInputs: StepInputs,
    extras: Omit<CreateJobInput, "totalSteps"> = {},
  ): Promise<string> {
    const job = await this.store.create({ totalSteps: countEnabled(steps), ...extras });
    const controller = new AbortController();
    const done = this.executor
      .run(job.id, steps, initialInputs, { signal: controller.signal, workflow })
      .then(() => undefined)
      .catch((error: unknown) => {
        this.logger.error({ err: error, jobId: job.id }, "Pipeline task crashed");
      })
      .finally(() => {
        this.tasks.delete(job.id);
      });
    this.tasks.set(job.id, { controller, done });
    this.logger.info({ jobId: job.id, workflow, totalSteps: job.progress.total_steps }, "Accepted job");
    return job.id;
  }
}
