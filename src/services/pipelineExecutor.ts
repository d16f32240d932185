import { randomUUID } from "node:crypto";
import {
  JobCancelledError,
  StepExecutionError,
  StepTimeoutError,
  describeError,
} from "../errors";
import { logger as rootLogger, type Logger } from "../logger";
import { jobDurationHistogram, jobStatusCounter, recordStepError, startStepTimer } from "../metrics";
import type { JobMutator, JobStore, UpdateFailureReason } from "../repositories/jobStore";
import type { JobRecord, StepDescriptor, WorkflowType } from "../types/job";
import type { StepInputs, StepRegistry } from "./stepRegistry";

export interface PipelineExecutorOptions {
  /** Per-step deadline. 0 disables it. */
  stepTimeoutMs?: number;
  logger?: Logger;
}

export interface PipelineRunOptions {
  signal?: AbortSignal;
  workflow?: WorkflowType;
}

class JobUpdateRejectedError extends Error {
  readonly reason: UpdateFailureReason;

  constructor(reason: UpdateFailureReason, message: string) {
    super(message);
    this.name = "JobUpdateRejectedError";
    this.reason = reason;
  }
}

export function pickInputs(keys: readonly string[], available: StepInputs): StepInputs {
  const inputs: StepInputs = {};
  for (const key of keys) {
    if (available[key] !== undefined) {
      inputs[key] = available[key];
    }
  }
  return inputs;
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new JobCancelledError();
}

export class PipelineExecutor {
  private readonly stepTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly store: JobStore,
    private readonly registry: StepRegistry,
    options: PipelineExecutorOptions = {},
  ) {
    this.stepTimeoutMs = options.stepTimeoutMs ?? 0;
    this.logger = (options.logger ?? rootLogger).child({ component: "pipeline" });
  }

  /**
   * Runs the steps of one job in order and leaves the job in a terminal state.
   * Never rejects: step failures are written to the job record. Resolves with
   * the final record, or null when the record was deleted mid-run.
   */
  async run(
    jobId: string,
    steps: readonly StepDescriptor[],
    initialInputs: StepInputs = {},
    options: PipelineRunOptions = {},
  ): Promise<JobRecord | null> {
    const workflow = options.workflow ?? "full";
    const log = this.logger.child({ jobId, workflow });
    const stopJobTimer = jobDurationHistogram.startTimer({ workflow });
    jobStatusCounter.labels(workflow, "started").inc();

    try {
      let job = await this.apply(jobId, (draft) => {
        draft.status = "running";
      });
      log.info({ steps: steps.map((step) => step.name) }, "Starting pipeline");

      for (const step of steps) {
        if (options.signal?.aborted) {
          throw abortReason(options.signal);
        }
        if (step.optional && !step.enabled) {
          log.debug({ step: step.name }, "Skipping disabled optional step");
          continue;
        }
        job = await this.apply(jobId, (draft) => {
          draft.progress.current_step = step.name;
        });
        const inputs = pickInputs(step.reads, { ...initialInputs, ...job.results });
        const output = await this.executeStep(jobId, step, inputs, options.signal);
        job = await this.apply(jobId, (draft) => {
          draft.progress.completed_steps.push(step.name);
          for (const key of step.produces) {
            draft.results[key] = output;
          }
        });
        log.info({ step: step.name }, "Step completed");
      }

      job = await this.apply(jobId, (draft) => {
        draft.status = "completed";
        draft.progress.current_step = null;
      });
      jobStatusCounter.labels(workflow, "completed").inc();
      stopJobTimer({ status: "completed" });
      log.info("Job completed");
      return job;
    } catch (error) {
      if (error instanceof JobUpdateRejectedError && error.reason !== "invalid_transition") {
        log.warn({ reason: error.reason }, "Job record no longer writable, stopping pipeline");
        stopJobTimer({ status: error.reason });
        return this.store.get(jobId);
      }
      return this.fail(jobId, error, log, () => stopJobTimer({ status: "failed" }), workflow);
    }
  }

  /**
   * Runs one step outside of any job, through the same deadline and abort
   * handling as a pipeline step. Rejects with {@link StepExecutionError}.
   */
  async runStep(step: StepDescriptor, inputs: StepInputs, options: { signal?: AbortSignal } = {}): Promise<unknown> {
    const runId = randomUUID();
    this.logger.info({ runId, step: step.name }, "Running standalone step");
    return this.executeStep(runId, step, pickInputs(step.reads, inputs), options.signal);
  }

  private async fail(
    jobId: string,
    error: unknown,
    log: Logger,
    stopJobTimer: () => void,
    workflow: WorkflowType,
  ): Promise<JobRecord | null> {
    const message = describeError(error);
    log.error({ err: error }, "Job failed");
    jobStatusCounter.labels(workflow, "failed").inc();
    stopJobTimer();
    try {
      const result = await this.store.update(jobId, (draft) => {
        draft.status = "failed";
        draft.error = message;
      });
      if (!result.ok) {
        log.warn({ reason: result.reason }, "Could not record job failure");
        return this.store.get(jobId);
      }
      return result.job;
    } catch (updateError) {
      log.error({ err: updateError }, "Failed to record job failure");
      return this.store.get(jobId);
    }
  }

  private async apply(jobId: string, mutator: JobMutator): Promise<JobRecord> {
    const result = await this.store.update(jobId, mutator);
    if (!result.ok) {
      throw new JobUpdateRejectedError(result.reason, result.message);
    }
    return result.job;
  }

  private async executeStep(
    jobId: string,
    step: StepDescriptor,
    inputs: StepInputs,
    jobSignal?: AbortSignal,
  ): Promise<unknown> {
    const implementation = this.registry.get(step.name);
    if (!implementation) {
      throw new StepExecutionError(step.name, new Error("step is not registered"));
    }

    const controller = new AbortController();
    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener("abort", () => reject(abortReason(controller.signal)), { once: true });
    });
    const forwardAbort = () => controller.abort(jobSignal ? abortReason(jobSignal) : new JobCancelledError());
    jobSignal?.addEventListener("abort", forwardAbort, { once: true });
    if (jobSignal?.aborted) {
      forwardAbort();
    }
    const timer =
      this.stepTimeoutMs > 0
        ? setTimeout(() => controller.abort(new StepTimeoutError(this.stepTimeoutMs)), this.stepTimeoutMs)
        : undefined;
    const stopTimer = startStepTimer(step.name);

    try {
      const pending = Promise.resolve().then(() =>
        implementation.execute(inputs, {
          jobId,
          step: step.name,
          signal: controller.signal,
          logger: this.logger.child({ jobId, step: step.name }),
        }),
      );
      // a step that ignores its signal may still settle after the race is decided
      pending.catch(() => undefined);
      const output = await Promise.race([pending, aborted]);
      // results are stored as plain data; a function or handle in the output fails the step
      return structuredClone(output);
    } catch (error) {
      if (error instanceof StepTimeoutError) {
        recordStepError(step.name, "timeout");
      } else if (error instanceof JobCancelledError) {
        recordStepError(step.name, "cancelled");
      } else {
        recordStepError(step.name, "error");
      }
      throw new StepExecutionError(step.name, error);
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      jobSignal?.removeEventListener("abort", forwardAbort);
      stopTimer();
    }
  }
}
