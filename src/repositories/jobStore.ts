import { randomUUID } from "node:crypto";
import { logger as rootLogger, type Logger } from "../logger";
import { jobEvictionCounter } from "../metrics";
import {
  FocusMode,
  JobRecord,
  JobStatus,
  JobSummary,
  deriveWorkflowType,
  isTerminal,
} from "../types/job";

export interface CreateJobInput {
  totalSteps: number;
  requestedSteps?: string[];
  focusMode?: FocusMode;
}

export type JobMutator = (draft: JobRecord) => void | Promise<void>;

export type UpdateFailureReason = "not_found" | "terminal" | "invalid_transition";

export type UpdateResult =
  | { ok: true; job: JobRecord }
  | { ok: false; reason: UpdateFailureReason; message: string };

export interface JobStore {
  create(input: CreateJobInput): Promise<JobRecord>;
  get(jobId: string): Promise<JobRecord | null>;
  update(jobId: string, mutator: JobMutator): Promise<UpdateResult>;
  list(): Promise<JobSummary[]>;
  delete(jobId: string): Promise<boolean>;
}

export interface InMemoryJobStoreOptions {
  /** Oldest terminal jobs are evicted once the store holds more than this. 0 keeps everything. */
  maxRetainedJobs?: number;
  logger?: Logger;
  now?: () => Date;
}

const ALLOWED_TRANSITIONS: Record<JobStatus, JobStatus[]> = {
  started: ["started", "running", "failed"],
  running: ["running", "completed", "failed"],
  completed: [],
  failed: [],
};

export function checkTransition(previous: JobRecord, next: JobRecord): string | null {
  if (next.id !== previous.id || next.created_at !== previous.created_at) {
    return "job identity is immutable";
  }
  if (!ALLOWED_TRANSITIONS[previous.status].includes(next.status)) {
    return `illegal status transition ${previous.status} -> ${next.status}`;
  }
  if (next.progress.total_steps !== previous.progress.total_steps) {
    return "total_steps is fixed at creation";
  }
  const before = previous.progress.completed_steps;
  const after = next.progress.completed_steps;
  if (after.length < before.length || before.some((step, idx) => after[idx] !== step)) {
    return "completed_steps is append-only";
  }
  if (new Set(after).size !== after.length) {
    return "completed_steps must not contain duplicates";
  }
  for (const [key, value] of Object.entries(previous.results)) {
    if (!(key in next.results)) {
      return `result ${key} cannot be removed`;
    }
    if (next.results[key] !== value) {
      return `result ${key} is already written`;
    }
  }
  if (next.status === "failed" && !next.error) {
    return "failed jobs must carry an error";
  }
  if (next.status !== "failed" && next.error !== null) {
    return "only failed jobs carry an error";
  }
  return null;
}

// Written results are shared with the draft so that overwrites can be detected by identity.
function draftOf(job: JobRecord): JobRecord {
  return {
    ...job,
    progress: structuredClone(job.progress),
    results: { ...job.results },
  };
}

function summarize(job: JobRecord): JobSummary {
  return {
    job_id: job.id,
    type: deriveWorkflowType(job.progress),
    status: job.status,
    created_at: job.created_at,
    updated_at: job.updated_at,
    progress: structuredClone(job.progress),
    error: job.error,
  };
}

/**
 * Process-lifetime job store. Records never leave the store by reference:
 * reads return deep copies and writes go through {@link InMemoryJobStore.update},
 * which runs one mutator at a time per job id.
 */
export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, JobRecord>();
  private readonly locks = new Map<string, Promise<unknown>>();
  private readonly maxRetainedJobs: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: InMemoryJobStoreOptions = {}) {
    this.maxRetainedJobs = options.maxRetainedJobs ?? 0;
    this.logger = (options.logger ?? rootLogger).child({ component: "job-store" });
    this.now = options.now ?? (() => new Date());
  }

  async create(input: CreateJobInput): Promise<JobRecord> {
    let id = randomUUID();
    while (this.jobs.has(id)) {
      id = randomUUID();
    }
    const timestamp = this.now().toISOString();
    const job: JobRecord = {
      id,
      status: "started",
      created_at: timestamp,
      updated_at: timestamp,
      progress: {
        current_step: null,
        completed_steps: [],
        total_steps: input.totalSteps,
        ...(input.requestedSteps ? { requested_steps: [...input.requestedSteps] } : {}),
        ...(input.focusMode ? { focus_mode: input.focusMode } : {}),
      },
      results: {},
      error: null,
    };
    this.jobs.set(id, job);
    this.evictIfNeeded();
    return structuredClone(job);
  }

  async get(jobId: string): Promise<JobRecord | null> {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : null;
  }

  async update(jobId: string, mutator: JobMutator): Promise<UpdateResult> {
    return this.withLock(jobId, async (): Promise<UpdateResult> => {
      const current = this.jobs.get(jobId);
      if (!current) {
        return { ok: false, reason: "not_found", message: `Job ${jobId} not found` };
      }
      if (isTerminal(current.status)) {
        return { ok: false, reason: "terminal", message: `Job ${jobId} is already ${current.status}` };
      }
      const draft = draftOf(current);
      await mutator(draft);
      // the record may have been deleted while an async mutator was pending
      if (this.jobs.get(jobId) !== current) {
        return { ok: false, reason: "not_found", message: `Job ${jobId} not found` };
      }
      const violation = checkTransition(current, draft);
      if (violation) {
        this.logger.warn({ jobId, violation }, "Rejected job update");
        return { ok: false, reason: "invalid_transition", message: violation };
      }
      for (const key of Object.keys(draft.results)) {
        if (!(key in current.results)) {
          draft.results[key] = structuredClone(draft.results[key]);
        }
      }
      const stamped = this.now().toISOString();
      draft.updated_at = stamped > current.updated_at ? stamped : current.updated_at;
      this.jobs.set(jobId, draft);
      return { ok: true, job: structuredClone(draft) };
    });
  }

  async list(): Promise<JobSummary[]> {
    // insertion order is creation order
    return [...this.jobs.values()].reverse().map(summarize);
  }

  async delete(jobId: string): Promise<boolean> {
    return this.jobs.delete(jobId);
  }

  get size() {
    return this.jobs.size;
  }

  private async withLock<T>(jobId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(jobId) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.catch(() => undefined);
    this.locks.set(jobId, tail);
    try {
      return await run;
    } finally {
      if (this.locks.get(jobId) === tail) {
        this.locks.delete(jobId);
      }
    }
  }

  private evictIfNeeded() {
    if (!this.maxRetainedJobs || this.jobs.size <= this.maxRetainedJobs) {
      return;
    }
    const terminal = [...this.jobs.values()]
      .filter((job) => isTerminal(job.status))
      .sort((a, b) => a.updated_at.localeCompare(b.updated_at));
    let excess = this.jobs.size - this.maxRetainedJobs;
    for (const job of terminal) {
      if (excess <= 0) {
        break;
      }
      this.jobs.delete(job.id);
      jobEvictionCounter.inc();
      this.logger.debug({ jobId: job.id }, "Evicted terminal job");
      excess -= 1;
    }
  }
}
