import { NotFoundError } from "../errors";
import type { JobStore } from "../repositories/jobStore";
import type { JobRecord, JobSummary } from "../types/job";

export type JobDeleteResult = { job_id: string; deleted: true };

/** Read and delete access to jobs. A running job that is deleted stops at its next store write. */
export class StatusService {
  constructor(private readonly store: JobStore) {}

  async getStatus(jobId: string): Promise<JobRecord> {
    const job = await this.store.get(jobId);
    if (!job) {
      throw new NotFoundError(jobId);
    }
    return job;
  }

  listAll(): Promise<JobSummary[]> {
    return this.store.list();
  }

  async delete(jobId: string): Promise<JobDeleteResult> {
    const deleted = await this.store.delete(jobId);
    if (!deleted) {
      throw new NotFoundError(jobId);
    }
    return { job_id: jobId, deleted: true };
  }
}
