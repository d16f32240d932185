export type JobStatus = "started" | "running" | "completed" | "failed";

export type WorkflowType = "full" | "custom" | "agenda";

export type FocusMode = "blockers" | "design" | "progress" | "planning" | "balanced";

export type StepResults = Record<string, unknown>;

export interface JobProgress {
  current_step: string | null;
  completed_steps: string[];
  total_steps: number;
  requested_steps?: string[];
  focus_mode?: FocusMode;
}

export interface JobRecord {
  id: string;
  status: JobStatus;
  created_at: string;
  updated_at: string;
  progress: JobProgress;
  results: StepResults;
  error: string | null;
}

export interface JobSummary {
  job_id: string;
  type: WorkflowType;
  status: JobStatus;
  created_at: string;
  updated_at: string;
  progress: JobProgress;
  error: string | null;
}

export interface StepDescriptor {
  name: string;
  /** Keys picked from the accumulated seed + results map and handed to the step. */
  reads: string[];
  /** Result keys the step's output is written under. */
  produces: string[];
  optional: boolean;
  enabled: boolean;
}

export const TERMINAL_STATUSES: readonly JobStatus[] = ["completed", "failed"];

export function isTerminal(status: JobStatus) {
  return TERMINAL_STATUSES.includes(status);
}

export function deriveWorkflowType(progress: JobProgress): WorkflowType {
  if (progress.requested_steps) {
    return "custom";
  }
  if (progress.focus_mode) {
    return "agenda";
  }
  return "full";
}
