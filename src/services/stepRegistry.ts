import type { Logger } from "../logger";

export const STEP_NAMES = [
  "calendar",
  "people_research",
  "technical_context",
  "slack_context",
  "agenda_builder",
  "preread_collector",
  "context_briefing",
  "coordinator",
] as const;

export type StepName = (typeof STEP_NAMES)[number];

export type StepInputs = Record<string, unknown>;

export interface StepContext {
  jobId: string;
  step: string;
  /** Aborted when the job is cancelled or the step exceeds its deadline. */
  signal: AbortSignal;
  logger: Logger;
}

export interface ResearchStep {
  name: string;
  execute(inputs: StepInputs, context: StepContext): unknown;
}

export class StepRegistry {
  private readonly steps: ReadonlyMap<string, ResearchStep>;

  constructor(steps: Iterable<ResearchStep>) {
    const entries = new Map<string, ResearchStep>();
    for (const step of steps) {
      if (entries.has(step.name)) {
        throw new Error(`Duplicate research step ${step.name}`);
      }
      entries.set(step.name, step);
    }
    this.steps = entries;
  }

  get(name: string) {
    return this.steps.get(name);
  }

  has(name: string) {
    return this.steps.has(name);
  }

  names() {
    return [...this.steps.keys()];
  }
}
