import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";

export const metricsRegistry = new Registry();
collectDefaultMetrics({ register: metricsRegistry });

export const jobStatusCounter = new Counter({
  name: "meeting_prep_jobs_total",
  help: "Meeting preparation jobs by workflow and status",
  labelNames: ["workflow", "status"],
  registers: [metricsRegistry],
});

export const jobDurationHistogram = new Histogram({
  name: "meeting_prep_job_duration_seconds",
  help: "End-to-end job duration in seconds",
  buckets: [1, 5, 15, 30, 60, 120, 300, 600],
  labelNames: ["workflow", "status"],
  registers: [metricsRegistry],
});

export const stepLatencyHistogram = new Histogram({
  name: "meeting_prep_step_latency_seconds",
  help: "Latency of individual research steps",
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
  labelNames: ["step"],
  registers: [metricsRegistry],
});

export const stepErrorsCounter = new Counter({
  name: "meeting_prep_step_errors_total",
  help: "Research step failures by step and reason",
  labelNames: ["step", "reason"],
  registers: [metricsRegistry],
});

export const jobEvictionCounter = new Counter({
  name: "meeting_prep_jobs_evicted_total",
  help: "Terminal jobs evicted by the retention cap",
  registers: [metricsRegistry],
});

export function startStepTimer(step: string) {
  return stepLatencyHistogram.startTimer({ step });
}

export function recordStepError(step: string, reason: "error" | "timeout" | "cancelled") {
  stepErrorsCounter.labels(step, reason).inc();
}
