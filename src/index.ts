import { loadConfig } from "./config";
import { logger } from "./logger";
import { InMemoryJobStore } from "./repositories/jobStore";
import { buildServer } from "./server";
import { PipelineExecutor } from "./services/pipelineExecutor";
import { StatusService } from "./services/statusService";
import { createStepRegistry } from "./services/steps";
import { WorkflowOrchestrator } from "./services/workflowOrchestrator";

async function start() {
  const config = loadConfig();
  const registry = createStepRegistry(config);
  const store = new InMemoryJobStore({ maxRetainedJobs: config.jobs.maxRetained, logger });
  const executor = new PipelineExecutor(store, registry, { stepTimeoutMs: config.steps.timeoutMs, logger });
  const orchestrator = new WorkflowOrchestrator({ store, registry, executor, logger });
  const status = new StatusService(store);

  const app = await buildServer({
    orchestrator,
    status,
    stepProvider: config.steps.provider,
    logLevel: config.logLevel,
  });

  const shutdown = async (signal: string) => {
    logger.info({ signal, activeJobs: orchestrator.activeJobs }, "Shutting down");
    await app.close();
    await orchestrator.waitForIdle();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      });
    });
  }

  const address = await app.listen({ port: config.port, host: config.host });
  logger.info({ address, stepProvider: config.steps.provider, steps: registry.names() }, "Server listening");
}

start().catch((err) => {
  logger.error({ err }, "Failed to start server");
  process.exit(1);
});
