import type { Dispatcher } from "undici";
import type { AppConfig } from "../../config";
import { STEP_NAMES, StepRegistry } from "../stepRegistry";
import { createHttpSteps } from "./httpSteps";
import { createStubSteps } from "./stubSteps";

export { createHttpStep, createHttpSteps } from "./httpSteps";
export { createStubSteps } from "./stubSteps";

/** Picks the step provider once, at startup. */
export function createStepRegistry(config: AppConfig, overrides: { dispatcher?: Dispatcher } = {}) {
  if (config.steps.provider === "http") {
    const { baseUrl, apiKey } = config.researchTools;
    if (!baseUrl) {
      throw new Error("RESEARCH_TOOLS_URL is required for the http step provider");
    }
    return new StepRegistry(createHttpSteps(STEP_NAMES, { baseUrl, apiKey, dispatcher: overrides.dispatcher }));
  }
  return new StepRegistry(createStubSteps({ delayMs: config.steps.stubDelayMs }));
}
