import { fetch, type Dispatcher } from "undici";
import { z } from "zod";
import type { ResearchStep, StepContext, StepInputs } from "../stepRegistry";

export interface HttpStepOptions {
  baseUrl: string;
  apiKey?: string;
  dispatcher?: Dispatcher;
}

const stepResponseSchema = z.object({
  output: z.unknown().optional(),
  error: z.string().optional(),
});

export function createHttpStep(name: string, options: HttpStepOptions): ResearchStep {
  const url = `${options.baseUrl}/steps/${encodeURIComponent(name)}`;
  return {
    name,
    async execute(inputs: StepInputs, context: StepContext) {
      const response = await fetch(url, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          ...(options.apiKey ? { "x-api-key": options.apiKey } : {}),
        },
        body: JSON.stringify({ step: name, job_id: context.jobId, inputs }),
        signal: context.signal,
        ...(options.dispatcher ? { dispatcher: options.dispatcher } : {}),
      });

      if (!response.ok) {
        const text = await response.text();
        context.logger.error({ url, status: response.status, text }, "Research tool request failed");
        throw new Error(`${name} request failed (${response.status})`);
      }

      const data = stepResponseSchema.parse(await response.json());
      if (data.error) {
        throw new Error(data.error);
      }
      return data.output ?? null;
    },
  };
}

export function createHttpSteps(names: readonly string[], options: HttpStepOptions): ResearchStep[] {
  return names.map((name) => createHttpStep(name, options));
}
