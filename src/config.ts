import { z } from "zod";

const envSchema = z
  .object({
    NODE_ENV: z.string().optional().default("development"),
    PORT: z.coerce.number().optional().default(8080),
    HOST: z.string().optional().default("0.0.0.0"),
    LOG_LEVEL: z.string().optional().default("info"),
    STEP_PROVIDER: z.enum(["stub", "http"]).optional().default("stub"),
    RESEARCH_TOOLS_URL: z.string().url().optional(),
    RESEARCH_TOOLS_API_KEY: z.string().optional(),
    STEP_TIMEOUT_SECONDS: z.coerce.number().min(0).optional().default(300),
    MAX_RETAINED_JOBS: z.coerce.number().int().min(0).optional().default(500),
    STUB_STEP_DELAY_MS: z.coerce.number().min(0).optional().default(0),
  })
  .refine((env) => env.STEP_PROVIDER !== "http" || Boolean(env.RESEARCH_TOOLS_URL), {
    message: "RESEARCH_TOOLS_URL is required when STEP_PROVIDER=http",
    path: ["RESEARCH_TOOLS_URL"],
  });

export function loadConfig(source: Record<string, string | undefined> = process.env) {
  const env = envSchema.parse(source);
  return {
    env: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST,
    logLevel: env.LOG_LEVEL,
    steps: {
      provider: env.STEP_PROVIDER,
      timeoutMs: env.STEP_TIMEOUT_SECONDS * 1000,
      stubDelayMs: env.STUB_STEP_DELAY_MS,
    },
    researchTools: {
      baseUrl: env.RESEARCH_TOOLS_URL?.replace(/\/$/, ""),
      apiKey: env.RESEARCH_TOOLS_API_KEY,
    },
    jobs: {
      maxRetained: env.MAX_RETAINED_JOBS,
    },
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;
