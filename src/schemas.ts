import { z } from "zod";
import { ValidationError } from "./errors";

export const FOCUS_MODES = ["blockers", "design", "progress", "planning", "balanced"] as const;

export const focusModeSchema = z.enum(FOCUS_MODES);

const meetingContextSchema = z.union([z.string(), z.record(z.unknown())]);

export const fullWorkflowOptionsSchema = z
  .object({
    meetingContext: meetingContextSchema.optional(),
    userPreferences: z.record(z.unknown()).optional(),
    includeSlack: z.boolean().default(true),
    includeAgenda: z.boolean().default(false),
    focusMode: focusModeSchema.default("balanced"),
  })
  .strict();

export const customSeedSchema = z
  .object({
    meetingContext: meetingContextSchema.optional(),
    userPreferences: z.record(z.unknown()).optional(),
    calendarData: z.unknown().optional(),
    peopleData: z.unknown().optional(),
    technicalData: z.unknown().optional(),
    slackData: z.unknown().optional(),
  })
  .strict();

export const stepNamesSchema = z.array(z.string().min(1)).min(1, "at least one step is required");

export const stepInputsSchema = z.record(z.unknown());

export const agendaRequestSchema = z.object({
  meetingContext: z.record(z.unknown()),
  focusMode: focusModeSchema.default("balanced"),
  participantRoles: z.record(z.string()).optional(),
});

export type FullWorkflowOptions = z.input<typeof fullWorkflowOptionsSchema>;
export type CustomSeedData = z.input<typeof customSeedSchema>;
export type ParticipantRoles = Record<string, string>;

export function formatIssues(error: z.ZodError) {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, message: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(message, formatIssues(result.error));
  }
  return result.data;
}
