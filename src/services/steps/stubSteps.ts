import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import type { FocusMode } from "../../types/job";
import type { ResearchStep, StepContext, StepInputs } from "../stepRegistry";

// Deterministic stand-ins for the external research tools. Outputs are shaped
// like the real tools' payloads so downstream steps and clients can be exercised
// without credentials.

const meetingSchema = z.object({
  title: z.string(),
  start: z.string(),
  end: z.string(),
  attendees: z.array(z.string()),
});

const calendarSchema = z.object({ meetings: z.array(meetingSchema) });

const contextObjectSchema = z
  .object({
    meeting_title: z.string().optional(),
    title: z.string().optional(),
    participants: z.array(z.string()).optional(),
  })
  .passthrough();

const agendaSchema = z.object({
  meeting_title: z.string(),
  agenda_items: z.array(z.object({ title: z.string(), priority: z.string() })),
});

const rolesSchema = z.record(z.string());

const FOCUS_TOPICS: Record<FocusMode, [string, string][]> = {
  blockers: [
    ["Critical Blockers Review", "High"],
    ["Resource Allocation", "High"],
    ["Next Steps", "Medium"],
  ],
  design: [
    ["Design Review", "High"],
    ["Architecture Decisions", "Medium"],
  ],
  progress: [
    ["Milestone Status", "High"],
    ["Metrics Review", "Medium"],
  ],
  planning: [
    ["Roadmap Discussion", "High"],
    ["Capacity Planning", "Medium"],
  ],
  balanced: [
    ["Status Updates", "High"],
    ["Open Issues", "Medium"],
    ["Planning & Next Steps", "Low"],
  ],
};

function isFocusMode(value: unknown): value is FocusMode {
  return typeof value === "string" && value in FOCUS_TOPICS;
}

function meetingTitle(inputs: StepInputs) {
  const context = inputs.meeting_context;
  if (typeof context === "string" && context.trim()) {
    return context.trim();
  }
  const parsed = contextObjectSchema.safeParse(context);
  if (parsed.success) {
    const title = parsed.data.meeting_title ?? parsed.data.title;
    if (title) {
      return title;
    }
  }
  const calendar = calendarSchema.safeParse(inputs.calendar);
  return calendar.success && calendar.data.meetings.length ? calendar.data.meetings[0].title : "Team Meeting";
}

function attendees(inputs: StepInputs) {
  const calendar = calendarSchema.safeParse(inputs.calendar);
  if (calendar.success) {
    return [...new Set(calendar.data.meetings.flatMap((meeting) => meeting.attendees))];
  }
  const context = contextObjectSchema.safeParse(inputs.meeting_context);
  return context.success ? context.data.participants ?? [] : [];
}

function displayName(email: string) {
  const local = email.split("@")[0] ?? email;
  return local
    .split(/[._-]+/)
    .filter(Boolean)
    .map((part) => part[0].toUpperCase() + part.slice(1))
    .join(" ");
}

function stub(name: string, produce: (inputs: StepInputs) => unknown, delayMs: number): ResearchStep {
  return {
    name,
    async execute(inputs: StepInputs, context: StepContext) {
      if (delayMs > 0) {
        await sleep(delayMs, undefined, { signal: context.signal });
      }
      context.logger.debug({ step: name }, "Running stub research step");
      return produce(inputs);
    },
  };
}

export function createStubSteps(options: { delayMs?: number } = {}): ResearchStep[] {
  const delayMs = options.delayMs ?? 0;
  return [
    stub(
      "calendar",
      (inputs) => ({
        source: "stub",
        meetings: [
          {
            title: meetingTitle(inputs),
            start: "2025-01-06T15:00:00.000Z",
            end: "2025-01-06T16:00:00.000Z",
            attendees: ["alex.morgan@example.com", "sam.lee@example.com"],
          },
        ],
      }),
      delayMs,
    ),
    stub(
      "people_research",
      (inputs) => ({
        profiles: attendees(inputs).map((email) => ({
          email,
          name: displayName(email),
          role: "unknown",
          recent_activity: [],
        })),
      }),
      delayMs,
    ),
    stub(
      "technical_context",
      (inputs) => ({
        topic: meetingTitle(inputs),
        repositories: [],
        open_issues: [],
        documentation: [],
      }),
      delayMs,
    ),
    stub(
      "slack_context",
      (inputs) => ({
        summary: `No recent discussion found for ${meetingTitle(inputs)}`,
        channels: [],
        highlights: [],
      }),
      delayMs,
    ),
    stub(
      "agenda_builder",
      (inputs) => {
        const focusMode = isFocusMode(inputs.focus_mode) ? inputs.focus_mode : "balanced";
        const stakeholders = attendees(inputs).slice(0, 2);
        return {
          meeting_title: meetingTitle(inputs),
          estimated_duration: "60 minutes",
          focus_mode: focusMode,
          agenda_items: FOCUS_TOPICS[focusMode].map(([title, priority]) => ({
            title,
            priority,
            stakeholders: stakeholders.length ? stakeholders : ["Team Lead"],
          })),
        };
      },
      delayMs,
    ),
    stub(
      "preread_collector",
      (inputs) => {
        const agenda = agendaSchema.safeParse(inputs.agenda);
        const items = agenda.success ? agenda.data.agenda_items.map((item) => item.title) : [];
        return {
          meeting_title: meetingTitle(inputs),
          preread_summary: items.length
            ? `Background for ${items.length} agenda items`
            : "No pre-read material found",
          documents: [],
          action_items_context: items,
        };
      },
      delayMs,
    ),
    stub(
      "context_briefing",
      (inputs) => {
        const roles = rolesSchema.safeParse(inputs.participant_roles);
        const entries = roles.success ? Object.entries(roles.data) : [];
        return {
          meeting_title: meetingTitle(inputs),
          briefings: Object.fromEntries(
            entries.map(([participant, role]) => [
              participant,
              {
                role_focus: role,
                key_changes: [],
                current_blockers: [],
                pending_decisions: [],
                action_items: [],
              },
            ]),
          ),
        };
      },
      delayMs,
    ),
    stub(
      "coordinator",
      (inputs) => {
        const sections = ["calendar", "people_research", "technical_context", "slack_context", "agenda"].filter(
          (key) => inputs[key] !== undefined,
        );
        return {
          meeting_title: meetingTitle(inputs),
          sections,
          briefing: `Briefing for ${meetingTitle(inputs)} compiled from ${sections.length ? sections.join(", ") : "no prior research"}`,
        };
      },
      delayMs,
    ),
  ];
}
