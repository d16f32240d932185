import type { StepDescriptor } from "../types/job";

type CatalogEntry = Omit<StepDescriptor, "optional" | "enabled">;

// Read/produce wiring shared by every workflow shape. Seed keys such as
// meeting_context and participant_roles are never produced by a step.
export const STEP_CATALOG: Record<string, CatalogEntry> = {
  calendar: {
    name: "calendar",
    reads: ["meeting_context", "user_preferences"],
    produces: ["calendar"],
  },
  people_research: {
    name: "people_research",
    reads: ["calendar", "meeting_context"],
    produces: ["people_research"],
  },
  technical_context: {
    name: "technical_context",
    reads: ["calendar", "meeting_context"],
    produces: ["technical_context"],
  },
  slack_context: {
    name: "slack_context",
    reads: ["calendar", "people_research", "meeting_context"],
    produces: ["slack_context"],
  },
  agenda_builder: {
    name: "agenda_builder",
    reads: ["meeting_context", "focus_mode", "calendar", "technical_context", "slack_context"],
    produces: ["agenda"],
  },
  preread_collector: {
    name: "preread_collector",
    reads: ["meeting_context", "agenda"],
    produces: ["preread_documents"],
  },
  context_briefing: {
    name: "context_briefing",
    reads: ["meeting_context", "participant_roles", "agenda"],
    produces: ["context_briefings"],
  },
  coordinator: {
    name: "coordinator",
    reads: [
      "meeting_context",
      "user_preferences",
      "calendar",
      "people_research",
      "technical_context",
      "slack_context",
      "agenda",
    ],
    produces: ["coordinator", "final_output"],
  },
};

function required(name: string): StepDescriptor {
  return { ...STEP_CATALOG[name], optional: false, enabled: true };
}

function optional(name: string, enabled: boolean): StepDescriptor {
  return { ...STEP_CATALOG[name], optional: true, enabled };
}

/** Required step for names outside the catalog: reads nothing, writes under its own name. */
export function describeStep(name: string): StepDescriptor {
  if (name in STEP_CATALOG) {
    return required(name);
  }
  return { name, reads: [], produces: [name], optional: false, enabled: true };
}

export function countEnabled(steps: readonly StepDescriptor[]) {
  return steps.filter((step) => !step.optional || step.enabled).length;
}

export function fullWorkflowSteps(flags: { includeSlack: boolean; includeAgenda: boolean }): StepDescriptor[] {
  return [
    required("calendar"),
    required("people_research"),
    required("technical_context"),
    optional("slack_context", flags.includeSlack),
    optional("agenda_builder", flags.includeAgenda),
    required("coordinator"),
  ];
}

export function customWorkflowSteps(names: readonly string[]): StepDescriptor[] {
  return names.map(describeStep);
}

export function agendaWorkflowSteps(hasParticipantRoles: boolean): StepDescriptor[] {
  return [
    required("agenda_builder"),
    required("preread_collector"),
    optional("context_briefing", hasParticipantRoles),
  ];
}
