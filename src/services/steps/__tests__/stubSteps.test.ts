import { describe, expect, it } from "vitest";
import { loadConfig } from "../../../config";
import { logger } from "../../../logger";
import { STEP_NAMES, StepContext, StepInputs } from "../../stepRegistry";
import { createStepRegistry, createStubSteps } from "../index";

const steps = new Map(createStubSteps().map((step) => [step.name, step]));

function run(name: string, inputs: StepInputs) {
  const step = steps.get(name);
  if (!step) {
    throw new Error(`no stub for ${name}`);
  }
  const context: StepContext = { jobId: "job-1", step: name, signal: new AbortController().signal, logger };
  return step.execute(inputs, context);
}

describe("stub research steps", () => {
  it("covers every known step", () => {
    expect([...steps.keys()]).toEqual([...STEP_NAMES]);
  });

  it("titles the calendar meeting after the meeting context", async () => {
    expect(await run("calendar", { meeting_context: "  Launch review " })).toMatchObject({
      meetings: [{ title: "Launch review", attendees: ["alex.morgan@example.com", "sam.lee@example.com"] }],
    });
    expect(await run("calendar", {})).toMatchObject({ meetings: [{ title: "Team Meeting" }] });
  });

  it("profiles attendees found on the calendar", async () => {
    const calendar = {
      meetings: [
        { title: "Sync", start: "", end: "", attendees: ["jo_ann.smith@example.com", "kim@example.com"] },
        { title: "Sync 2", start: "", end: "", attendees: ["kim@example.com"] },
      ],
    };

    expect(await run("people_research", { calendar })).toEqual({
      profiles: [
        { email: "jo_ann.smith@example.com", name: "Jo Ann Smith", role: "unknown", recent_activity: [] },
        { email: "kim@example.com", name: "Kim", role: "unknown", recent_activity: [] },
      ],
    });
  });

  it("builds a focus-specific agenda with participants as stakeholders", async () => {
    const agenda = await run("agenda_builder", {
      meeting_context: { meeting_title: "Incident follow-up", participants: ["ops@example.com"] },
      focus_mode: "design",
    });

    expect(agenda).toEqual({
      meeting_title: "Incident follow-up",
      estimated_duration: "60 minutes",
      focus_mode: "design",
      agenda_items: [
        { title: "Design Review", priority: "High", stakeholders: ["ops@example.com"] },
        { title: "Architecture Decisions", priority: "Medium", stakeholders: ["ops@example.com"] },
      ],
    });
  });

  it("falls back to a balanced agenda for unknown focus modes", async () => {
    expect(await run("agenda_builder", { focus_mode: "vibes" })).toMatchObject({
      focus_mode: "balanced",
      agenda_items: [
        { title: "Status Updates", stakeholders: ["Team Lead"] },
        { title: "Open Issues" },
        { title: "Planning & Next Steps" },
      ],
    });
  });

  it("summarizes the pre-read when no agenda is available", async () => {
    expect(await run("preread_collector", { meeting_context: "Retro" })).toEqual({
      meeting_title: "Retro",
      preread_summary: "No pre-read material found",
      documents: [],
      action_items_context: [],
    });
  });

  it("names the research sections the coordinator compiled", async () => {
    expect(await run("coordinator", { meeting_context: "Retro", calendar: {}, agenda: {} })).toEqual({
      meeting_title: "Retro",
      sections: ["calendar", "agenda"],
      briefing: "Briefing for Retro compiled from calendar, agenda",
    });
  });

  it("honours cancellation while simulating latency", async () => {
    const [calendar] = createStubSteps({ delayMs: 10_000 });
    const controller = new AbortController();
    const pending = calendar.execute({}, { jobId: "job-1", step: "calendar", signal: controller.signal, logger });
    controller.abort();

    await expect(pending).rejects.toMatchObject({ name: "AbortError" });
  });
});

describe("createStepRegistry", () => {
  it("uses stub steps by default", () => {
    const registry = createStepRegistry(loadConfig({}));

    expect(registry.names()).toEqual([...STEP_NAMES]);
  });

  it("uses http steps when configured", () => {
    const registry = createStepRegistry(
      loadConfig({ STEP_PROVIDER: "http", RESEARCH_TOOLS_URL: "http://tools.test/" }),
    );

    expect(registry.names()).toEqual([...STEP_NAMES]);
    expect(registry.has("coordinator")).toBe(true);
  });
});
