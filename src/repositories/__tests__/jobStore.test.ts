import { setTimeout as sleep } from "node:timers/promises";
import { describe, expect, it } from "vitest";
import { InMemoryJobStore } from "../jobStore";

function clock(...times: string[]) {
  let calls = 0;
  return () => new Date(times[Math.min(calls++, times.length - 1)]);
}

async function finish(store: InMemoryJobStore, jobId: string) {
  await store.update(jobId, (draft) => {
    draft.status = "running";
  });
  await store.update(jobId, (draft) => {
    draft.status = "completed";
  });
}

describe("InMemoryJobStore", () => {
  it("creates a started record with empty progress and results", async () => {
    const store = new InMemoryJobStore({ now: clock("2025-01-06T10:00:00.000Z") });
    const job = await store.create({ totalSteps: 3 });

    expect(job).toEqual({
      id: job.id,
      status: "started",
      created_at: "2025-01-06T10:00:00.000Z",
      updated_at: "2025-01-06T10:00:00.000Z",
      progress: { current_step: null, completed_steps: [], total_steps: 3 },
      results: {},
      error: null,
    });
    expect(job.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("records requested steps and focus mode only when given", async () => {
    const store = new InMemoryJobStore();
    const custom = await store.create({ totalSteps: 2, requestedSteps: ["calendar", "coordinator"] });
    const agenda = await store.create({ totalSteps: 2, focusMode: "design" });

    expect(custom.progress.requested_steps).toEqual(["calendar", "coordinator"]);
    expect("focus_mode" in custom.progress).toBe(false);
    expect(agenda.progress.focus_mode).toBe("design");
    expect("requested_steps" in agenda.progress).toBe(false);
  });

  it("returns null for unknown jobs and signals failed updates", async () => {
    const store = new InMemoryJobStore();

    expect(await store.get("missing")).toBeNull();
    expect(await store.update("missing", () => undefined)).toEqual({
      ok: false,
      reason: "not_found",
      message: "Job missing not found",
    });
  });

  it("serializes concurrent updates to the same job", async () => {
    const store = new InMemoryJobStore();
    const job = await store.create({ totalSteps: 2 });

    await Promise.all([
      store.update(job.id, async (draft) => {
        await sleep(10);
        draft.progress.completed_steps.push("calendar");
      }),
      store.update(job.id, (draft) => {
        draft.progress.completed_steps.push("people_research");
      }),
    ]);

    const stored = await store.get(job.id);
    expect(stored?.progress.completed_steps).toEqual(["calendar", "people_research"]);
  });

  it("lets updates to different jobs proceed independently", async () => {
    const store = new InMemoryJobStore();
    const slow = await store.create({ totalSteps: 1 });
    const fast = await store.create({ totalSteps: 1 });
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const pending = store.update(slow.id, async (draft) => {
      await gate;
      draft.progress.current_step = "calendar";
    });
    const result = await store.update(fast.id, (draft) => {
      draft.progress.current_step = "calendar";
    });

    expect(result.ok).toBe(true);
    expect((await store.get(slow.id))?.progress.current_step).toBeNull();
    release();
    await pending;
    expect((await store.get(slow.id))?.progress.current_step).toBe("calendar");
  });

  it("refuses to mutate terminal jobs", async () => {
    const store = new InMemoryJobStore();
    const job = await store.create({ totalSteps: 0 });
    await finish(store, job.id);
    const before = await store.get(job.id);

    const result = await store.update(job.id, (draft) => {
      draft.results.late = "value";
    });

    expect(result).toEqual({ ok: false, reason: "terminal", message: `Job ${job.id} is already completed` });
    expect(await store.get(job.id)).toEqual(before);
  });

  it("rejects updates that break the record invariants", async () => {
    const store = new InMemoryJobStore();
    const job = await store.create({ totalSteps: 2 });
    await store.update(job.id, (draft) => {
      draft.results.calendar = { meetings: [] };
      draft.progress.completed_steps.push("calendar");
    });

    const overwrite = await store.update(job.id, (draft) => {
      draft.results.calendar = { meetings: ["changed"] };
    });
    const skipAhead = await store.update(job.id, (draft) => {
      draft.status = "completed";
    });
    const silentFailure = await store.update(job.id, (draft) => {
      draft.status = "failed";
    });
    const rewrite = await store.update(job.id, (draft) => {
      draft.progress.completed_steps = ["people_research"];
    });
    const duplicate = await store.update(job.id, (draft) => {
      draft.progress.completed_steps.push("calendar");
    });

    expect(overwrite).toMatchObject({ ok: false, reason: "invalid_transition", message: "result calendar is already written" });
    expect(skipAhead).toMatchObject({ ok: false, message: "illegal status transition started -> completed" });
    expect(silentFailure).toMatchObject({ ok: false, message: "failed jobs must carry an error" });
    expect(rewrite).toMatchObject({ ok: false, message: "completed_steps is append-only" });
    expect(duplicate).toMatchObject({ ok: false, message: "completed_steps must not contain duplicates" });
    expect((await store.get(job.id))?.results).toEqual({ calendar: { meetings: [] } });
  });

  it("hands out copies rather than live records", async () => {
    const store = new InMemoryJobStore();
    const job = await store.create({ totalSteps: 1 });
    const output = { meetings: ["standup"] };
    await store.update(job.id, (draft) => {
      draft.results.calendar = output;
    });

    output.meetings.push("retro");
    const snapshot = await store.get(job.id);
    snapshot?.progress.completed_steps.push("calendar");

    expect(await store.get(job.id)).toMatchObject({
      progress: { completed_steps: [] },
      results: { calendar: { meetings: ["standup"] } },
    });
  });

  it("never moves updated_at backwards", async () => {
    const store = new InMemoryJobStore({
      now: clock("2025-01-06T10:00:05.000Z", "2025-01-06T10:00:01.000Z", "2025-01-06T10:00:09.000Z"),
    });
    const job = await store.create({ totalSteps: 1 });

    const first = await store.update(job.id, (draft) => {
      draft.status = "running";
    });
    const second = await store.update(job.id, (draft) => {
      draft.progress.current_step = "calendar";
    });

    expect(first.ok && first.job.updated_at).toBe("2025-01-06T10:00:05.000Z");
    expect(second.ok && second.job.updated_at).toBe("2025-01-06T10:00:09.000Z");
  });

  it("lists summaries newest first with a derived workflow type", async () => {
    const store = new InMemoryJobStore();
    const full = await store.create({ totalSteps: 4 });
    const custom = await store.create({ totalSteps: 1, requestedSteps: ["calendar"] });
    const agenda = await store.create({ totalSteps: 2, focusMode: "balanced" });
    await store.update(full.id, (draft) => {
      draft.results.calendar = { meetings: [] };
    });

    const jobs = await store.list();

    expect(jobs.map((job) => [job.job_id, job.type])).toEqual([
      [agenda.id, "agenda"],
      [custom.id, "custom"],
      [full.id, "full"],
    ]);
    expect(jobs.every((job) => !("results" in job))).toBe(true);
  });

  it("creates distinct ids under concurrent creation", async () => {
    const store = new InMemoryJobStore();
    const jobs = await Promise.all(Array.from({ length: 50 }, () => store.create({ totalSteps: 1 })));

    expect(new Set(jobs.map((job) => job.id)).size).toBe(50);
    expect(store.size).toBe(50);
  });

  it("deletes jobs once", async () => {
    const store = new InMemoryJobStore();
    const job = await store.create({ totalSteps: 1 });

    expect(await store.delete(job.id)).toBe(true);
    expect(await store.delete(job.id)).toBe(false);
    expect(await store.get(job.id)).toBeNull();
  });

  it("evicts the oldest terminal jobs beyond the retention cap", async () => {
    const store = new InMemoryJobStore({ maxRetainedJobs: 2 });
    const done = await store.create({ totalSteps: 0 });
    const live = await store.create({ totalSteps: 1 });
    await finish(store, done.id);

    const latest = await store.create({ totalSteps: 1 });

    expect(store.size).toBe(2);
    expect(await store.get(done.id)).toBeNull();
    expect(await store.get(live.id)).not.toBeNull();
    expect(await store.get(latest.id)).not.toBeNull();
  });

  it("keeps running jobs even when over the cap", async () => {
    const store = new InMemoryJobStore({ maxRetainedJobs: 1 });
    await store.create({ totalSteps: 1 });
    await store.create({ totalSteps: 1 });

    expect(store.size).toBe(2);
  });
});
