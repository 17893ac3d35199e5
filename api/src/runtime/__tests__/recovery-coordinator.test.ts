import { describe, it, expect, beforeEach, vi } from "vitest";
import { SimulatedDriverAdapter } from "../../drivers/simulated-driver.js";
import { BrowserDriverAdapter, DriverHandle, ResumeContext } from "../../drivers/types.js";
import { InMemorySessionStore } from "../../storage/in-memory-session-store.js";
import { SessionEventType, SessionStatus } from "../../types/session.js";
import { ResumeFailureError } from "../../utils/errors.js";
import { createEngine, FlakyStore, ManualClock, makeRecord } from "./helpers.js";

const DAY_MS = 24 * 60 * 60 * 1000;

function handleFor(sessionId: string): DriverHandle {
  return { id: `handle-${sessionId}`, sessionId, launchedAt: 0 };
}

function fakeDriver(
  resumeImpl: (token: string, context: ResumeContext) => Promise<DriverHandle> = async (
    _token,
    context,
  ) => handleFor(context.sessionId),
) {
  const spin = vi.fn(async (_targetURL: string, context: { sessionId: string }) =>
    handleFor(context.sessionId),
  );
  const resume = vi.fn(resumeImpl);
  const release = vi.fn(async (_handle: DriverHandle) => {});
  const driver: BrowserDriverAdapter = { spin, resume, release };
  return { driver, spin, resume, release };
}

describe("RecoveryCoordinator", () => {
  let clock: ManualClock;
  let store: InMemorySessionStore;

  beforeEach(() => {
    clock = new ManualClock(1_000_000);
    store = new InMemorySessionStore();
  });

  it("resumes an orphaned Active record from its checkpoint", async () => {
    await store.create(makeRecord({ id: "s2", resumeToken: "ckpt-42" }));
    const onResumed = vi.fn();
    const fake = fakeDriver();
    clock.advance(5_000);
    const engine = createEngine({ clock, store, driver: fake.driver, hooks: { onResumed } });

    const report = await engine.recovery.run();

    expect(report).toEqual({
      scanned: 1,
      claimed: 1,
      resumed: 1,
      failed: 0,
      claimsLost: 0,
      repaired: 0,
    });
    expect(await engine.manager.getStatus("s2")).toBe(SessionStatus.Active);
    expect(fake.resume).toHaveBeenCalledWith("ckpt-42", {
      sessionId: "s2",
      targetURL: "https://example.com/job",
    });
    expect(engine.registry.get("s2")?.handle).toEqual(handleFor("s2"));
    expect((await store.get("s2"))?.lastActiveAt).toBe(1_005_000);
    expect(engine.transitions.map((event) => event.type)).toEqual([
      SessionEventType.Resuming,
      SessionEventType.Resumed,
    ]);

    await engine.scheduler.drain(1000);
    expect(onResumed).toHaveBeenCalledWith(
      expect.objectContaining({ id: "s2", status: SessionStatus.Active, resumeToken: "ckpt-42" }),
    );
  });

  it("fails a record whose resume fails, and a repeat run leaves it alone", async () => {
    await store.create(makeRecord({ id: "s2", resumeToken: "ckpt-42" }));
    const onResumeFailed = vi.fn();
    const fake = fakeDriver(async () => {
      throw new Error("profile corrupt");
    });
    const engine = createEngine({ clock, store, driver: fake.driver, hooks: { onResumeFailed } });

    const first = await engine.recovery.run();
    const second = await engine.recovery.run();

    expect(first).toEqual({ scanned: 1, claimed: 1, resumed: 0, failed: 1, claimsLost: 0, repaired: 0 });
    expect(second).toEqual({ scanned: 0, claimed: 0, resumed: 0, failed: 0, claimsLost: 0, repaired: 0 });
    expect(await engine.manager.getStatus("s2")).toBe(SessionStatus.Failed);
    expect(fake.resume).toHaveBeenCalledTimes(1);
    expect(engine.transitions.map((event) => event.type)).toEqual([
      SessionEventType.Resuming,
      SessionEventType.ResumeFailed,
    ]);

    await engine.scheduler.drain(1000);
    expect(onResumeFailed).toHaveBeenCalledWith(
      expect.objectContaining({ id: "s2", status: SessionStatus.Failed }),
      expect.any(ResumeFailureError),
    );
  });

  it("lets exactly one of two racing coordinators claim a record", async () => {
    await store.create(makeRecord({ id: "s3", resumeToken: "ckpt-7" }));
    const slowResume = async (_token: string, context: ResumeContext) => {
      await new Promise((resolve) => setTimeout(resolve, 10));
      return handleFor(context.sessionId);
    };
    const first = fakeDriver(slowResume);
    const second = fakeDriver(slowResume);
    const a = createEngine({ clock, store, driver: first.driver });
    const b = createEngine({ clock, store, driver: second.driver });

    const [reportA, reportB] = await Promise.all([a.recovery.run(), b.recovery.run()]);

    expect(reportA.claimed + reportB.claimed).toBe(1);
    expect(reportA.claimsLost + reportB.claimsLost).toBe(1);
    expect(first.resume.mock.calls.length + second.resume.mock.calls.length).toBe(1);
    expect(a.registry.size() + b.registry.size()).toBe(1);
    expect((await store.get("s3"))?.status).toBe(SessionStatus.Active);
  });

  it("fails a record without a resume token without calling the driver", async () => {
    await store.create(makeRecord({ id: "s4" }));
    const fake = fakeDriver();
    const engine = createEngine({ clock, store, driver: fake.driver });

    const report = await engine.recovery.run();

    expect(report.failed).toBe(1);
    expect(fake.resume).not.toHaveBeenCalled();
    expect((await store.get("s4"))?.status).toBe(SessionStatus.Failed);
  });

  it("fails records older than the age cutoff without calling the driver", async () => {
    clock.current = 1_000_000 + DAY_MS + 1;
    await store.create(makeRecord({ id: "s5", resumeToken: "ckpt-1", createdAt: 1_000_000 }));
    const fake = fakeDriver();
    const engine = createEngine({ clock, store, driver: fake.driver, recovery: { maxAgeMs: DAY_MS } });

    const report = await engine.recovery.run();

    expect(report.failed).toBe(1);
    expect(fake.resume).not.toHaveBeenCalled();
    expect((await store.get("s5"))?.status).toBe(SessionStatus.Failed);
  });

  it("skips sessions live in this process", async () => {
    const fake = fakeDriver();
    const engine = createEngine({ clock, store, driver: fake.driver });
    await engine.manager.startSession("u1", "https://x");

    const report = await engine.recovery.run();

    expect(report.scanned).toBe(0);
    expect(fake.resume).not.toHaveBeenCalled();
  });

  it("is idempotent once every orphan is resolved", async () => {
    await store.create(makeRecord({ id: "s6", resumeToken: "ckpt-1" }));
    const fake = fakeDriver();
    const engine = createEngine({ clock, store, driver: fake.driver });

    await engine.recovery.run();
    const again = await engine.recovery.run();

    expect(again.scanned).toBe(0);
    expect(fake.resume).toHaveBeenCalledTimes(1);
  });

  it("fails a resume that overruns its deadline and releases the late handle", async () => {
    await store.create(makeRecord({ id: "s7", resumeToken: "ckpt-1" }));
    const slow = new SimulatedDriverAdapter({ launchDelayMs: 40 });
    const engine = createEngine({ clock, store, driver: slow, recovery: { resumeDeadlineMs: 5 } });

    const report = await engine.recovery.run();

    expect(report.failed).toBe(1);
    expect((await store.get("s7"))?.status).toBe(SessionStatus.Failed);

    await engine.scheduler.drain(1000);
    expect(slow.getActiveCount()).toBe(0);
    expect(slow.getMetrics().totalReleased).toBe(1);
  });

  it("caps the number of concurrent resume attempts", async () => {
    for (let i = 0; i < 5; i++) {
      await store.create(makeRecord({ id: `c-${i}`, resumeToken: `ckpt-${i}` }));
    }
    let inFlight = 0;
    let peak = 0;
    const fake = fakeDriver(async (_token, context) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 10));
      inFlight--;
      return handleFor(context.sessionId);
    });
    const engine = createEngine({ clock, store, driver: fake.driver, recovery: { concurrency: 2 } });

    const report = await engine.recovery.run();

    expect(report.resumed).toBe(5);
    expect(peak).toBe(2);
  });

  it("only considers idle records when asked to", async () => {
    await store.create(makeRecord({ id: "s8", resumeToken: "ckpt-1", lastActiveAt: 990_000 }));
    const fake = fakeDriver();
    const engine = createEngine({ clock, store, driver: fake.driver });

    expect((await engine.recovery.run({ minIdleMs: 60_000 })).scanned).toBe(0);
    clock.advance(60_000);
    expect((await engine.recovery.run({ minIdleMs: 60_000 })).resumed).toBe(1);
  });

  it("discards the new handle when the record moved on during the resume", async () => {
    await store.create(makeRecord({ id: "s9", resumeToken: "ckpt-1" }));
    const fake = fakeDriver(async (_token, context) => {
      await store.updateStatus(context.sessionId, SessionStatus.Resuming, SessionStatus.Failed, 1);
      return handleFor(context.sessionId);
    });
    const engine = createEngine({ clock, store, driver: fake.driver });

    const report = await engine.recovery.run();

    expect(report).toEqual({ scanned: 1, claimed: 1, resumed: 0, failed: 0, claimsLost: 0, repaired: 0 });
    expect(fake.release).toHaveBeenCalledWith(handleFor("s9"));
    expect(engine.registry.has("s9")).toBe(false);
    expect((await store.get("s9"))?.status).toBe(SessionStatus.Failed);
  });

  it("fails the claim and releases the handle when the resumed state cannot be recorded", async () => {
    await store.create(makeRecord({ id: "s3", resumeToken: "ckpt-3" }));
    const flaky = new FlakyStore(store);
    const onResumeFailed = vi.fn();
    const fake = fakeDriver(async (_token, context) => {
      flaky.failNext("updateStatus", 3);
      return handleFor(context.sessionId);
    });
    const engine = createEngine({ clock, store: flaky, driver: fake.driver, hooks: { onResumeFailed } });

    const report = await engine.recovery.run();

    expect(report).toEqual({ scanned: 1, claimed: 1, resumed: 0, failed: 1, claimsLost: 0, repaired: 0 });
    expect(fake.release).toHaveBeenCalledWith(handleFor("s3"));
    expect(engine.registry.has("s3")).toBe(false);
    expect((await store.get("s3"))?.status).toBe(SessionStatus.Failed);

    await engine.scheduler.drain(1000);
    expect(onResumeFailed).toHaveBeenCalledWith(
      expect.objectContaining({ id: "s3", status: SessionStatus.Failed }),
      expect.any(ResumeFailureError),
    );
  });

  it("keeps resolving a claim in the background while the store stays down", async () => {
    await store.create(makeRecord({ id: "s4", resumeToken: "ckpt-4" }));
    const flaky = new FlakyStore(store);
    const fake = fakeDriver(async (_token, context) => {
      flaky.failNext("updateStatus", 6);
      return handleFor(context.sessionId);
    });
    const engine = createEngine({ clock, store: flaky, driver: fake.driver });

    const report = await engine.recovery.run();
    await engine.scheduler.drain(1000);

    expect(report).toEqual({ scanned: 1, claimed: 1, resumed: 0, failed: 0, claimsLost: 0, repaired: 0 });
    expect(fake.release).toHaveBeenCalledTimes(1);
    expect(engine.registry.has("s4")).toBe(false);
    expect((await store.get("s4"))?.status).toBe(SessionStatus.Failed);
  });

  it("repairs records left in Resuming by a crashed coordinator", async () => {
    await store.create(
      makeRecord({ id: "stale", status: SessionStatus.Resuming, statusChangedAt: 1_000_000 - 600_001 }),
    );
    await store.create(
      makeRecord({ id: "fresh", status: SessionStatus.Resuming, statusChangedAt: 1_000_000 - 10 }),
    );
    const engine = createEngine({
      clock,
      store,
      driver: fakeDriver().driver,
      recovery: { resumingStaleAfterMs: 600_000 },
    });

    const report = await engine.recovery.run();

    expect(report.repaired).toBe(1);
    expect((await store.get("stale"))?.status).toBe(SessionStatus.Failed);
    expect((await store.get("fresh"))?.status).toBe(SessionStatus.Resuming);
  });

  it("leaves Resuming records alone when repair is disabled", async () => {
    await store.create(makeRecord({ id: "stale", status: SessionStatus.Resuming, statusChangedAt: 0 }));
    const engine = createEngine({ clock, store, driver: fakeDriver().driver });

    expect((await engine.recovery.run()).repaired).toBe(0);
    expect((await store.get("stale"))?.status).toBe(SessionStatus.Resuming);
  });

  it("serializes a terminate behind an in-flight recovery of the same session", async () => {
    await store.create(makeRecord({ id: "s10", resumeToken: "ckpt-1" }));
    const fake = fakeDriver(async (_token, context) => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      return handleFor(context.sessionId);
    });
    const engine = createEngine({ clock, store, driver: fake.driver });

    const run = engine.recovery.run();
    await new Promise((resolve) => setTimeout(resolve, 5));
    const terminated = engine.manager.terminate("s10", SessionStatus.Completed);

    expect((await run).resumed).toBe(1);
    expect(await terminated).toEqual({ type: "terminated", status: SessionStatus.Completed });
    expect(fake.release).toHaveBeenCalledWith(handleFor("s10"));
    expect((await store.get("s10"))?.status).toBe(SessionStatus.Completed);
  });

  it("re-runs on its interval over idle records only", async () => {
    vi.useFakeTimers();
    try {
      await store.create(
        makeRecord({ id: "idle", resumeToken: "ckpt-1", lastActiveAt: 1_000_000 - 120_000 }),
      );
      await store.create(makeRecord({ id: "busy", resumeToken: "ckpt-2", lastActiveAt: 1_000_000 }));
      const fake = fakeDriver();
      const engine = createEngine({
        clock,
        store,
        driver: fake.driver,
        recovery: { intervalMs: 1_000, orphanAfterMs: 60_000 },
      });

      engine.recovery.start();
      await vi.advanceTimersByTimeAsync(1_000);
      await engine.scheduler.drain(1000);
      engine.recovery.stop();

      expect(fake.resume).toHaveBeenCalledTimes(1);
      expect(fake.resume).toHaveBeenCalledWith("ckpt-1", {
        sessionId: "idle",
        targetURL: "https://example.com/job",
      });
      expect((await store.get("busy"))?.status).toBe(SessionStatus.Active);
      expect(engine.registry.has("busy")).toBe(false);
    } finally {
      vi.useRealTimers();
    }
  });

  it("joins a run already in progress", async () => {
    const engine = createEngine({ clock, store, driver: fakeDriver().driver });

    const first = engine.recovery.run();
    const second = engine.recovery.run();

    expect(second).toBe(first);
    await first;
  });
});
