import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { FastifyInstance } from "fastify";
import buildFastifyServer from "../../../build-server.js";
import { EngineConfig } from "../../../config.js";
import { SimulatedDriverAdapter } from "../../../drivers/simulated-driver.js";
import { InMemorySessionStore } from "../../../storage/in-memory-session-store.js";
import { SessionStatus } from "../../../types/session.js";
import { makeRecord } from "../../../runtime/__tests__/helpers.js";

const config: EngineConfig = {
  store: { kind: "memory" },
  driver: { kind: "simulated" },
  maxSessions: 2,
  heartbeatTimeoutMs: 60_000,
  heartbeatSweepIntervalMs: 10_000,
  spinDeadlineMs: 1_000,
  resumeDeadlineMs: 1_000,
  releaseDeadlineMs: 1_000,
  recoveryConcurrency: 2,
};

describe("sessions routes", () => {
  let store: InMemorySessionStore;
  let driver: SimulatedDriverAdapter;
  let server: FastifyInstance;
  let closed: boolean;

  async function build(overrides: Partial<EngineConfig> = {}) {
    server = await buildFastifyServer(
      { config: { ...config, ...overrides }, store, driver },
      { logger: false },
    );
    await server.ready();
    return server;
  }

  async function startSession(owner: string = "owner-1"): Promise<string> {
    const response = await server.inject({
      method: "POST",
      url: "/v1/sessions",
      payload: { owner, targetURL: "https://example.com/job" },
    });
    expect(response.statusCode).toBe(200);
    return response.json().id;
  }

  beforeEach(() => {
    store = new InMemorySessionStore();
    driver = new SimulatedDriverAdapter();
    closed = false;
  });

  afterEach(async () => {
    if (!closed) {
      await server.close();
    }
  });

  it("reports live sessions and capacity", async () => {
    await build();

    const response = await server.inject({ method: "GET", url: "/v1/health" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: "ok", live: 0, maxSessions: 2, available: 2 });
  });

  it("starts a session and serves its status and details", async () => {
    await build();

    const id = await startSession();
    const status = await server.inject({ method: "GET", url: `/v1/sessions/${id}/status` });
    const details = await server.inject({ method: "GET", url: `/v1/sessions/${id}` });

    expect(status.json()).toEqual({ id, status: SessionStatus.Active });
    expect(details.json()).toEqual(
      expect.objectContaining({
        id,
        owner: "owner-1",
        targetURL: "https://example.com/job",
        status: SessionStatus.Active,
      }),
    );
    expect((await store.get(id))?.status).toBe(SessionStatus.Active);
  });

  it("rejects an invalid start request", async () => {
    await build();

    const response = await server.inject({
      method: "POST",
      url: "/v1/sessions",
      payload: { owner: "", targetURL: "not-a-url" },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual(
      expect.objectContaining({
        code: "FST_ERR_VALIDATION",
        message: "body/owner must NOT have fewer than 1 characters",
      }),
    );
    expect(driver.getMetrics().totalSpun).toBe(0);
  });

  it("rejects a start request whose target is not a URL", async () => {
    await build();

    const response = await server.inject({
      method: "POST",
      url: "/v1/sessions",
      payload: { owner: "owner-1", targetURL: "not-a-url" },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().code).toBe("FST_ERR_VALIDATION");
  });

  it("rejects an empty owner filter when listing", async () => {
    await build();

    const response = await server.inject({ method: "GET", url: "/v1/sessions?owner=" });

    expect(response.statusCode).toBe(400);
    expect(response.json().code).toBe("FST_ERR_VALIDATION");
  });

  it("answers 429 once the process is at capacity", async () => {
    await build({ maxSessions: 1 });
    await startSession();

    const response = await server.inject({
      method: "POST",
      url: "/v1/sessions",
      payload: { owner: "owner-2", targetURL: "https://example.com/job" },
    });

    expect(response.statusCode).toBe(429);
    expect(response.json()).toEqual({
      success: false,
      message: "Maximum number of sessions reached (1)",
    });
  });

  it("answers 404 for an unknown session", async () => {
    await build();

    const response = await server.inject({ method: "GET", url: "/v1/sessions/nope/status" });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ success: false, message: "Session not found: nope" });
  });

  it("records heartbeats and resume tokens", async () => {
    await build();
    const id = await startSession();

    const heartbeat = await server.inject({ method: "POST", url: `/v1/sessions/${id}/heartbeat` });
    const token = await server.inject({
      method: "PUT",
      url: `/v1/sessions/${id}/resume-token`,
      payload: { resumeToken: "ckpt-1" },
    });

    expect(heartbeat.json()).toEqual({ success: true });
    expect(token.json()).toEqual({ success: true });
    expect((await store.get(id))?.resumeToken).toBe("ckpt-1");
  });

  it("releases a session once and reports a repeat as already terminated", async () => {
    await build();
    const id = await startSession();

    const first = await server.inject({
      method: "POST",
      url: `/v1/sessions/${id}/release`,
      payload: { outcome: SessionStatus.Completed },
    });
    const second = await server.inject({
      method: "POST",
      url: `/v1/sessions/${id}/release`,
      payload: { outcome: SessionStatus.Failed },
    });

    expect(first.json()).toEqual({
      success: true,
      status: SessionStatus.Completed,
      alreadyTerminated: false,
    });
    expect(second.json()).toEqual({
      success: true,
      status: SessionStatus.Completed,
      alreadyTerminated: true,
    });
    expect(driver.getActiveCount()).toBe(0);
  });

  it("only accepts Completed or Failed as a release outcome", async () => {
    await build();
    const id = await startSession();

    const response = await server.inject({
      method: "POST",
      url: `/v1/sessions/${id}/release`,
      payload: { outcome: SessionStatus.Abandoned },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().code).toBe("FST_ERR_VALIDATION");
    expect((await store.get(id))?.status).toBe(SessionStatus.Active);
  });

  it("lists live sessions filtered by owner", async () => {
    await build();
    const mine = await startSession("owner-1");
    await startSession("owner-2");

    const response = await server.inject({ method: "GET", url: "/v1/sessions?owner=owner-1" });

    const sessions: Array<{ id: string }> = response.json().sessions;
    expect(sessions.map((session) => session.id)).toEqual([mine]);
  });

  it("recovers orphaned sessions before serving requests", async () => {
    await store.create(makeRecord({ id: "orphan", resumeToken: "ckpt-9" }));

    await build();
    const response = await server.inject({ method: "GET", url: "/v1/sessions" });

    const sessions: Array<{ id: string; status: SessionStatus }> = response.json().sessions;
    expect(sessions).toEqual([
      expect.objectContaining({ id: "orphan", status: SessionStatus.Active }),
    ]);
    expect(driver.getMetrics().totalResumed).toBe(1);
  });

  it("releases live browsers but keeps records when the server closes", async () => {
    await build();
    const id = await startSession();

    await server.close();
    closed = true;

    expect(driver.getActiveCount()).toBe(0);
    expect((await store.get(id))?.status).toBe(SessionStatus.Active);
  });
});
