import { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import {
  handleGetSession,
  handleGetSessionStatus,
  handleHealth,
  handleHeartbeat,
  handleListSessions,
  handleReleaseSession,
  handleStartSession,
  handleUpdateResumeToken,
} from "./sessions.controller.js";
import { $ref } from "../../plugins/schemas.js";
import {
  CreateSessionRequest,
  ListSessionsRequest,
  ReleaseSessionRequest,
  SessionRequest,
  UpdateResumeTokenRequest,
} from "./sessions.schema.js";

async function routes(server: FastifyInstance) {
  server.get(
    "/health",
    {
      schema: {
        operationId: "health",
        description: "Live session count and capacity",
        tags: ["Health"],
        summary: "Live session count and capacity",
      },
    },
    async (_request: FastifyRequest, reply: FastifyReply) => handleHealth(server, reply),
  );

  server.post(
    "/sessions",
    {
      schema: {
        operationId: "start_session",
        description: "Spin a browser session for an owner and persist it",
        tags: ["Sessions"],
        summary: "Start a session",
        body: $ref("CreateSession"),
      },
    },
    async (request: CreateSessionRequest, reply: FastifyReply) =>
      handleStartSession(server, request, reply),
  );

  server.get(
    "/sessions",
    {
      schema: {
        operationId: "list_sessions",
        description: "List sessions live in this process, optionally for one owner",
        tags: ["Sessions"],
        summary: "List live sessions",
        querystring: $ref("ListSessionsQuery"),
      },
    },
    async (request: ListSessionsRequest, reply: FastifyReply) =>
      handleListSessions(server, request, reply),
  );

  server.get(
    "/sessions/:sessionId",
    {
      schema: {
        operationId: "get_session",
        description: "Get a session, from memory when live here and from the store otherwise",
        tags: ["Sessions"],
        summary: "Get session details",
      },
    },
    async (request: SessionRequest, reply: FastifyReply) => handleGetSession(server, request, reply),
  );

  server.get(
    "/sessions/:sessionId/status",
    {
      schema: {
        operationId: "get_session_status",
        description: "Get the lifecycle status of a session",
        tags: ["Sessions"],
        summary: "Get session status",
      },
    },
    async (request: SessionRequest, reply: FastifyReply) =>
      handleGetSessionStatus(server, request, reply),
  );

  server.post(
    "/sessions/:sessionId/heartbeat",
    {
      schema: {
        operationId: "heartbeat_session",
        description: "Record owner activity for a live session",
        tags: ["Sessions"],
        summary: "Heartbeat a session",
      },
    },
    async (request: SessionRequest, reply: FastifyReply) => handleHeartbeat(server, request, reply),
  );

  server.put(
    "/sessions/:sessionId/resume-token",
    {
      schema: {
        operationId: "update_resume_token",
        description: "Store the latest checkpoint the session can be resumed from",
        tags: ["Sessions"],
        summary: "Update resume token",
        body: $ref("UpdateResumeToken"),
      },
    },
    async (request: UpdateResumeTokenRequest, reply: FastifyReply) =>
      handleUpdateResumeToken(server, request, reply),
  );

  server.post(
    "/sessions/:sessionId/release",
    {
      schema: {
        operationId: "release_session",
        description: "End a session as completed or failed and release its browser",
        tags: ["Sessions"],
        summary: "Release a session",
        body: $ref("ReleaseSession"),
      },
    },
    async (request: ReleaseSessionRequest, reply: FastifyReply) =>
      handleReleaseSession(server, request, reply),
  );
}

export default routes;
