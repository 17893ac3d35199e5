import { FastifyInstance, FastifyReply } from "fastify";
import { SessionStatus } from "../../types/session.js";
import { getErrors, isSessionError } from "../../utils/errors.js";
import {
  CreateSessionRequest,
  ListSessionsRequest,
  ReleaseSessionRequest,
  SessionRequest,
  UpdateResumeTokenRequest,
} from "./sessions.schema.js";

const sendError = (
  server: FastifyInstance,
  reply: FastifyReply,
  e: unknown,
  message: string,
) => {
  const statusCode = isSessionError(e) ? e.statusCode : 500;
  if (statusCode >= 500) {
    server.log.error({ err: e }, message);
  } else {
    server.log.warn({ err: e }, message);
  }
  return reply.code(statusCode).send({ success: false, message: getErrors(e) });
};

export const handleStartSession = async (
  server: FastifyInstance,
  request: CreateSessionRequest,
  reply: FastifyReply,
) => {
  try {
    const { owner, targetURL } = request.body;
    const id = await server.sessionManager.startSession(owner, targetURL);
    return reply.send({ id, status: SessionStatus.Active });
  } catch (e: unknown) {
    return sendError(server, reply, e, "Failed starting session");
  }
};

export const handleListSessions = async (
  server: FastifyInstance,
  request: ListSessionsRequest,
  reply: FastifyReply,
) => {
  return reply.send({ sessions: server.sessionManager.listSessions(request.query.owner) });
};

export const handleGetSession = async (
  server: FastifyInstance,
  request: SessionRequest,
  reply: FastifyReply,
) => {
  try {
    return reply.send(await server.sessionManager.getSession(request.params.sessionId));
  } catch (e: unknown) {
    return sendError(server, reply, e, "Failed getting session");
  }
};

export const handleGetSessionStatus = async (
  server: FastifyInstance,
  request: SessionRequest,
  reply: FastifyReply,
) => {
  const { sessionId } = request.params;
  try {
    const status = await server.sessionManager.getStatus(sessionId);
    return reply.send({ id: sessionId, status });
  } catch (e: unknown) {
    return sendError(server, reply, e, "Failed getting session status");
  }
};

export const handleHeartbeat = async (
  server: FastifyInstance,
  request: SessionRequest,
  reply: FastifyReply,
) => {
  try {
    await server.sessionManager.heartbeat(request.params.sessionId);
    return reply.send({ success: true });
  } catch (e: unknown) {
    return sendError(server, reply, e, "Failed recording heartbeat");
  }
};

export const handleUpdateResumeToken = async (
  server: FastifyInstance,
  request: UpdateResumeTokenRequest,
  reply: FastifyReply,
) => {
  try {
    await server.sessionManager.updateResumeToken(request.params.sessionId, request.body.resumeToken);
    return reply.send({ success: true });
  } catch (e: unknown) {
    return sendError(server, reply, e, "Failed updating resume token");
  }
};

export const handleReleaseSession = async (
  server: FastifyInstance,
  request: ReleaseSessionRequest,
  reply: FastifyReply,
) => {
  try {
    const result = await server.sessionManager.terminate(request.params.sessionId, request.body.outcome);
    return reply.send({
      success: true,
      status: result.status,
      alreadyTerminated: result.type === "already-terminated",
    });
  } catch (e: unknown) {
    return sendError(server, reply, e, "Failed releasing session");
  }
};

export const handleHealth = async (server: FastifyInstance, reply: FastifyReply) => {
  return reply.send({ status: "ok", ...server.sessionManager.stats() });
};
