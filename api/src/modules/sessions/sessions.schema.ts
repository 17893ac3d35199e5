import { FastifyRequest } from "fastify";
import { z } from "zod";
import { SessionStatus } from "../../types/session.js";

export const CreateSession = z.object({
  owner: z.string().min(1).describe("Identifier of the user or job that owns the session"),
  targetURL: z.string().url().describe("Page the automation job drives"),
});

export const UpdateResumeToken = z.object({
  resumeToken: z.string().min(1).describe("Opaque checkpoint reference understood by the driver"),
});

export const ReleaseSession = z.object({
  outcome: z
    .enum([SessionStatus.Completed, SessionStatus.Failed])
    .describe("How the job ended"),
});

export const ListSessionsQuery = z.object({
  owner: z.string().min(1).optional(),
});

export type CreateSessionBody = z.infer<typeof CreateSession>;
export type UpdateResumeTokenBody = z.infer<typeof UpdateResumeToken>;
export type ReleaseSessionBody = z.infer<typeof ReleaseSession>;
export type ListSessionsQuery = z.infer<typeof ListSessionsQuery>;

export interface SessionIdParams {
  sessionId: string;
}

export type CreateSessionRequest = FastifyRequest<{ Body: CreateSessionBody }>;
export type SessionRequest = FastifyRequest<{ Params: SessionIdParams }>;
export type UpdateResumeTokenRequest = FastifyRequest<{
  Params: SessionIdParams;
  Body: UpdateResumeTokenBody;
}>;
export type ReleaseSessionRequest = FastifyRequest<{ Params: SessionIdParams; Body: ReleaseSessionBody }>;
export type ListSessionsRequest = FastifyRequest<{ Querystring: ListSessionsQuery }>;

export const sessionSchemas = {
  CreateSession,
  UpdateResumeToken,
  ReleaseSession,
  ListSessionsQuery,
};

export default sessionSchemas;
