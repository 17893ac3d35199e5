import { FastifyBaseLogger } from "fastify";
import { createClient } from "redis";
import { z } from "zod";
import { SessionRecord, SessionStatus } from "../types/session.js";
import { withDeadline, sleep } from "../utils/deadline.js";
import { DuplicateSessionError, StoreUnavailableError } from "../utils/errors.js";
import { SessionStore } from "./session-store.interface.js";

/**
 * The subset of the node-redis client the store relies on.
 */
export interface SessionStoreClient {
  connect(): Promise<unknown>;
  quit(): Promise<unknown>;
  eval(script: string, options: { keys: string[]; arguments: string[] }): Promise<unknown>;
  hGetAll(key: string): Promise<unknown>;
  sMembers(key: string): Promise<unknown>;
  on(event: string, listener: (...args: unknown[]) => void): unknown;
  removeAllListeners(): unknown;
}

function createRedisClient(url: string): SessionStoreClient {
  const client = createClient({ url });
  return {
    connect: () => client.connect(),
    quit: () => client.quit(),
    eval: (script, options) => client.eval(script, options),
    hGetAll: (key) => client.hGetAll(key),
    sMembers: (key) => client.sMembers(key),
    on: (event, listener) => client.on(event, listener),
    removeAllListeners: () => client.removeAllListeners(),
  };
}

export interface RedisSessionStoreOptions {
  url: string;
  logger: FastifyBaseLogger;
  keyPrefix?: string;
  /** Deadline applied to every Redis round trip. */
  operationTimeoutMs?: number;
  maxConnectRetries?: number;
  clientFactory?: (url: string) => SessionStoreClient;
}

// KEYS: record, status set. ARGV: id, field/value pairs.
const CREATE_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 1 then return 0 end
redis.call('HSET', KEYS[1], unpack(ARGV, 2))
redis.call('SADD', KEYS[2], ARGV[1])
return 1
`;

// KEYS: record, from set, to set. ARGV: from, to, at, id.
const COMPARE_AND_SET_SCRIPT = `
local current = redis.call('HGET', KEYS[1], 'status')
if current ~= ARGV[1] then return 0 end
redis.call('HSET', KEYS[1], 'status', ARGV[2], 'statusChangedAt', ARGV[3])
redis.call('SMOVE', KEYS[2], KEYS[3], ARGV[4])
return 1
`;

// KEYS: record. ARGV: timestamp.
const TOUCH_SCRIPT = `
local current = redis.call('HGET', KEYS[1], 'lastActiveAt')
if not current then return 0 end
if tonumber(ARGV[1]) > tonumber(current) then
  redis.call('HSET', KEYS[1], 'lastActiveAt', ARGV[1])
end
return 1
`;

// KEYS: record. ARGV: token.
const SET_RESUME_TOKEN_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 0 then return 0 end
redis.call('HSET', KEYS[1], 'resumeToken', ARGV[1])
return 1
`;

const PersistedSessionSchema = z.object({
  id: z.string().min(1),
  owner: z.string(),
  targetURL: z.string(),
  resumeToken: z.string().optional(),
  status: z.nativeEnum(SessionStatus),
  createdAt: z.coerce.number().int().nonnegative(),
  lastActiveAt: z.coerce.number().int().nonnegative(),
  statusChangedAt: z.coerce.number().int().nonnegative(),
});

const HashSchema = z.record(z.string(), z.string());
const MembersSchema = z.array(z.string());

export function encodeRecord(record: SessionRecord): string[] {
  const fields: string[] = [
    "id",
    record.id,
    "owner",
    record.owner,
    "targetURL",
    record.targetURL,
    "status",
    record.status,
    "createdAt",
    String(record.createdAt),
    "lastActiveAt",
    String(record.lastActiveAt),
    "statusChangedAt",
    String(record.statusChangedAt),
  ];
  if (record.resumeToken !== undefined) {
    fields.push("resumeToken", record.resumeToken);
  }
  return fields;
}

/**
 * Returns null for a missing record (empty hash). Throws a ZodError for a
 * hash that does not describe a session.
 */
export function decodeRecord(hash: Record<string, string>): SessionRecord | null {
  if (Object.keys(hash).length === 0) {
    return null;
  }
  return PersistedSessionSchema.parse(hash);
}

/**
 * Session store backed by Redis. Each record is a hash; each status has an
 * index set so `queryByStatus` does not scan the keyspace. Every mutation is a
 * Lua script and therefore atomic on the server.
 */
export class RedisSessionStore implements SessionStore {
  private client: SessionStoreClient | null = null;
  private logger: FastifyBaseLogger;
  private readonly url: string;
  private readonly keyPrefix: string;
  private readonly operationTimeoutMs: number;
  private readonly maxConnectRetries: number;
  private readonly clientFactory: (url: string) => SessionStoreClient;

  constructor(options: RedisSessionStoreOptions) {
    this.url = options.url;
    this.logger = options.logger.child({ component: "RedisSessionStore" });
    this.keyPrefix = options.keyPrefix ?? "sessions";
    this.operationTimeoutMs = options.operationTimeoutMs ?? 2000;
    this.maxConnectRetries = options.maxConnectRetries ?? 3;
    this.clientFactory = options.clientFactory ?? createRedisClient;
  }

  /**
   * Connect with exponential backoff (1s, 2s, 4s, ...). Unlike optional
   * persistence, the engine cannot run without its store, so exhausting the
   * retries is fatal.
   */
  async initialize(): Promise<void> {
    let attempt = 0;

    while (attempt < this.maxConnectRetries) {
      const client = this.clientFactory(this.url);
      try {
        client.on("error", (err) => {
          this.logger.error({ err }, "[RedisSessionStore] Redis client error");
        });
        client.on("reconnecting", () => {
          this.logger.info("[RedisSessionStore] Redis client reconnecting...");
        });

        await client.connect();
        this.client = client;
        this.logger.info("[RedisSessionStore] Connected to Redis");
        return;
      } catch (error) {
        attempt++;
        client.removeAllListeners();
        this.logger.error(
          { err: error, attempt },
          `[RedisSessionStore] Failed to connect to Redis (attempt ${attempt}/${this.maxConnectRetries})`,
        );

        if (attempt >= this.maxConnectRetries) {
          throw new StoreUnavailableError("connect", error);
        }

        await sleep(Math.pow(2, attempt - 1) * 1000);
      }
    }
  }

  async close(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client.removeAllListeners();
      this.client = null;
      this.logger.info("[RedisSessionStore] Disconnected from Redis");
    }
  }

  async create(record: SessionRecord): Promise<void> {
    const created = await this.evalFlag("create", CREATE_SCRIPT, {
      keys: [this.recordKey(record.id), this.statusKey(record.status)],
      arguments: [record.id, ...encodeRecord(record)],
    });
    if (!created) {
      throw new DuplicateSessionError(record.id);
    }
  }

  async updateStatus(
    id: string,
    from: SessionStatus,
    to: SessionStatus,
    at: number,
  ): Promise<boolean> {
    return this.evalFlag("updateStatus", COMPARE_AND_SET_SCRIPT, {
      keys: [this.recordKey(id), this.statusKey(from), this.statusKey(to)],
      arguments: [from, to, String(at), id],
    });
  }

  async touch(id: string, timestamp: number): Promise<boolean> {
    return this.evalFlag("touch", TOUCH_SCRIPT, {
      keys: [this.recordKey(id)],
      arguments: [String(timestamp)],
    });
  }

  async setResumeToken(id: string, token: string): Promise<boolean> {
    return this.evalFlag("setResumeToken", SET_RESUME_TOKEN_SCRIPT, {
      keys: [this.recordKey(id)],
      arguments: [token],
    });
  }

  async queryByStatus(status: SessionStatus): Promise<SessionRecord[]> {
    const ids = MembersSchema.parse(
      await this.call("queryByStatus", (client) => client.sMembers(this.statusKey(status))),
    );

    const records = await Promise.all(ids.map((id) => this.get(id)));
    // The index set and the hash can disagree only transiently; trust the hash.
    return records.filter(
      (record): record is SessionRecord => record !== null && record.status === status,
    );
  }

  async get(id: string): Promise<SessionRecord | null> {
    const hash = HashSchema.parse(
      await this.call("get", (client) => client.hGetAll(this.recordKey(id))),
    );

    try {
      return decodeRecord(hash);
    } catch (error) {
      this.logger.error({ err: error, sessionId: id }, "[RedisSessionStore] Corrupt session record");
      return null;
    }
  }

  recordKey(id: string): string {
    return `${this.keyPrefix}:session:${id}`;
  }

  statusKey(status: SessionStatus): string {
    return `${this.keyPrefix}:status:${status}`;
  }

  private async evalFlag(
    operation: string,
    script: string,
    options: { keys: string[]; arguments: string[] },
  ): Promise<boolean> {
    const reply = await this.call(operation, (client) => client.eval(script, options));
    return Number(reply) === 1;
  }

  private async call<T>(
    operation: string,
    fn: (client: SessionStoreClient) => Promise<T>,
  ): Promise<T> {
    const client = this.client;
    if (!client) {
      throw new StoreUnavailableError(operation, new Error("not connected"));
    }

    try {
      return await withDeadline(fn(client), this.operationTimeoutMs, `redis ${operation}`);
    } catch (error) {
      throw new StoreUnavailableError(operation, error);
    }
  }
}
