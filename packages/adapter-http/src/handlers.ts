/*
 * adapter-http/src/handlers.ts
 * ------------------------------------------------------------
 * Framework-agnostic HTTP handlers for the ban-sync service.
 *
 * You can wrap these in Fastify, Express, Hono, Next.js route handlers, etc.
 * Only dependency is the runtime-agnostic bansync-core.
 */

import type { BanSyncService, CallerContext, ErrorCode, Failure, Outcome } from "bansync-core";
import { DEFAULT_HISTORY_LIMIT, isRecord } from "bansync-core";

/** ---------------- types ---------------- */
export interface HandlerResult<T = unknown> {
  status: number;
  json: T;
  headers?: Record<string, string>;
}

export type HeaderBag = Record<string, string | string[] | undefined>;

export interface CallerRequest {
  /** Caller identity resolved by the gateway; undefined when headers were missing. */
  caller: CallerContext | undefined;
}

export interface NetworkRequest extends CallerRequest {
  /** Network name from the URL path or the JSON body. */
  name: unknown;
}

export interface SyncBanRequestBody extends CallerRequest {
  body: unknown;
}

export interface HistoryRequest extends CallerRequest {
  limit?: string | number | undefined;
}

export interface ErrorBody {
  ok: false;
  error: ErrorCode | "UNAUTHENTICATED" | "BAD_REQUEST";
  message: string;
  applied?: unknown;
}

/** ---------------- utils ---------------- */
const STATUS: Record<ErrorCode, number> = {
  PERMISSION_DENIED: 403,
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  ALREADY_EXISTS: 409,
  ALREADY_MEMBER: 409,
  NOT_MEMBER: 409,
  NO_NETWORKS: 422,
  ACTUATOR_FORBIDDEN: 502,
  ACTUATOR_UNREACHABLE: 502,
  ACTUATOR_FAILED: 502,
  PERSISTENCE_FAILURE: 500,
};

function ok<T>(json: T, status = 200): HandlerResult<{ ok: true; value: T }> {
  return { status, json: { ok: true, value: json } };
}

function err(status: number, error: ErrorBody["error"], message: string): HandlerResult<ErrorBody> {
  return { status, json: { ok: false, error, message } };
}

/** Map a service failure to HTTP; extra fields on the failure (e.g. `applied`) are passed through. */
export function fromFailure(f: Failure & { applied?: unknown }): HandlerResult<ErrorBody> {
  const res = err(STATUS[f.code], f.code, f.message);
  if (f.applied !== undefined) res.json.applied = f.applied;
  return res;
}

function reply<T>(res: Outcome<T> & { applied?: unknown }, status = 200): HandlerResult {
  return res.ok ? ok(res.value, status) : fromFailure(res);
}

function header(h: HeaderBag, key: string): string | undefined {
  const v = h[key];
  const s = Array.isArray(v) ? v[0] : v;
  return s && s.trim() ? s.trim() : undefined;
}

function field(body: unknown, key: string): unknown {
  return isRecord(body) ? body[key] : undefined;
}

function toInt(v: string | number | undefined, def: number, min: number, max: number): number {
  const n = typeof v === "number" ? v : (v ? parseInt(v, 10) : NaN);
  if (!Number.isFinite(n)) return def;
  return Math.max(min, Math.min(max, Math.trunc(n)));
}

const UNAUTHENTICATED = () => err(401, "UNAUTHENTICATED", "Missing caller identity headers");

/**
 * Caller identity as forwarded by the platform gateway:
 * x-server-id, x-server-name, x-actor-id, x-actor-name. Names default to the ids.
 */
export function callerFromHeaders(h: HeaderBag): CallerContext | undefined {
  const serverId = header(h, "x-server-id");
  const actorId = header(h, "x-actor-id");
  if (!serverId || !actorId) return undefined;
  return {
    serverId,
    serverName: header(h, "x-server-name") ?? serverId,
    actorId,
    actorName: header(h, "x-actor-name") ?? actorId,
  };
}

/** ---------------- handlers ---------------- */
export async function handleCreateNetwork(svc: BanSyncService, req: NetworkRequest): Promise<HandlerResult> {
  if (!req.caller) return UNAUTHENTICATED();
  if (typeof req.name !== "string") return err(400, "BAD_REQUEST", "name is required");
  return reply(await svc.createNetwork(req.caller, req.name), 201);
}

export async function handleJoinNetwork(svc: BanSyncService, req: NetworkRequest): Promise<HandlerResult> {
  if (!req.caller) return UNAUTHENTICATED();
  if (typeof req.name !== "string") return err(400, "BAD_REQUEST", "name is required");
  return reply(await svc.joinNetwork(req.caller, req.name));
}

export async function handleLeaveNetwork(svc: BanSyncService, req: NetworkRequest): Promise<HandlerResult> {
  if (!req.caller) return UNAUTHENTICATED();
  if (typeof req.name !== "string") return err(400, "BAD_REQUEST", "name is required");
  return reply(await svc.leaveNetwork(req.caller, req.name));
}

export async function handleListNetworks(svc: BanSyncService, req: CallerRequest): Promise<HandlerResult> {
  if (!req.caller) return UNAUTHENTICATED();
  return reply(await svc.listNetworksFor(req.caller));
}

export async function handleSyncBan(svc: BanSyncService, req: SyncBanRequestBody): Promise<HandlerResult> {
  if (!req.caller) return UNAUTHENTICATED();
  const rawUser = field(req.body, "userId");
  const userId = typeof rawUser === "number" && Number.isSafeInteger(rawUser) ? String(rawUser) : rawUser;
  if (typeof userId !== "string") return err(400, "BAD_REQUEST", "userId is required");
  const reason = field(req.body, "reason");
  if (reason !== undefined && typeof reason !== "string") return err(400, "BAD_REQUEST", "reason must be a string");
  return reply(await svc.syncBan(req.caller, userId, reason));
}

export async function handleRecentBans(svc: BanSyncService, req: HistoryRequest): Promise<HandlerResult> {
  if (!req.caller) return UNAUTHENTICATED();
  const limit = toInt(req.limit, DEFAULT_HISTORY_LIMIT, 0, 500);
  return reply(await svc.recentBans(req.caller, limit));
}

/** ---------------- convenience: factory to bind the service & caller lookup ---------------- */
export function makeHandlers(params: { service: BanSyncService; getCaller: () => CallerContext | undefined }) {
  const { service, getCaller } = params;
  return {
    createNetwork: (body: unknown) => handleCreateNetwork(service, { caller: getCaller(), name: field(body, "name") }),
    joinNetwork: (name: string) => handleJoinNetwork(service, { caller: getCaller(), name }),
    leaveNetwork: (name: string) => handleLeaveNetwork(service, { caller: getCaller(), name }),
    listNetworks: () => handleListNetworks(service, { caller: getCaller() }),
    syncBan: (body: unknown) => handleSyncBan(service, { caller: getCaller(), body }),
    recentBans: (q: { limit?: string | number }) => handleRecentBans(service, { caller: getCaller(), limit: q.limit }),
  };
}
