import {
  type ActuatorFailureKind,
  type ActuatorPort,
  type BanAttempt,
  type LoggerPort,
  type NameLookup,
  type PrivilegePort,
  type ServerId,
  type UserId,
  isRecord,
  silentLogger,
} from "bansync-core";

export interface PlatformClientConfig {
  /** Base URL of the platform's REST API, without a trailing slash. */
  baseUrl: string;
  /** Sent as `Authorization: Bearer <token>`. */
  token?: string;
  /** Per-request timeout in milliseconds. */
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: LoggerPort;
}

export const DEFAULT_TIMEOUT_MS = 10_000;

/** Raised by request(); `kind` classifies the failure for the ban workflow. */
export class PlatformError extends Error {
  constructor(
    message: string,
    public readonly kind: ActuatorFailureKind,
    public readonly status?: number,
  ) {
    super(message);
    this.name = "PlatformError";
  }
}

function kindForStatus(status: number): ActuatorFailureKind {
  if (status === 401 || status === 403) return "forbidden";
  if (status === 404 || status === 502 || status === 503 || status === 504) return "unreachable";
  return "other";
}

/**
 * REST client for the chat platform.
 *
 *   PUT  /servers/{serverId}/bans/{userId}                     { reason }
 *   GET  /users/{userId}                                       -> { displayName }
 *   GET  /servers/{serverId}/members/{actorId}/permissions     -> { administrator }
 *
 * Every call settles within the configured timeout.
 */
export class HttpPlatformClient implements ActuatorPort, PrivilegePort {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly log: LoggerPort;

  constructor(private readonly config: PlatformClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? fetch;
    this.log = config.logger ?? silentLogger;
  }

  private async request(method: string, path: string, body?: unknown): Promise<unknown> {
    const headers: Record<string, string> = { accept: "application/json" };
    if (body !== undefined) headers["content-type"] = "application/json";
    if (this.config.token) headers["authorization"] = `Bearer ${this.config.token}`;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new PlatformError(`HTTP ${response.status} ${method} ${path}`, kindForStatus(response.status), response.status);
      }
      const text = await response.text();
      return text ? JSON.parse(text) : undefined;
    } catch (error) {
      if (error instanceof PlatformError) throw error;
      if (error instanceof Error && error.name === "AbortError") {
        throw new PlatformError(`Request timeout after ${this.timeoutMs}ms`, "unreachable");
      }
      if (error instanceof SyntaxError) {
        throw new PlatformError(`Invalid JSON from ${method} ${path}`, "other");
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new PlatformError(`Request failed: ${message}`, "unreachable");
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async banUser(serverId: ServerId, userId: UserId, reason: string): Promise<BanAttempt> {
    try {
      await this.request("PUT", `/servers/${encodeURIComponent(serverId)}/bans/${encodeURIComponent(userId)}`, { reason });
      return { ok: true };
    } catch (error) {
      if (error instanceof PlatformError) return { ok: false, failure: { kind: error.kind, message: error.message } };
      throw error;
    }
  }

  async resolveUserDisplayName(userId: UserId): Promise<NameLookup> {
    try {
      const body = await this.request("GET", `/users/${encodeURIComponent(userId)}`);
      if (isRecord(body) && typeof body.displayName === "string" && body.displayName) {
        return { ok: true, name: body.displayName };
      }
      return { ok: false };
    } catch (error) {
      if (!(error instanceof PlatformError)) throw error;
      if (error.status !== 404) this.log.warn("user lookup failed", { userId, error: error.message });
      return { ok: false };
    }
  }

  async isPrivileged(actorId: UserId, serverId: ServerId): Promise<boolean> {
    try {
      const body = await this.request(
        "GET",
        `/servers/${encodeURIComponent(serverId)}/members/${encodeURIComponent(actorId)}/permissions`,
      );
      return isRecord(body) && body.administrator === true;
    } catch (error) {
      if (!(error instanceof PlatformError)) throw error;
      this.log.warn("permission lookup failed; treating as unprivileged", { actorId, serverId, error: error.message });
      return false;
    }
  }
}
