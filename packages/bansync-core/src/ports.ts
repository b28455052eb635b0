import type { DocumentName, JsonValue, Millis, ServerId, UserId } from "./schema";

/**
 * Durable document storage.
 * - read: returns the parsed document; MUST throw PersistenceError if it is missing or unreadable.
 * - write: replaces the whole document atomically (old or new content survives an interruption, never a mix).
 * - exists: used only by initializeDocuments at start-up.
 */
export interface BlobStorePort {
    read(name: DocumentName): Promise<unknown>;
    write(name: DocumentName, doc: JsonValue): Promise<void>;
    exists(name: DocumentName): Promise<boolean>;
}

/** Privilege oracle: can this actor run ban-sync commands on this server? */
export interface PrivilegePort {
    isPrivileged(actorId: UserId, serverId: ServerId): Promise<boolean> | boolean;
}

export type ActuatorFailureKind = "forbidden" | "unreachable" | "other";

export interface ActuatorFailure {
    kind: ActuatorFailureKind;
    message: string;
}

export type BanAttempt = { ok: true } | { ok: false; failure: ActuatorFailure };

export type NameLookup = { ok: true; name: string } | { ok: false };

/**
 * Remote platform capability. Implementations own request timeouts; every call
 * MUST settle.
 */
export interface ActuatorPort {
    banUser(serverId: ServerId, userId: UserId, reason: string): Promise<BanAttempt>;
    resolveUserDisplayName(userId: UserId): Promise<NameLookup>;
}

export interface ClockPort {
    now(): Millis;
}

export interface IdPort {
    newId(): string;
}

export type LogMeta = Record<string, unknown>;

export interface LoggerPort {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
}
