/*
 * bansync-core/src/propagator.ts
 * ------------------------------------------------------------
 * End-to-end SyncBan workflow.
 *
 *   idle → permission-checked → local-banned → fanned → logged → done
 *
 * Early exits: denied-no-permission, no-networks, local-ban-failed. None of
 * them touches storage or contacts a remote server.
 *
 * The local ban is load-bearing: if it fails nothing is recorded and nobody
 * else is contacted. Remote failures are logged and left out of the success
 * count; they never stop the other targets or undo the local ban. A failed
 * audit write is reported after the bans already took effect.
 */

import type {
    ActuatorFailureKind,
    ActuatorPort,
    BanAttempt,
    ClockPort,
    IdPort,
    LoggerPort,
    PrivilegePort,
} from "./ports";
import {
    type BanRecord,
    type ServerId,
    type UserId,
    normalizeReason,
    unknownUserName,
} from "./schema";
import { type Failure, type Success, failure, success } from "./outcome";
import type { NetworkRegistry } from "./registry";
import type { BanLog } from "./ban-log";
import { targetsFor } from "./fanout";
import { silentLogger } from "./logger";

export type SyncBanState =
    | "idle"
    | "permission-checked"
    | "local-banned"
    | "fanned"
    | "logged"
    | "done"
    | "denied-no-permission"
    | "no-networks"
    | "local-ban-failed";

export interface SyncBanRequest {
    origin: { serverId: ServerId; serverName: string };
    actor: { actorId: UserId; actorName: string };
    userId: UserId;
    /** Defaults to DEFAULT_REASON when omitted or blank. */
    reason?: string;
}

export interface SyncBanReport {
    syncId: string;
    /** 1 for the origin server plus every remote server that accepted the ban. */
    totalSuccessCount: number;
    networksAffected: number;
    record: BanRecord;
}

export type SyncBanFailure =
    | Failure<"PERMISSION_DENIED" | "NO_NETWORKS" | "ACTUATOR_FORBIDDEN" | "ACTUATOR_UNREACHABLE" | "ACTUATOR_FAILED">
    | (Failure<"PERSISTENCE_FAILURE"> & {
          /** Present when the bans went out but the audit record could not be written. */
          applied?: { syncId: string; totalSuccessCount: number; networksAffected: number };
      });

export type SyncBanOutcome = Success<SyncBanReport> | SyncBanFailure;

export interface BanPropagatorDeps {
    registry: NetworkRegistry;
    banLog: BanLog;
    actuator: ActuatorPort;
    privilege: PrivilegePort;
    clock: ClockPort;
    ids: IdPort;
    logger?: LoggerPort;
    /** Observer for state transitions (tests, tracing). */
    onTransition?: (syncId: string, state: SyncBanState) => void;
}

const LOCAL_FAILURE_CODE: Record<ActuatorFailureKind, "ACTUATOR_FORBIDDEN" | "ACTUATOR_UNREACHABLE" | "ACTUATOR_FAILED"> = {
    forbidden: "ACTUATOR_FORBIDDEN",
    unreachable: "ACTUATOR_UNREACHABLE",
    other: "ACTUATOR_FAILED",
};

export function syncedReason(originServerName: string, reason: string): string {
    return `[synced from ${originServerName}] ${reason}`;
}

export class BanPropagator {
    private readonly log: LoggerPort;

    constructor(private readonly deps: BanPropagatorDeps) {
        this.log = deps.logger ?? silentLogger;
    }

    /**
     * Registry and ban-log read/write errors propagate as exceptions
     * (PersistenceError / SchemaError); the service turns them into outcomes.
     * The one exception is the final audit write, reported with `applied`.
     */
    async syncBan(req: SyncBanRequest): Promise<SyncBanOutcome> {
        const { origin, actor, userId } = req;
        const reason = normalizeReason(req.reason);
        const syncId = this.deps.ids.newId();
        const enter = (state: SyncBanState) => {
            this.log.debug("sync state", { syncId, state });
            this.deps.onTransition?.(syncId, state);
        };
        enter("idle");

        if (!(await this.deps.privilege.isPrivileged(actor.actorId, origin.serverId))) {
            enter("denied-no-permission");
            return failure("PERMISSION_DENIED", "You need administrator permissions to use this command.");
        }
        enter("permission-checked");

        const { networkNames, targetServerIds } = targetsFor(origin.serverId, await this.deps.registry.snapshot());
        if (networkNames.length === 0) {
            enter("no-networks");
            return failure("NO_NETWORKS", "This server is not part of any ban sync networks.");
        }

        const userDisplayName = await this.resolveName(userId);

        const local = await this.attempt(origin.serverId, userId, reason);
        if (!local.ok) {
            enter("local-ban-failed");
            this.log.warn("local ban failed; nothing propagated", {
                syncId,
                server: origin.serverId,
                user: userId,
                kind: local.failure.kind,
                error: local.failure.message,
            });
            return failure(LOCAL_FAILURE_CODE[local.failure.kind], local.failure.message);
        }
        enter("local-banned");

        const remoteReason = syncedReason(origin.serverName, reason);
        const attempts = await Promise.all(
            [...targetServerIds].map(async (serverId) => {
                const res = await this.attempt(serverId, userId, remoteReason);
                if (res.ok) {
                    this.log.info("synced ban", { syncId, server: serverId, user: userId });
                } else {
                    this.log.error("failed to sync ban", {
                        syncId,
                        server: serverId,
                        user: userId,
                        kind: res.failure.kind,
                        error: res.failure.message,
                    });
                }
                return res.ok;
            }),
        );
        const totalSuccessCount = 1 + attempts.filter(Boolean).length;
        enter("fanned");

        const record: BanRecord = {
            userId,
            userDisplayName,
            reason,
            initiatorServerId: origin.serverId,
            initiatorServerName: origin.serverName,
            initiatorActorId: actor.actorId,
            initiatorActorName: actor.actorName,
            timestamp: new Date(this.deps.clock.now()).toISOString(),
            networks: networkNames,
        };
        const applied = { syncId, totalSuccessCount, networksAffected: networkNames.length };

        try {
            await this.deps.banLog.append(record);
        } catch (e) {
            this.log.error("ban applied but audit record was not written", {
                ...applied,
                error: e instanceof Error ? e.message : String(e),
            });
            return { ...failure("PERSISTENCE_FAILURE", "The ban was applied but could not be recorded in the ban log."), applied };
        }
        enter("logged");

        this.log.info("ban sync finished", { ...applied, user: userId, targets: targetServerIds.size });
        enter("done");
        return success({ ...applied, record });
    }

    private async resolveName(userId: UserId): Promise<string> {
        try {
            const res = await this.deps.actuator.resolveUserDisplayName(userId);
            if (res.ok) return res.name;
        } catch (e) {
            this.log.debug("display name lookup threw", { user: userId, error: e instanceof Error ? e.message : String(e) });
        }
        return unknownUserName(userId);
    }

    /** A thrown actuator error counts as kind "other" for that one server. */
    private async attempt(serverId: ServerId, userId: UserId, reason: string): Promise<BanAttempt> {
        try {
            return await this.deps.actuator.banUser(serverId, userId, reason);
        } catch (e) {
            return { ok: false, failure: { kind: "other", message: e instanceof Error ? e.message : String(e) } };
        }
    }
}
