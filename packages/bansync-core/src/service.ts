/*
 * bansync-core/src/service.ts
 * ------------------------------------------------------------
 * Operation surface consumed by the command layer (HTTP handlers, text
 * commands). One instance per process, built by the composition root.
 *
 * Every method checks the privilege oracle first, validates its input, and
 * returns an outcome. Storage exceptions are converted to PERSISTENCE_FAILURE
 * here; nothing thrown below escapes.
 */

import type { ActuatorPort, BlobStorePort, ClockPort, IdPort, LoggerPort, PrivilegePort } from "./ports";
import {
    type BanRecord,
    type Network,
    type NetworkName,
    type ServerId,
    type UserId,
    normalizeNetworkName,
} from "./schema";
import { type Failure, type Outcome, failure, success } from "./outcome";
import { type LeaveOutcome, NetworkRegistry } from "./registry";
import { BanLog } from "./ban-log";
import { BanPropagator, type SyncBanOutcome, type SyncBanState } from "./propagator";
import { InMemoryBlobStore } from "./memory";
import { AllowAllPrivilege } from "./privilege";
import { silentLogger } from "./logger";

export const DEFAULT_HISTORY_LIMIT = 5;

/** Who is calling, and from which server. Supplied by the command layer. */
export interface CallerContext {
    serverId: ServerId;
    serverName: string;
    actorId: UserId;
    actorName: string;
}

export interface BanSyncDeps {
    store: BlobStorePort;
    actuator: ActuatorPort;
    privilege: PrivilegePort;
    clock: ClockPort;
    ids: IdPort;
    logger?: LoggerPort;
    onTransition?: (syncId: string, state: SyncBanState) => void;
}

type Guarded<T, C extends Failure["code"]> = Promise<
    Outcome<T, C | "PERMISSION_DENIED" | "VALIDATION_ERROR" | "PERSISTENCE_FAILURE">
>;

const PERMISSION_DENIED = "You need administrator permissions to use this command.";

export class BanSyncService {
    readonly registry: NetworkRegistry;
    readonly banLog: BanLog;
    private readonly propagator: BanPropagator;
    private readonly log: LoggerPort;

    constructor(private readonly deps: BanSyncDeps) {
        this.log = deps.logger ?? silentLogger;
        this.registry = new NetworkRegistry({ store: deps.store, clock: deps.clock, logger: this.log });
        this.banLog = new BanLog({ store: deps.store, logger: this.log });
        this.propagator = new BanPropagator({
            registry: this.registry,
            banLog: this.banLog,
            actuator: deps.actuator,
            privilege: deps.privilege,
            clock: deps.clock,
            ids: deps.ids,
            logger: this.log,
            onTransition: deps.onTransition,
        });
    }

    createNetwork(ctx: CallerContext, rawName: string): Guarded<Network, "ALREADY_EXISTS"> {
        return this.guarded<Network, "ALREADY_EXISTS">("createNetwork", ctx, async () => {
            const name = normalizeNetworkName(rawName);
            if (!name) return failure("VALIDATION_ERROR", "A network name is required.");
            return this.registry.create(name, ctx.serverId);
        });
    }

    joinNetwork(ctx: CallerContext, rawName: string): Guarded<Network, "NOT_FOUND" | "ALREADY_MEMBER"> {
        return this.guarded<Network, "NOT_FOUND" | "ALREADY_MEMBER">("joinNetwork", ctx, async () => {
            const name = normalizeNetworkName(rawName);
            if (!name) return failure("VALIDATION_ERROR", "A network name is required.");
            return this.registry.join(name, ctx.serverId);
        });
    }

    leaveNetwork(
        ctx: CallerContext,
        rawName: string,
    ): Guarded<{ network: NetworkName; outcome: LeaveOutcome }, "NOT_FOUND" | "NOT_MEMBER"> {
        return this.guarded<{ network: NetworkName; outcome: LeaveOutcome }, "NOT_FOUND" | "NOT_MEMBER">("leaveNetwork", ctx, async () => {
            const name = normalizeNetworkName(rawName);
            if (!name) return failure("VALIDATION_ERROR", "A network name is required.");
            const res = await this.registry.leave(name, ctx.serverId);
            return res.ok ? success({ network: name, outcome: res.value }) : res;
        });
    }

    listNetworksFor(ctx: CallerContext): Guarded<NetworkName[], never> {
        return this.guarded<NetworkName[], never>("listNetworksFor", ctx, async () => success(await this.registry.networksContaining(ctx.serverId)));
    }

    recentBans(ctx: CallerContext, limit: number = DEFAULT_HISTORY_LIMIT): Guarded<BanRecord[], never> {
        return this.guarded<BanRecord[], never>("recentBans", ctx, async () => {
            if (!Number.isSafeInteger(limit) || limit < 0) {
                return failure("VALIDATION_ERROR", "limit must be a non-negative integer.");
            }
            return success(await this.banLog.recent(limit));
        });
    }

    /** The propagator runs its own privilege check as the first step of the workflow. */
    async syncBan(ctx: CallerContext, userId: UserId, reason?: string): Promise<SyncBanOutcome | Failure<"VALIDATION_ERROR">> {
        const target = userId.trim();
        if (!/^\S+$/.test(target)) return failure("VALIDATION_ERROR", "A user id is required.");
        try {
            return await this.propagator.syncBan({
                origin: { serverId: ctx.serverId, serverName: ctx.serverName },
                actor: { actorId: ctx.actorId, actorName: ctx.actorName },
                userId: target,
                reason,
            });
        } catch (e) {
            return this.storageFailure("syncBan", e);
        }
    }

    private async guarded<T, C extends Failure["code"]>(
        op: string,
        ctx: CallerContext,
        run: () => Promise<Outcome<T, C | "VALIDATION_ERROR">>,
    ): Guarded<T, C> {
        try {
            if (!(await this.deps.privilege.isPrivileged(ctx.actorId, ctx.serverId))) {
                this.log.info("permission denied", { op, actor: ctx.actorId, server: ctx.serverId });
                return failure("PERMISSION_DENIED", PERMISSION_DENIED);
            }
            return await run();
        } catch (e) {
            return this.storageFailure(op, e);
        }
    }

    private storageFailure(op: string, e: unknown): Failure<"PERSISTENCE_FAILURE"> {
        const message = e instanceof Error ? e.message : String(e);
        this.log.error("storage failure", { op, error: message });
        return failure("PERSISTENCE_FAILURE", `Storage error: ${message}`);
    }
}

/** ---------- Tiny helper: build a local service for tests/dev ---------- */
export function createLocalBanSync(
    overrides: Partial<BanSyncDeps> & Pick<BanSyncDeps, "actuator">,
): BanSyncService {
    let seq = 0;
    return new BanSyncService({
        store: new InMemoryBlobStore({ networks: {}, "ban-log": [] }),
        privilege: new AllowAllPrivilege(),
        clock: { now: () => Date.now() },
        ids: { newId: () => `sync-${++seq}` },
        ...overrides,
    });
}
