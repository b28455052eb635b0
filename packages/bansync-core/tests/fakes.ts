import type {
    ActuatorFailureKind,
    ActuatorPort,
    BanAttempt,
    CallerContext,
    ClockPort,
    NameLookup,
    ServerId,
    UserId,
} from "../src";

export const NOW = Date.parse("2024-09-10T12:00:00.000Z");

/** Clock that advances by one second on every read. */
export function tickingClock(start = NOW): ClockPort {
    let t = start - 1000;
    return { now: () => (t += 1000) };
}

export function caller(serverId: ServerId, p?: Partial<CallerContext>): CallerContext {
    return { serverId, serverName: `Server ${serverId}`, actorId: "900", actorName: "mod#0001", ...p };
}

export interface BanCall {
    serverId: ServerId;
    userId: UserId;
    reason: string;
}

/**
 * Actuator with per-server scripted failures. Servers not listed in `fail`
 * accept the ban. `throwOn` servers throw instead of returning a failure.
 */
export class ScriptedActuator implements ActuatorPort {
    readonly calls: BanCall[] = [];
    readonly lookups: UserId[] = [];

    constructor(
        private readonly opts: {
            fail?: Record<ServerId, ActuatorFailureKind>;
            throwOn?: ServerId[];
            names?: Record<UserId, string>;
        } = {},
    ) {}

    async banUser(serverId: ServerId, userId: UserId, reason: string): Promise<BanAttempt> {
        this.calls.push({ serverId, userId, reason });
        if (this.opts.throwOn?.includes(serverId)) throw new Error(`socket hang up (${serverId})`);
        const kind = this.opts.fail?.[serverId];
        if (kind) return { ok: false, failure: { kind, message: `${kind} on ${serverId}` } };
        return { ok: true };
    }

    async resolveUserDisplayName(userId: UserId): Promise<NameLookup> {
        this.lookups.push(userId);
        const name = this.opts.names?.[userId];
        return name ? { ok: true, name } : { ok: false };
    }

    servers(): ServerId[] {
        return this.calls.map((c) => c.serverId);
    }
}
