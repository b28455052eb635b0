/*
 * bansync-core/src/registry.ts
 * ------------------------------------------------------------
 * Network membership graph.
 *
 * Every operation loads the whole "networks" document, applies the change in
 * memory and rewrites the whole document. A failed precondition writes nothing.
 * Mutations are serialized in-process so two concurrent joins cannot drop each
 * other's update.
 */

import type { BlobStorePort, ClockPort, LoggerPort } from "./ports";
import {
    type Network,
    type NetworkName,
    type RegistrySnapshot,
    type ServerId,
    parseRegistryDocument,
    toRegistryDocument,
} from "./schema";
import { type Outcome, failure, success } from "./outcome";
import { Mutex } from "./mutex";
import { silentLogger } from "./logger";

export type LeaveOutcome = "left" | "deleted";

export interface NetworkRegistryDeps {
    store: BlobStorePort;
    clock: ClockPort;
    logger?: LoggerPort;
}

export class NetworkRegistry {
    private readonly lock = new Mutex();
    private readonly log: LoggerPort;

    constructor(private readonly deps: NetworkRegistryDeps) {
        this.log = deps.logger ?? silentLogger;
    }

    /** Fresh read-only view of the registry. */
    async snapshot(): Promise<RegistrySnapshot> {
        return parseRegistryDocument(await this.deps.store.read("networks"));
    }

    async create(name: NetworkName, ownerServerId: ServerId): Promise<Outcome<Network, "ALREADY_EXISTS">> {
        const res = await this.mutate((networks) => {
            if (networks.has(name)) {
                return failure("ALREADY_EXISTS", `Network '${name}' already exists.`);
            }
            const network: Network = {
                name,
                ownerServerId,
                members: [ownerServerId],
                createdAt: new Date(this.deps.clock.now()).toISOString(),
            };
            networks.set(name, network);
            return success(network);
        });
        if (res.ok) this.log.info("network created", { network: name, owner: ownerServerId });
        return res;
    }

    async join(name: NetworkName, serverId: ServerId): Promise<Outcome<Network, "NOT_FOUND" | "ALREADY_MEMBER">> {
        const res = await this.mutate((networks) => {
            const network = networks.get(name);
            if (!network) return failure("NOT_FOUND", `Network '${name}' does not exist.`);
            if (network.members.includes(serverId)) {
                return failure("ALREADY_MEMBER", `This server is already part of the '${name}' network.`);
            }
            const next: Network = { ...network, members: [...network.members, serverId] };
            networks.set(name, next);
            return success(next);
        });
        if (res.ok) this.log.info("server joined network", { network: name, server: serverId });
        return res;
    }

    async leave(name: NetworkName, serverId: ServerId): Promise<Outcome<LeaveOutcome, "NOT_FOUND" | "NOT_MEMBER">> {
        const res = await this.mutate((networks) => {
            const network = networks.get(name);
            if (!network) return failure("NOT_FOUND", `Network '${name}' does not exist.`);
            if (!network.members.includes(serverId)) {
                return failure("NOT_MEMBER", `This server is not part of the '${name}' network.`);
            }
            const members = network.members.filter((m) => m !== serverId);
            if (members.length === 0) {
                networks.delete(name);
                return success<LeaveOutcome>("deleted");
            }
            networks.set(name, { ...network, members });
            return success<LeaveOutcome>("left");
        });
        if (res.ok) {
            this.log.info(res.value === "deleted" ? "network deleted after last member left" : "server left network", {
                network: name,
                server: serverId,
            });
        }
        return res;
    }

    /** Names of the networks that list serverId, in registry order. */
    async networksContaining(serverId: ServerId): Promise<NetworkName[]> {
        const networks = await this.snapshot();
        const out: NetworkName[] = [];
        for (const [name, n] of networks) {
            if (n.members.includes(serverId)) out.push(name);
        }
        return out;
    }

    /** Load → apply → persist only when the change succeeded. Callers log after this resolves. */
    private mutate<T, C extends "ALREADY_EXISTS" | "NOT_FOUND" | "ALREADY_MEMBER" | "NOT_MEMBER">(
        apply: (networks: Map<NetworkName, Network>) => Outcome<T, C>,
    ): Promise<Outcome<T, C>> {
        return this.lock.runExclusive(async () => {
            const networks = parseRegistryDocument(await this.deps.store.read("networks"));
            const result = apply(networks);
            if (result.ok) {
                await this.deps.store.write("networks", toRegistryDocument(networks));
            }
            return result;
        });
    }
}
