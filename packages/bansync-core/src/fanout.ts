import type { NetworkName, RegistrySnapshot, ServerId } from "./schema";

export interface FanoutTargets {
    /** Networks containing the origin, in registry order. */
    networkNames: NetworkName[];
    /**
     * Every other member of those networks, once each. Insertion order is
     * first-seen while walking networkNames; callers must treat it as unordered.
     */
    targetServerIds: ReadonlySet<ServerId>;
}

export function targetsFor(originServerId: ServerId, registry: RegistrySnapshot): FanoutTargets {
    const networkNames: NetworkName[] = [];
    const targets = new Set<ServerId>();
    for (const [name, network] of registry) {
        if (!network.members.includes(originServerId)) continue;
        networkNames.push(name);
        for (const member of network.members) {
            if (member !== originServerId) targets.add(member);
        }
    }
    return { networkNames, targetServerIds: targets };
}
