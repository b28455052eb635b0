/*
 * bansync-core/src/privilege.ts
 * ------------------------------------------------------------
 * Local privilege oracles.
 *
 * The core only asks one question: may this actor run ban-sync commands on
 * this server? Real answers come from the platform (see adapter-http's
 * HttpPlatformClient); the policies here cover local runs and tests.
 */

import type { PrivilegePort } from "./ports";
import type { ServerId, UserId } from "./schema";

/** Trivial allow-all policy for local dev & tests. */
export class AllowAllPrivilege implements PrivilegePort {
  isPrivileged(): boolean { return true; }
}
export const allowAll = () => new AllowAllPrivilege();

/** In-memory administrator table. */
export class StaticAdminPrivilege implements PrivilegePort {
  private admins = new Map<ServerId, Set<UserId>>();

  grant(actorId: UserId, serverId: ServerId) {
    const set = this.admins.get(serverId) ?? new Set<UserId>();
    set.add(actorId);
    this.admins.set(serverId, set);
    return this;
  }
  revoke(actorId: UserId, serverId: ServerId) {
    this.admins.get(serverId)?.delete(actorId);
    return this;
  }
  isPrivileged(actorId: UserId, serverId: ServerId): boolean {
    return this.admins.get(serverId)?.has(actorId) ?? false;
  }
}
