import type { BanSyncService, CallerContext, LoggerPort } from "bansync-core";
import { silentLogger } from "bansync-core";
import { DEFAULT_PREFIX, type ParsedCommand, parseCommand } from "./parse";
import * as replies from "./replies";
import type { Reply } from "./replies";

export interface RunOptions {
  prefix?: string;
  logger?: LoggerPort;
}

/** Execute an already-parsed command against the service. */
export async function execute(
  service: BanSyncService,
  ctx: CallerContext,
  cmd: ParsedCommand,
  prefix = DEFAULT_PREFIX,
): Promise<Reply> {
  switch (cmd.kind) {
    case "usage":
      return replies.usageReply(cmd.usage);
    case "synchelp":
      return replies.help(prefix);
    case "create_network": {
      const res = await service.createNetwork(ctx, cmd.name);
      return res.ok ? replies.created(res.value.name) : replies.failureReply(res);
    }
    case "join_network": {
      const res = await service.joinNetwork(ctx, cmd.name);
      return res.ok ? replies.joined(res.value.name) : replies.failureReply(res);
    }
    case "leave_network": {
      const res = await service.leaveNetwork(ctx, cmd.name);
      if (!res.ok) return replies.failureReply(res);
      const { network, outcome } = res.value;
      return outcome === "deleted" ? replies.deleted(network) : replies.left(network);
    }
    case "list_networks": {
      const res = await service.listNetworksFor(ctx);
      return res.ok ? replies.networkList(res.value) : replies.failureReply(res);
    }
    case "syncban": {
      const res = await service.syncBan(ctx, cmd.userId, cmd.reason);
      if (res.ok) return replies.banSynced(res.value.totalSuccessCount, res.value.networksAffected);
      if (res.code === "PERSISTENCE_FAILURE" && res.applied) {
        return replies.banNotRecorded(res.applied.totalSuccessCount, res.applied.networksAffected);
      }
      return replies.failureReply(res);
    }
    case "ban_history": {
      const res = await service.recentBans(ctx, cmd.limit);
      return res.ok ? replies.history(res.value) : replies.failureReply(res);
    }
  }
}

/**
 * Parse and run one chat message. Resolves to undefined when the message is
 * not addressed to this bot.
 */
export async function runCommand(
  service: BanSyncService,
  ctx: CallerContext,
  content: string,
  opts: RunOptions = {},
): Promise<Reply | undefined> {
  const prefix = opts.prefix ?? DEFAULT_PREFIX;
  const cmd = parseCommand(content, prefix);
  if (!cmd) return undefined;
  (opts.logger ?? silentLogger).debug("command", { kind: cmd.kind, server: ctx.serverId, actor: ctx.actorId });
  return execute(service, ctx, cmd, prefix);
}
