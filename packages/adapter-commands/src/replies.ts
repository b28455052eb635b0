import type { BanRecord, ErrorCode, Failure, IsoTimestamp, NetworkName } from "bansync-core";
import { type CommandName, DEFAULT_PREFIX, USAGE, usageLine } from "./parse";

/** Chat-embed shaped reply; the gateway renders it for the platform. */
export interface ReplyField {
  name: string;
  value: string;
}

export interface Reply {
  title: string;
  description?: string;
  fields?: ReplyField[];
}

const FAILURE_TITLE: Record<ErrorCode, string> = {
  PERMISSION_DENIED: "Permission Denied",
  VALIDATION_ERROR: "Invalid Argument",
  NOT_FOUND: "Network Not Found",
  ALREADY_EXISTS: "Network Already Exists",
  ALREADY_MEMBER: "Already Joined",
  NOT_MEMBER: "Not In Network",
  NO_NETWORKS: "No Networks",
  ACTUATOR_FORBIDDEN: "Permission Error",
  ACTUATOR_UNREACHABLE: "Ban Failed",
  ACTUATOR_FAILED: "Ban Failed",
  PERSISTENCE_FAILURE: "Storage Error",
};

export function failureReply(f: Failure): Reply {
  switch (f.code) {
    case "ACTUATOR_FORBIDDEN":
      return { title: FAILURE_TITLE[f.code], description: "I don't have permission to ban users in this server." };
    case "ACTUATOR_UNREACHABLE":
    case "ACTUATOR_FAILED":
      return { title: FAILURE_TITLE[f.code], description: `Failed to ban user: ${f.message}` };
    default:
      return { title: FAILURE_TITLE[f.code], description: f.message };
  }
}

export const created = (name: NetworkName): Reply => ({
  title: "Network Created",
  description: `✅ Ban sync network '${name}' created successfully!`,
});

export const joined = (name: NetworkName): Reply => ({
  title: "Network Joined",
  description: `✅ Joined ban sync network '${name}' successfully!`,
});

export const left = (name: NetworkName): Reply => ({
  title: "Left Network",
  description: `Left ban sync network '${name}' successfully.`,
});

export const deleted = (name: NetworkName): Reply => ({
  title: "Network Deleted",
  description: `Network '${name}' has been deleted as it has no more servers.`,
});

export function networkList(names: NetworkName[]): Reply {
  if (names.length === 0) return { title: "No Networks", description: "This server is not part of any ban sync networks." };
  return {
    title: "Server Networks",
    description: `This server is part of the following ban sync networks:\n${names.map((n) => `- ${n}`).join("\n")}`,
  };
}

export function banSynced(totalSuccessCount: number, networksAffected: number): Reply {
  return {
    title: "Ban Synced",
    description: `✅ Ban synced across ${totalSuccessCount} servers in ${networksAffected} networks.`,
  };
}

export function banNotRecorded(totalSuccessCount: number, networksAffected: number): Reply {
  return {
    title: "Ban Not Recorded",
    description:
      `✅ Ban synced across ${totalSuccessCount} servers in ${networksAffected} networks, ` +
      "but it could not be written to the ban history.",
  };
}

/** `YYYY-MM-DD HH:MM:SS` in UTC; unparseable input is shown as stored. */
export function formatTimestamp(ts: IsoTimestamp): string {
  const ms = Date.parse(ts);
  if (Number.isNaN(ms)) return ts;
  return new Date(ms).toISOString().slice(0, 19).replace("T", " ");
}

export function history(records: BanRecord[]): Reply {
  if (records.length === 0) return { title: "No History", description: "No ban sync history found." };
  return {
    title: "Recent Ban Sync Activity",
    fields: records.map((r) => ({
      name: `${r.userDisplayName} (ID: ${r.userId})`,
      value: [
        `**Reason:** ${r.reason}`,
        `**Initiated by:** ${r.initiatorActorName} in ${r.initiatorServerName}`,
        `**Time:** ${formatTimestamp(r.timestamp)}`,
        `**Networks:** ${r.networks.join(", ")}`,
      ].join("\n"),
    })),
  };
}

export function usageReply(usage: string): Reply {
  return { title: "Invalid Command", description: `Usage: \`${usage}\`` };
}

export function help(prefix = DEFAULT_PREFIX): Reply {
  const shown: CommandName[] = ["create_network", "join_network", "leave_network", "list_networks", "syncban", "ban_history"];
  return {
    title: "Ban Sync Bot Help",
    description: "Commands for managing ban synchronization across servers",
    fields: shown.map((c) => ({ name: usageLine(c, prefix), value: USAGE[c].help })),
  };
}
