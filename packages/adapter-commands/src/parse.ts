export const DEFAULT_PREFIX = "!";
export const MAX_HISTORY_LIMIT = 25;

export type CommandName =
  | "create_network"
  | "join_network"
  | "leave_network"
  | "list_networks"
  | "syncban"
  | "ban_history"
  | "synchelp";

export type ParsedCommand =
  | { kind: "create_network" | "join_network" | "leave_network"; name: string }
  | { kind: "list_networks" }
  | { kind: "syncban"; userId: string; reason?: string }
  | { kind: "ban_history"; limit?: number }
  | { kind: "synchelp" }
  | { kind: "usage"; command: CommandName; usage: string };

export const USAGE: Record<CommandName, { args: string; help: string }> = {
  create_network: { args: "<network_name>", help: "Create a new ban sync network" },
  join_network: { args: "<network_name>", help: "Join an existing ban sync network" },
  leave_network: { args: "<network_name>", help: "Leave a ban sync network" },
  list_networks: { args: "", help: "List all networks this server is part of" },
  syncban: { args: "<user_id> [reason]", help: "Ban a user and sync the ban across all networks" },
  ban_history: { args: "[limit]", help: "Show recent ban sync activity (default: 5 most recent)" },
  synchelp: { args: "", help: "Show this help" },
};

function isCommandName(s: string): s is CommandName {
  return Object.prototype.hasOwnProperty.call(USAGE, s);
}

export function usageLine(command: CommandName, prefix = DEFAULT_PREFIX): string {
  const { args } = USAGE[command];
  return args ? `${prefix}${command} ${args}` : `${prefix}${command}`;
}

/**
 * Parse one chat message. Returns undefined for messages that are not
 * commands of this bot (wrong prefix, unknown command name).
 *
 * Network names are a single word. Everything after the user id is the ban
 * reason, verbatim apart from surrounding whitespace.
 */
export function parseCommand(content: string, prefix = DEFAULT_PREFIX): ParsedCommand | undefined {
  const text = content.trimStart();
  if (!prefix || !text.startsWith(prefix)) return undefined;

  const body = text.slice(prefix.length);
  const match = /^(\S+)\s*([\s\S]*)$/.exec(body);
  if (!match) return undefined;
  const [, command, rest] = match;
  if (!isCommandName(command)) return undefined;

  const args = rest.trim();
  const first = args.split(/\s+/)[0] ?? "";
  const usage = (): ParsedCommand => ({ kind: "usage", command, usage: usageLine(command, prefix) });

  switch (command) {
    case "create_network":
    case "join_network":
    case "leave_network":
      return first ? { kind: command, name: first } : usage();
    case "list_networks":
      return { kind: "list_networks" };
    case "synchelp":
      return { kind: "synchelp" };
    case "syncban": {
      if (!first) return usage();
      const reason = args.slice(first.length).trim();
      return reason ? { kind: "syncban", userId: first, reason } : { kind: "syncban", userId: first };
    }
    case "ban_history": {
      if (!first) return { kind: "ban_history" };
      if (!/^\d+$/.test(first)) return usage();
      return { kind: "ban_history", limit: Math.min(parseInt(first, 10), MAX_HISTORY_LIMIT) };
    }
  }
}
