/// <reference types="vitest" />

import { describe, it, expect } from "vitest";

import { type ActuatorPort, type CallerContext, StaticAdminPrivilege, createLocalBanSync } from "bansync-core";
import { formatTimestamp, help, parseCommand, runCommand } from "../src";

describe("parseCommand", () => {
  it("ignores messages without the prefix or with unknown commands", () => {
    expect(parseCommand("hello there")).toBeUndefined();
    expect(parseCommand("!dance")).toBeUndefined();
    expect(parseCommand("!")).toBeUndefined();
    expect(parseCommand("?syncban 1", "!")).toBeUndefined();
  });

  it("takes the first word as the network name", () => {
    expect(parseCommand("  !create_network  alpha beta")).toEqual({ kind: "create_network", name: "alpha" });
    expect(parseCommand("!join_network")).toEqual({
      kind: "usage",
      command: "join_network",
      usage: "!join_network <network_name>",
    });
  });

  it("keeps the rest of a syncban line as the reason", () => {
    expect(parseCommand("!syncban 555   raid   on #general ")).toEqual({
      kind: "syncban",
      userId: "555",
      reason: "raid   on #general",
    });
    expect(parseCommand("!syncban 555")).toEqual({ kind: "syncban", userId: "555" });
    expect(parseCommand("!syncban")).toMatchObject({ kind: "usage", usage: "!syncban <user_id> [reason]" });
  });

  it("parses and caps the history limit", () => {
    expect(parseCommand("!ban_history")).toEqual({ kind: "ban_history" });
    expect(parseCommand("!ban_history 3")).toEqual({ kind: "ban_history", limit: 3 });
    expect(parseCommand("!ban_history 100")).toEqual({ kind: "ban_history", limit: 25 });
    expect(parseCommand("!ban_history -1")).toMatchObject({ kind: "usage", command: "ban_history" });
  });

  it("honours a custom prefix", () => {
    expect(parseCommand("bs:list_networks", "bs:")).toEqual({ kind: "list_networks" });
  });
});

describe("formatTimestamp", () => {
  it("renders UTC seconds", () => {
    expect(formatTimestamp("2024-09-10T12:03:04.567Z")).toBe("2024-09-10 12:03:04");
    expect(formatTimestamp("2024-09-10T14:03:04+02:00")).toBe("2024-09-10 12:03:04");
    expect(formatTimestamp("not a date")).toBe("not a date");
  });
});

describe("runCommand", () => {
  const T0 = Date.parse("2024-09-10T12:00:00.000Z");
  const A: CallerContext = { serverId: "10", serverName: "Alpha", actorId: "1", actorName: "mod-a" };
  const B: CallerContext = { serverId: "20", serverName: "Beta", actorId: "2", actorName: "mod-b" };
  const actuator: ActuatorPort = {
    banUser: async (serverId) =>
      serverId === "30" ? { ok: false, failure: { kind: "unreachable", message: "gone" } } : { ok: true },
    resolveUserDisplayName: async () => ({ ok: true, name: "spammer" }),
  };

  it("walks the network lifecycle", async () => {
    const svc = createLocalBanSync({ actuator, clock: { now: () => T0 } });

    expect(await runCommand(svc, A, "!create_network alpha")).toEqual({
      title: "Network Created",
      description: "✅ Ban sync network 'alpha' created successfully!",
    });
    expect(await runCommand(svc, B, "!create_network alpha")).toEqual({
      title: "Network Already Exists",
      description: "Network 'alpha' already exists.",
    });
    expect(await runCommand(svc, B, "!join_network beta")).toEqual({
      title: "Network Not Found",
      description: "Network 'beta' does not exist.",
    });
    expect(await runCommand(svc, B, "!join_network alpha")).toEqual({
      title: "Network Joined",
      description: "✅ Joined ban sync network 'alpha' successfully!",
    });
    expect(await runCommand(svc, B, "!join_network alpha")).toEqual({
      title: "Already Joined",
      description: "This server is already part of the 'alpha' network.",
    });
    await runCommand(svc, B, "!create_network gamma");
    expect(await runCommand(svc, B, "!list_networks")).toEqual({
      title: "Server Networks",
      description: "This server is part of the following ban sync networks:\n- alpha\n- gamma",
    });
    expect(await runCommand(svc, A, "!leave_network alpha")).toEqual({
      title: "Left Network",
      description: "Left ban sync network 'alpha' successfully.",
    });
    expect(await runCommand(svc, A, "!leave_network alpha")).toEqual({
      title: "Not In Network",
      description: "This server is not part of the 'alpha' network.",
    });
    expect(await runCommand(svc, B, "!leave_network gamma")).toEqual({
      title: "Network Deleted",
      description: "Network 'gamma' has been deleted as it has no more servers.",
    });
    expect(await runCommand(svc, A, "!list_networks")).toEqual({
      title: "No Networks",
      description: "This server is not part of any ban sync networks.",
    });
  });

  it("syncs a ban and shows it in the history", async () => {
    const svc = createLocalBanSync({ actuator, clock: { now: () => T0 } });
    const C: CallerContext = { serverId: "30", serverName: "Gamma", actorId: "3", actorName: "mod-c" };

    expect(await runCommand(svc, A, "!ban_history")).toEqual({ title: "No History", description: "No ban sync history found." });

    await runCommand(svc, A, "!create_network alpha");
    await runCommand(svc, B, "!join_network alpha");
    await runCommand(svc, C, "!join_network alpha");

    expect(await runCommand(svc, A, "!syncban 555 raiding")).toEqual({
      title: "Ban Synced",
      description: "✅ Ban synced across 2 servers in 1 networks.",
    });
    expect(await runCommand(svc, B, "!ban_history 1")).toEqual({
      title: "Recent Ban Sync Activity",
      fields: [
        {
          name: "spammer (ID: 555)",
          value:
            "**Reason:** raiding\n" +
            "**Initiated by:** mod-a in Alpha\n" +
            "**Time:** 2024-09-10 12:00:00\n" +
            "**Networks:** alpha",
        },
      ],
    });
  });

  it("reports local ban failures and missing networks", async () => {
    const svc = createLocalBanSync({ actuator, clock: { now: () => T0 } });
    const C: CallerContext = { serverId: "30", serverName: "Gamma", actorId: "3", actorName: "mod-c" };

    expect(await runCommand(svc, C, "!syncban 555")).toEqual({
      title: "No Networks",
      description: "This server is not part of any ban sync networks.",
    });
    await runCommand(svc, C, "!create_network solo");
    expect(await runCommand(svc, C, "!syncban 555")).toEqual({ title: "Ban Failed", description: "Failed to ban user: gone" });

    const refusing = createLocalBanSync({
      actuator: {
        banUser: async () => ({ ok: false, failure: { kind: "forbidden", message: "Missing Permissions" } }),
        resolveUserDisplayName: async () => ({ ok: false }),
      },
    });
    await runCommand(refusing, A, "!create_network alpha");
    expect(await runCommand(refusing, A, "!syncban 555")).toEqual({
      title: "Permission Error",
      description: "I don't have permission to ban users in this server.",
    });
  });

  it("denies unprivileged callers", async () => {
    const svc = createLocalBanSync({ actuator, privilege: new StaticAdminPrivilege() });
    expect(await runCommand(svc, A, "!list_networks")).toEqual({
      title: "Permission Denied",
      description: "You need administrator permissions to use this command.",
    });
  });

  it("answers usage errors and help without touching the service", async () => {
    const svc = createLocalBanSync({ actuator, privilege: new StaticAdminPrivilege() });
    expect(await runCommand(svc, A, "!create_network")).toEqual({
      title: "Invalid Command",
      description: "Usage: `!create_network <network_name>`",
    });
    expect(await runCommand(svc, A, "bs:synchelp", { prefix: "bs:" })).toEqual(help("bs:"));
    expect(help().fields?.map((f) => f.name)).toEqual([
      "!create_network <network_name>",
      "!join_network <network_name>",
      "!leave_network <network_name>",
      "!list_networks",
      "!syncban <user_id> [reason]",
      "!ban_history [limit]",
    ]);
    expect(await runCommand(svc, A, "just chatting")).toBeUndefined();
  });
});
