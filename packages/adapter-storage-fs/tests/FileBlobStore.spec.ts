/// <reference types="vitest" />

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { BanSyncService, PersistenceError, allowAll, initializeDocuments } from "bansync-core";
import { FileBlobStore } from "../src";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "bansync-fs-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("FileBlobStore", () => {
  it("initializes sync_networks.json and ban_log.json with empty documents", async () => {
    const store = new FileBlobStore({ dir });
    expect(await initializeDocuments(store)).toEqual(["networks", "ban-log"]);
    expect(await readFile(join(dir, "sync_networks.json"), "utf-8")).toBe("{}");
    expect(await readFile(join(dir, "ban_log.json"), "utf-8")).toBe("[]");
  });

  it("writes pretty-printed JSON and leaves no temp files behind", async () => {
    const store = new FileBlobStore({ dir, fileNames: { networks: "nets.json" } });
    await store.write("networks", { a: { owner: "1", servers: ["1"], created_at: "2024-01-01T00:00:00.000Z" } });

    const text = await readFile(join(dir, "nets.json"), "utf-8");
    expect(text.split("\n")[1]).toBe('    "a": {');
    expect(await readdir(dir)).toEqual(["nets.json"]);
  });

  it("throws PersistenceError for a missing or corrupt document", async () => {
    const store = new FileBlobStore({ dir });
    await expect(store.read("ban-log")).rejects.toBeInstanceOf(PersistenceError);

    await writeFile(join(dir, "ban_log.json"), "[{", "utf-8");
    await expect(store.read("ban-log")).rejects.toThrow(/is not valid JSON/);
  });

  it("round-trips registry and log state through the service", async () => {
    const store = new FileBlobStore({ dir });
    await initializeDocuments(store);
    let t = Date.parse("2024-02-01T00:00:00.000Z");
    const svc = new BanSyncService({
      store,
      actuator: {
        banUser: async () => ({ ok: true }),
        resolveUserDisplayName: async () => ({ ok: true, name: "raider" }),
      },
      privilege: allowAll(),
      clock: { now: () => (t += 1000) },
      ids: { newId: () => "sync-fs" },
    });
    const ctx = { serverId: "1", serverName: "One", actorId: "9", actorName: "mod" };
    await svc.createNetwork(ctx, "alpha");
    await svc.joinNetwork({ ...ctx, serverId: "2" }, "alpha");
    await svc.syncBan(ctx, "555", "spam");

    const before = await svc.registry.snapshot();
    const reloaded = new FileBlobStore({ dir });
    expect(await new BanSyncService(svcDeps(reloaded)).registry.snapshot()).toEqual(before);
    expect(JSON.parse(await readFile(join(dir, "ban_log.json"), "utf-8"))).toEqual([
      {
        user_id: "555",
        user_name: "raider",
        reason: "spam",
        initiator_server: "1",
        initiator_server_name: "One",
        initiator_user: "9",
        initiator_user_name: "mod",
        timestamp: "2024-02-01T00:00:02.000Z",
        networks: ["alpha"],
      },
    ]);
  });
});

function svcDeps(store: FileBlobStore) {
  return {
    store,
    actuator: {
      banUser: async () => ({ ok: true as const }),
      resolveUserDisplayName: async () => ({ ok: false as const }),
    },
    privilege: allowAll(),
    clock: { now: () => 0 },
    ids: { newId: () => "unused" },
  };
}
