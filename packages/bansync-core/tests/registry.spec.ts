/// <reference types="vitest" />

import { describe, it, expect } from "vitest";

import {
  type DocumentName,
  type JsonValue,
  type LoggerPort,
  InMemoryBlobStore,
  NetworkRegistry,
  PersistenceError,
  SchemaError,
  isRecord,
} from "../src";
import { NOW, tickingClock } from "./fakes";

function makeRegistry(store = new InMemoryBlobStore({ networks: {}, "ban-log": [] })) {
  return { store, registry: new NetworkRegistry({ store, clock: tickingClock() }) };
}

describe("NetworkRegistry: create", () => {
  it("creates a network with the owner as its only member", async () => {
    const { registry, store } = makeRegistry();
    const r = await registry.create("alpha", "100");
    expect(r).toEqual({
      ok: true,
      value: { name: "alpha", ownerServerId: "100", members: ["100"], createdAt: new Date(NOW).toISOString() },
    });
    expect(await store.read("networks")).toEqual({
      alpha: { owner: "100", servers: ["100"], created_at: "2024-09-10T12:00:00.000Z" },
    });
  });

  it("rejects a duplicate name and leaves the first network unchanged", async () => {
    const { registry, store } = makeRegistry();
    await registry.create("alpha", "100");
    const before = await store.read("networks");

    const r = await registry.create("alpha", "200");
    expect(r).toEqual({ ok: false, code: "ALREADY_EXISTS", message: "Network 'alpha' already exists." });
    expect(await store.read("networks")).toEqual(before);
  });

  it("treats names as case-sensitive", async () => {
    const { registry } = makeRegistry();
    await registry.create("alpha", "100");
    const r = await registry.create("Alpha", "200");
    expect(r.ok).toBe(true);
    expect([...(await registry.snapshot()).keys()]).toEqual(["alpha", "Alpha"]);
  });

  it("keeps a network named __proto__ as an ordinary key", async () => {
    const { registry, store } = makeRegistry();
    expect((await registry.create("__proto__", "100")).ok).toBe(true);
    expect(await registry.create("__proto__", "200")).toEqual({
      ok: false,
      code: "ALREADY_EXISTS",
      message: "Network '__proto__' already exists.",
    });

    const doc = await store.read("networks");
    expect(isRecord(doc) && Object.keys(doc)).toEqual(["__proto__"]);
    expect((await registry.snapshot()).get("__proto__")?.members).toEqual(["100"]);
    expect(await registry.networksContaining("100")).toEqual(["__proto__"]);
  });
});

describe("NetworkRegistry: join & leave", () => {
  it("adds a server once and rejects a second join", async () => {
    const { registry } = makeRegistry();
    await registry.create("alpha", "100");
    const first = await registry.join("alpha", "200");
    const second = await registry.join("alpha", "200");

    expect(first.ok && first.value.members).toEqual(["100", "200"]);
    expect(second).toMatchObject({ ok: false, code: "ALREADY_MEMBER" });
    expect((await registry.snapshot()).get("alpha")?.members).toEqual(["100", "200"]);
  });

  it("fails with NOT_FOUND for an unknown network", async () => {
    const { registry } = makeRegistry();
    expect(await registry.join("ghost", "200")).toMatchObject({ ok: false, code: "NOT_FOUND" });
    expect(await registry.leave("ghost", "200")).toMatchObject({ ok: false, code: "NOT_FOUND" });
  });

  it("fails with NOT_MEMBER and leaves members unchanged", async () => {
    const { registry } = makeRegistry();
    await registry.create("alpha", "100");
    await registry.join("alpha", "200");

    const r = await registry.leave("alpha", "300");
    expect(r).toEqual({ ok: false, code: "NOT_MEMBER", message: "This server is not part of the 'alpha' network." });
    expect((await registry.snapshot()).get("alpha")?.members).toEqual(["100", "200"]);
  });

  it("lets the owner leave while others remain", async () => {
    const { registry } = makeRegistry();
    await registry.create("alpha", "100");
    await registry.join("alpha", "200");

    expect(await registry.leave("alpha", "100")).toEqual({ ok: true, value: "left" });
    const alpha = (await registry.snapshot()).get("alpha");
    expect(alpha?.ownerServerId).toBe("100");
    expect(alpha?.members).toEqual(["200"]);
  });

  it("deletes the network when the last member leaves", async () => {
    const { registry, store } = makeRegistry();
    await registry.create("alpha", "100");
    await registry.join("alpha", "200");

    expect(await registry.leave("alpha", "200")).toEqual({ ok: true, value: "left" });
    expect(await registry.leave("alpha", "100")).toEqual({ ok: true, value: "deleted" });
    expect(await store.read("networks")).toEqual({});
  });

  it("never stores duplicates across a join/leave sequence", async () => {
    const { registry } = makeRegistry();
    await registry.create("alpha", "1");
    const ops: Array<["join" | "leave", string]> = [
      ["join", "2"], ["join", "2"], ["join", "3"], ["leave", "2"], ["join", "2"],
      ["leave", "1"], ["join", "3"], ["leave", "3"], ["join", "1"],
    ];
    for (const [op, server] of ops) {
      await (op === "join" ? registry.join("alpha", server) : registry.leave("alpha", server));
      const members = (await registry.snapshot()).get("alpha")?.members ?? [];
      expect(new Set(members).size).toBe(members.length);
    }
    expect((await registry.snapshot()).get("alpha")?.members).toEqual(["2", "1"]);
  });
});

describe("NetworkRegistry: queries & concurrency", () => {
  it("lists the networks containing a server in registry order", async () => {
    const { registry } = makeRegistry();
    await registry.create("alpha", "100");
    await registry.create("beta", "200");
    await registry.create("gamma", "100");
    await registry.join("beta", "100");

    expect(await registry.networksContaining("100")).toEqual(["alpha", "beta", "gamma"]);
    expect(await registry.networksContaining("200")).toEqual(["beta"]);
    expect(await registry.networksContaining("999")).toEqual([]);
  });

  it("serializes concurrent joins so no update is lost", async () => {
    const { registry } = makeRegistry();
    await registry.create("alpha", "100");
    await Promise.all(["201", "202", "203", "204"].map((s) => registry.join("alpha", s)));
    expect((await registry.snapshot()).get("alpha")?.members).toEqual(["100", "201", "202", "203", "204"]);
  });

  it("throws PersistenceError when the document was never initialized", async () => {
    const { registry } = makeRegistry(new InMemoryBlobStore());
    await expect(registry.create("alpha", "100")).rejects.toBeInstanceOf(PersistenceError);
  });

  it("throws SchemaError for an empty network in storage", async () => {
    const store = new InMemoryBlobStore({
      networks: { alpha: { owner: "1", servers: [], created_at: "2024-01-01T00:00:00.000Z" } },
    });
    const { registry } = makeRegistry(store);
    await expect(registry.snapshot()).rejects.toBeInstanceOf(SchemaError);
  });
});

describe("NetworkRegistry: logging", () => {
  class ReadOnlyStore extends InMemoryBlobStore {
    failWrites = false;
    override async write(name: DocumentName, doc: JsonValue): Promise<void> {
      if (this.failWrites) throw new PersistenceError("read-only file system");
      return super.write(name, doc);
    }
  }

  function recording(): LoggerPort & { infos: string[] } {
    const infos: string[] = [];
    return { infos, debug() {}, info: (m) => void infos.push(m), warn() {}, error() {} };
  }

  it("logs a mutation only after it was written", async () => {
    const store = new ReadOnlyStore({ networks: {}, "ban-log": [] });
    const logger = recording();
    const registry = new NetworkRegistry({ store, clock: tickingClock(), logger });

    await registry.create("alpha", "100");
    await registry.join("alpha", "200");
    await registry.leave("alpha", "200");
    await registry.leave("alpha", "100");
    expect(logger.infos).toEqual([
      "network created",
      "server joined network",
      "server left network",
      "network deleted after last member left",
    ]);

    store.failWrites = true;
    await expect(registry.create("beta", "100")).rejects.toBeInstanceOf(PersistenceError);
    expect(logger.infos).toHaveLength(4);
  });
});
