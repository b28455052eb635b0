import { v4 as uuid } from "uuid";
import { type BlobStorePort, BanSyncService, initializeDocuments } from "bansync-core";
import { FileBlobStore } from "adapter-storage-fs";
import { FirestoreBlobStore } from "adapter-firestore-admin";
import { HttpPlatformClient } from "adapter-http";
import { buildApp } from "./app";
import { type AppConfig, type StorageConfig, loadConfig } from "./config/env";
import { pinoLogger } from "./logger";

function createStore(storage: StorageConfig): BlobStorePort {
  return storage.kind === "fs"
    ? new FileBlobStore({ dir: storage.dataDir })
    : new FirestoreBlobStore({ collection: storage.collection });
}

async function start(config: AppConfig = loadConfig()): Promise<void> {
  const store = createStore(config.storage);

  const app = buildApp({
    logLevel: config.logLevel,
    commandPrefix: config.commandPrefix,
    createService: (logger) => {
      const platform = new HttpPlatformClient({ ...config.platform, logger });
      return new BanSyncService({
        store,
        actuator: platform,
        privilege: platform,
        clock: { now: () => Date.now() },
        ids: { newId: () => uuid() },
        logger,
      });
    },
  });

  const created = await initializeDocuments(store, pinoLogger(app.log, "storage"));
  app.log.info({ storage: config.storage.kind, created }, "documents ready");

  await app.listen({ port: config.port, host: config.host });
}

start().catch((err: unknown) => {
  console.error("[bansync:server] failed to start", err);
  process.exit(1);
});
