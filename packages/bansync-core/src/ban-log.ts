import type { BlobStorePort, LoggerPort } from "./ports";
import { type BanRecord, parseBanLogDocument, toBanRecordDocument } from "./schema";
import { Mutex } from "./mutex";
import { silentLogger } from "./logger";

export interface BanLogDeps {
    store: BlobStorePort;
    logger?: LoggerPort;
}

/** Append-only audit trail stored as the "ban-log" document. */
export class BanLog {
    private readonly lock = new Mutex();
    private readonly log: LoggerPort;

    constructor(private readonly deps: BanLogDeps) {
        this.log = deps.logger ?? silentLogger;
    }

    /** Throws PersistenceError (or SchemaError for a corrupt document); the log is unchanged in that case. */
    append(record: BanRecord): Promise<void> {
        return this.lock.runExclusive(async () => {
            const records = parseBanLogDocument(await this.deps.store.read("ban-log"));
            records.push(record);
            await this.deps.store.write("ban-log", records.map(toBanRecordDocument));
            this.log.info("ban recorded", { user: record.userId, size: records.length });
        });
    }

    /**
     * Newest timestamp first. Records with equal timestamps keep append order.
     * A limit past the end returns the whole log.
     */
    async recent(limit: number): Promise<BanRecord[]> {
        const records = parseBanLogDocument(await this.deps.store.read("ban-log"));
        return records
            .map((r, i) => ({ r, ms: Date.parse(r.timestamp), i }))
            .sort((a, b) => b.ms - a.ms || a.i - b.i)
            .slice(0, Math.max(0, limit))
            .map(({ r }) => r);
    }
}
