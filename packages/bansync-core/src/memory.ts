import type { BlobStorePort, LoggerPort } from "./ports";
import { type DocumentName, type JsonValue, DOCUMENT_NAMES, EMPTY_DOCUMENTS } from "./schema";
import { PersistenceError } from "./outcome";
import { silentLogger } from "./logger";

/** ---------- In-Memory Blob Store (dev/test) ---------- */
export class InMemoryBlobStore implements BlobStorePort {
    // Documents are kept serialized so callers never share references with the store.
    private docs = new Map<DocumentName, string>();

    constructor(initial?: Partial<Record<DocumentName, JsonValue>>) {
        for (const name of DOCUMENT_NAMES) {
            const doc = initial?.[name];
            if (doc !== undefined) this.docs.set(name, JSON.stringify(doc));
        }
    }

    async read(name: DocumentName): Promise<unknown> {
        const raw = this.docs.get(name);
        if (raw === undefined) throw new PersistenceError(`document '${name}' has not been initialized`);
        return JSON.parse(raw);
    }

    async write(name: DocumentName, doc: JsonValue): Promise<void> {
        this.docs.set(name, JSON.stringify(doc));
    }

    async exists(name: DocumentName): Promise<boolean> {
        return this.docs.has(name);
    }
}

/**
 * Start-up precondition: both documents exist before the first operation.
 * Existing documents are left untouched. Returns the names that were created.
 */
export async function initializeDocuments(store: BlobStorePort, logger: LoggerPort = silentLogger): Promise<DocumentName[]> {
    const created: DocumentName[] = [];
    for (const name of DOCUMENT_NAMES) {
        if (await store.exists(name)) continue;
        await store.write(name, EMPTY_DOCUMENTS[name]);
        created.push(name);
        logger.info("initialized empty document", { document: name });
    }
    return created;
}
