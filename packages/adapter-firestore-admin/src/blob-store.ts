import { type BlobStorePort, type DocumentName, type JsonValue, PersistenceError } from "bansync-core";
import { getDb } from "./firebase";

/** Firestore layout:
 *  {collection}/{documentName} {
 *    body: string       // JSON of the whole registry or ban log
 *    updatedAt: string  // ISO-8601
 *  }
 *
 * Each document is replaced with one set(), which Firestore applies atomically.
 * The body is stored as a JSON string so network names never have to be valid
 * Firestore field paths.
 */

/** The slice of the Admin SDK this adapter touches. `Firestore` satisfies it. */
export interface DocumentDb {
  collection(path: string): {
    doc(id: string): {
      get(): Promise<{ exists: boolean; get(field: string): unknown }>;
      set(data: { body: string; updatedAt: string }): Promise<unknown>;
    };
  };
}

export const DEFAULT_COLLECTION = "bansync";

export class FirestoreBlobStore implements BlobStorePort {
  private readonly db: DocumentDb;
  private readonly collection: string;

  constructor(opts: { db?: DocumentDb; collection?: string } = {}) {
    this.db = opts.db ?? getDb();
    this.collection = opts.collection ?? DEFAULT_COLLECTION;
  }

  private ref(name: DocumentName) {
    return this.db.collection(this.collection).doc(name);
  }

  async read(name: DocumentName): Promise<unknown> {
    let body: unknown;
    try {
      const snap = await this.ref(name).get();
      if (!snap.exists) throw new PersistenceError(`document ${this.collection}/${name} has not been initialized`);
      body = snap.get("body");
    } catch (e) {
      if (e instanceof PersistenceError) throw e;
      throw new PersistenceError(`cannot read ${this.collection}/${name}: ${errorMessage(e)}`, { cause: e });
    }
    if (typeof body !== "string") throw new PersistenceError(`${this.collection}/${name}.body must be a JSON string`);
    try {
      return JSON.parse(body);
    } catch (e) {
      throw new PersistenceError(`${this.collection}/${name}.body is not valid JSON: ${errorMessage(e)}`, { cause: e });
    }
  }

  async write(name: DocumentName, doc: JsonValue): Promise<void> {
    try {
      await this.ref(name).set({ body: JSON.stringify(doc), updatedAt: new Date().toISOString() });
    } catch (e) {
      throw new PersistenceError(`cannot write ${this.collection}/${name}: ${errorMessage(e)}`, { cause: e });
    }
  }

  async exists(name: DocumentName): Promise<boolean> {
    try {
      return (await this.ref(name).get()).exists;
    } catch (e) {
      throw new PersistenceError(`cannot read ${this.collection}/${name}: ${errorMessage(e)}`, { cause: e });
    }
  }
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
