import { access, mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { v4 as uuid } from "uuid";
import { type BlobStorePort, type DocumentName, type JsonValue, PersistenceError } from "bansync-core";

export const DEFAULT_FILE_NAMES: Record<DocumentName, string> = {
  networks: "sync_networks.json",
  "ban-log": "ban_log.json",
};

export interface FileBlobStoreOptions {
  /** Directory holding both documents; created on first write. */
  dir: string;
  fileNames?: Partial<Record<DocumentName, string>>;
}

/**
 * One pretty-printed JSON file per document. Writes go to a temp file in the
 * same directory and are renamed over the target, so readers see either the
 * old or the new document.
 */
export class FileBlobStore implements BlobStorePort {
  private readonly dir: string;
  private readonly names: Record<DocumentName, string>;

  constructor(opts: FileBlobStoreOptions) {
    this.dir = opts.dir;
    this.names = { ...DEFAULT_FILE_NAMES, ...opts.fileNames };
  }

  pathOf(name: DocumentName): string {
    return join(this.dir, this.names[name]);
  }

  async read(name: DocumentName): Promise<unknown> {
    const path = this.pathOf(name);
    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch (e) {
      throw new PersistenceError(`[FileStore] cannot read ${path}: ${errorMessage(e)}`, { cause: e });
    }
    try {
      return JSON.parse(raw);
    } catch (e) {
      throw new PersistenceError(`[FileStore] ${path} is not valid JSON: ${errorMessage(e)}`, { cause: e });
    }
  }

  async write(name: DocumentName, doc: JsonValue): Promise<void> {
    const path = this.pathOf(name);
    const tmp = `${path}.${uuid()}.tmp`;
    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(tmp, JSON.stringify(doc, null, 4), "utf-8");
      await rename(tmp, path);
    } catch (e) {
      throw new PersistenceError(`[FileStore] cannot write ${path}: ${errorMessage(e)}`, { cause: e });
    }
  }

  async exists(name: DocumentName): Promise<boolean> {
    try {
      await access(this.pathOf(name));
      return true;
    } catch {
      return false;
    }
  }
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
