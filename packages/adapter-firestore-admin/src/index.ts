export { getDb } from "./firebase";
export { FirestoreBlobStore, DEFAULT_COLLECTION } from "./blob-store";
export type { DocumentDb } from "./blob-store";
