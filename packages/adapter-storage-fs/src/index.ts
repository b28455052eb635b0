export { FileBlobStore, DEFAULT_FILE_NAMES } from "./FileBlobStore";
export type { FileBlobStoreOptions } from "./FileBlobStore";
