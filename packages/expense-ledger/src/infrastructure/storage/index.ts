export { FileStorage, type FileStorageOptions } from "./FileStorage";
export { InMemoryStorage } from "./InMemoryStorage";
