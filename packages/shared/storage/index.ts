export type { Storage, StorageReader, StorageWriter } from "./types";
export { createLocalStorage } from "./local";
