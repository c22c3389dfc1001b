export {
  header,
  section,
  keyValue,
  blank,
  progressBar,
  clearLines,
  writeMultiLineProgress,
  formatDuration,
  formatProgress,
  logError,
  logWarning,
  type ProgressStats,
} from "./ui";

export { createLocalStorage, type Storage, type StorageReader, type StorageWriter } from "./storage";

export {
  createLogger,
  createFileLogger,
  createSilentLogger,
  formatErrorChain,
  type Logger,
} from "./logger";
