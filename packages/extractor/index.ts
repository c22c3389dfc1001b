export { processDirectory, type ProcessOptions, type RunReport, type RunStart } from "./processor";
export {
  runExtraction,
  assertPositiveInteger,
  type ExtractionOptions,
  type ExtractionProgress,
  type OutcomeStatus,
  type ExtractionSummary,
} from "./scheduler";
export {
  planResume,
  seedContinuation,
  measureCoverage,
  type ResumeOptions,
  type ResumePlan,
  type Coverage,
} from "./resume";
export { normalize, identityIds, buildIdentitySet } from "./identity";
export {
  loadDataset,
  flushRecords,
  copyDataset,
  inferFormat,
  isDatasetFile,
  getCodec,
  datasetExtension,
  DEFAULT_DELIMITER,
  type LoadedDataset,
  type DatasetCodec,
  type DatasetOptions,
} from "./dataset";
export { DatasetWriter, type RecordSink, type DatasetWriterOptions } from "./dataset/writer";
export {
  createRun,
  writeError,
  listRuns,
  findLatestRun,
  formatTimestamp,
  type RunWorkspace,
  type RunInfo,
  type CreateRunOptions,
} from "./workspace";
export {
  isFatal,
  createLexicalClassifier,
  defaultClassifier,
  describeError,
  DEFAULT_FATAL_MARKERS,
  type FatalErrorClassifier,
} from "./fatal";
export {
  PagesiftError,
  ConfigError,
  UnsupportedFormatError,
  DatasetNotFoundError,
  WorkspaceExistsError,
  ExtractionResponseError,
  BatchError,
  FatalExtractionError,
  RunAbortedError,
  type ErrorCode,
} from "./errors";
export {
  submitBatch,
  retrieveBatch,
  loadBatchRun,
  findLatestBatchRun,
  createGeminiBatchClient,
  BATCH_METADATA_FILE,
  type BatchClient,
  type BatchJobStatus,
  type BatchResponse,
  type BatchMetadata,
  type BatchRun,
  type BatchOutcome,
  type BatchSubmitOptions,
  type BatchSubmitReport,
  type BatchUploadProgress,
  type BatchRetrieveOptions,
  type BatchRetrieveReport,
} from "./batch";
export { listInputDocuments } from "./inputs";
export { preprocessImage, DEFAULT_IMAGE_SETTINGS, type PreparedImage } from "./preprocess";
export {
  createGeminiExtractor,
  createGeminiGenerator,
  parseRecord,
  type ContentGenerator,
  type GeminiExtractorOptions,
} from "./gemini";
export {
  loadExtractorConfig,
  hasGeminiCredentials,
  isDatasetFormat,
  snapshotConfig,
  loadSchema,
  loadPrompt,
  IMAGE_FORMATS,
  type ExtractorConfig,
  type ImageSettings,
  type ImageFormat,
} from "./config";
export type {
  DocumentRef,
  ExtractFn,
  ExtractedRecord,
  DatasetRecord,
  DatasetFormat,
  FieldValue,
} from "./types";
