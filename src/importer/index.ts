export { TopicImporter, hasUpdates, summarize } from "./topic-importer.js";
export type { TopicImporterOptions, ImportReport } from "./topic-importer.js";
export { CascadeDeleter, summarizeDeletes } from "./cascade-deleter.js";
export type { DeleteReport } from "./cascade-deleter.js";
export {
  planImport,
  planCascadeDelete,
  indexTree,
  ancestorIds,
  countTopics,
  assertTreeIntegrity,
} from "./traversal.js";
export type { ImportStep } from "./traversal.js";
export { ProcessMapper, CONTENT_PART } from "./mapper.js";
export { loadProcessFile, parseProcessDocument } from "./loader.js";
export { TopicTypeRegistry, LEVEL_DEFAULTS } from "./topic-types.js";
export type { TopicType, TopicLevel } from "./topic-types.js";
