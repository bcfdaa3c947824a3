export { default as pipelineService, PipelineService } from './services/pipeline.service';
export type { PipelineOptions } from './services/pipeline.service';
export { readMarkdownArchive } from './services/archive-reader.service';
export { stripFrontmatter } from './services/frontmatter.service';
export { planBatches } from './services/batch-planner.service';
export { countWords, classifyBatch } from './services/word-count.service';
export { writeArchive } from './services/archive-writer.service';
export { MergeError, InvalidArchiveError, PathTraversalError, isMergeError } from './lib/errors';
export { default as logger } from './lib/logger';
export * as config from './config';
// Re-export common types for consumers (e.g., api package)
export type {
    ProgressOptions,
    ProgressTracker,
    SourceFile,
    NormalizedFile,
    Batch,
    ClassifiedBatch,
    OutputEntry,
    MergeResult,
} from './types';
