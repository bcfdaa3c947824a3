import { setImmediate as yieldToEventLoop } from 'timers/promises';
import logger from '../lib/logger';
import { DEFAULT_DOWNLOAD_NAME, MERGED_DOWNLOAD_NAME } from '../config';
import { MergeResult, NormalizedFile, ProgressTracker, SourceFile } from '../types';
import { readMarkdownArchive } from './archive-reader.service';
import { normalizeSourceFile } from './frontmatter.service';
import { planBatches, shouldMerge } from './batch-planner.service';
import { classifyBatch } from './word-count.service';
import { writeArchive } from './archive-writer.service';

export interface PipelineOptions {
    tracker?: ProgressTracker;
    // name of the uploaded archive, reused as the download name for pass-through output
    sourceName?: string;
}

const silentTracker: ProgressTracker = {
    start: () => undefined,
    advance: () => undefined,
    finish: () => undefined,
};

export class PipelineService {
    constructor() { }

    /**
     * Validate, normalize, batch and re-package a ZIP of Markdown files.
     */
    async processArchive(data: Buffer, options: PipelineOptions = {}): Promise<MergeResult> {
        const files = await readMarkdownArchive(data);
        return this.processFiles(files, options);
    }

    /**
     * Run the pipeline over files that were already read from an archive.
     * The tracker advances once per file and finishes after the output archive exists.
     */
    async processFiles(files: SourceFile[], options: PipelineOptions = {}): Promise<MergeResult> {
        const tracker = options.tracker ?? silentTracker;
        const totalFiles = files.length;
        const merged = shouldMerge(totalFiles);
        logger.info(`Processing ${totalFiles} Markdown file(s) (${merged ? 'merge' : 'pass-through'})`);

        tracker.start({ title: 'Processing Markdown files', total: totalFiles });

        const normalized: NormalizedFile[] = [];
        for (const file of files) {
            normalized.push(normalizeSourceFile(file));
            tracker.advance(file.path);
            // let progress readers run between files
            await yieldToEventLoop();
        }

        const batches = planBatches(normalized).map(classifyBatch);
        for (const batch of batches) {
            if (batch.overThreshold) {
                logger.warn(`${batch.name} has ${batch.wordCount} words, saving as ${batch.fileName}`);
            }
        }

        const { archive, entryNames } = await writeArchive(batches);
        tracker.finish(`Wrote ${entryNames.length} file(s)`);

        return {
            archive,
            entries: batches.map((batch, i) => ({
                name: entryNames[i],
                memberCount: batch.members.length,
                wordCount: batch.wordCount,
                overThreshold: batch.overThreshold,
            })),
            totalFiles,
            merged,
            downloadName: merged ? MERGED_DOWNLOAD_NAME : options.sourceName || DEFAULT_DOWNLOAD_NAME,
        };
    }
}

export default new PipelineService();
