/**
 * Type definitions for the mdmerge package
 */

// Progress UI types (used by lib/ui.ts)
export type ProgressStyle = 'simple' | 'bar' | 'spinner' | 'none';

export interface ProgressOptions {
    title?: string;
    total: number;
}

/**
 * Receives pipeline progress. Implemented by the terminal UI and by the
 * API's per-session tracker.
 */
export interface ProgressTracker {
    start(options: ProgressOptions): void;
    advance(message?: string): void;
    finish(message?: string): void;
}

/** One Markdown entry found in the input archive. */
export interface SourceFile {
    readonly path: string;
    readonly rawContent: Buffer;
}

/** Source file after frontmatter removal. */
export interface NormalizedFile {
    readonly path: string;
    readonly content: string;
}

export interface Batch {
    name: string;
    members: NormalizedFile[];
    mergedContent: string;
}

export interface ClassifiedBatch extends Batch {
    wordCount: number;
    overThreshold: boolean;
    // name with the over-limit suffix applied
    fileName: string;
}

export interface OutputEntry {
    name: string;
    memberCount: number;
    wordCount: number;
    overThreshold: boolean;
}

export interface MergeResult {
    archive: Buffer;
    entries: OutputEntry[];
    totalFiles: number;
    merged: boolean;
    downloadName: string;
}
