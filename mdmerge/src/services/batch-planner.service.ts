import * as path from 'path';
import { MAX_FILES_PER_MERGE, PASS_THROUGH_LIMIT } from '../config';
import { Batch, NormalizedFile } from '../types';

/** Marker placed before each member of a merged batch. */
export function memberHeader(filePath: string): string {
    return `<!-- file: ${filePath} -->`;
}

export function mergeContents(members: NormalizedFile[]): string {
    return members.map(m => `${memberHeader(m.path)}\n\n${m.content}`).join('\n\n');
}

export function mergedPartName(index: number): string {
    return `merged_part${index}.md`;
}

export function shouldMerge(totalFiles: number): boolean {
    return totalFiles > PASS_THROUGH_LIMIT;
}

/**
 * Splits normalized files into output batches, keeping input order.
 * Up to PASS_THROUGH_LIMIT files become one batch each under their base name.
 * Larger inputs are merged MAX_FILES_PER_MERGE at a time.
 */
export function planBatches(files: NormalizedFile[]): Batch[] {
    if (!shouldMerge(files.length)) {
        return files.map(file => ({
            name: path.posix.basename(file.path),
            members: [file],
            mergedContent: file.content,
        }));
    }

    const batches: Batch[] = [];
    for (let i = 0; i < files.length; i += MAX_FILES_PER_MERGE) {
        const members = files.slice(i, i + MAX_FILES_PER_MERGE);
        batches.push({
            name: mergedPartName(batches.length + 1),
            members,
            mergedContent: mergeContents(members),
        });
    }
    return batches;
}
