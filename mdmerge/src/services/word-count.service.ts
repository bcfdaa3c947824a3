import * as path from 'path';
import { MAX_WORDS, OVER_LIMIT_SUFFIX } from '../config';
import { Batch, ClassifiedBatch } from '../types';

// Whitespace-separated tokens
export function countWords(text: string): number {
    return text.match(/\S+/g)?.length ?? 0;
}

export function withOverLimitSuffix(fileName: string): string {
    const ext = path.posix.extname(fileName);
    return `${fileName.slice(0, fileName.length - ext.length)}${OVER_LIMIT_SUFFIX}${ext}`;
}

/**
 * Flags a batch whose members hold more than MAX_WORDS words between them.
 * The file markers added by merging are not counted.
 */
export function classifyBatch(batch: Batch): ClassifiedBatch {
    const wordCount = batch.members.reduce((total, member) => total + countWords(member.content), 0);
    const overThreshold = wordCount > MAX_WORDS;
    return {
        ...batch,
        wordCount,
        overThreshold,
        fileName: overThreshold ? withOverLimitSuffix(batch.name) : batch.name,
    };
}
