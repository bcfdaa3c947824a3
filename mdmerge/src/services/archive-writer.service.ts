import * as path from 'path';
import JSZip from 'jszip';
import logger from '../lib/logger';
import { ENTRY_DATE } from '../config';
import { ClassifiedBatch } from '../types';

/**
 * Returns `name`, or `name` with `_2`, `_3`, ... before the extension when it
 * is already taken. Records the result in `taken`.
 */
export function uniqueEntryName(name: string, taken: Set<string>): string {
    let candidate = name;
    const ext = path.posix.extname(name);
    const stem = name.slice(0, name.length - ext.length);
    for (let n = 2; taken.has(candidate); n++) {
        candidate = `${stem}_${n}${ext}`;
    }
    taken.add(candidate);
    return candidate;
}

/**
 * Serializes batches into a ZIP, one entry per batch in order. The archive
 * is built in memory, so either all of it is returned or the call rejects.
 */
export async function writeArchive(batches: ClassifiedBatch[]): Promise<{ archive: Buffer; entryNames: string[] }> {
    const zip = new JSZip();
    const taken = new Set<string>();
    const entryNames: string[] = [];

    for (const batch of batches) {
        const name = uniqueEntryName(batch.fileName, taken);
        if (name !== batch.fileName) {
            logger.warn(`Duplicate output name ${batch.fileName}, writing it as ${name}`);
        }
        zip.file(name, batch.mergedContent, { date: ENTRY_DATE, createFolders: false });
        entryNames.push(name);
    }

    const archive = await zip.generateAsync({
        type: 'nodebuffer',
        compression: 'DEFLATE',
        compressionOptions: { level: 6 },
    });
    logger.debug(`Wrote archive with ${entryNames.length} entries (${archive.length} bytes)`);
    return { archive, entryNames };
}
