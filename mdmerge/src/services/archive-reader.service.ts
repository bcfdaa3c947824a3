import * as os from 'os';
import * as path from 'path';
import { promises as fs } from 'fs';
import JSZip from 'jszip';
import logger from '../lib/logger';
import { InvalidArchiveError, PathTraversalError } from '../lib/errors';
import { IGNORED_ARCHIVE_PREFIXES, MARKDOWN_EXTENSIONS } from '../config';
import { SourceFile } from '../types';

/**
 * Runs `fn` with a fresh temporary directory and removes it afterwards,
 * whether `fn` resolves or throws.
 */
export async function withExtractionDir<T>(fn: (root: string) => Promise<T>): Promise<T> {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'mdmerge-'));
    try {
        return await fn(root);
    } finally {
        await fs.rm(root, { recursive: true, force: true });
        logger.debug(`Removed extraction directory ${root}`);
    }
}

export function isMarkdownPath(name: string): boolean {
    const lower = name.toLowerCase();
    return MARKDOWN_EXTENSIONS.some(ext => lower.endsWith(ext));
}

function toPosix(name: string): string {
    return name.replace(/\\/g, '/');
}

/**
 * Resolves an entry name against the extraction root. Throws when the result
 * lands outside of it.
 */
export function resolveEntryPath(root: string, entryName: string): string {
    const posixName = toPosix(entryName);
    const target = path.resolve(root, ...posixName.split('/'));
    const relative = path.relative(root, target);
    if (posixName.startsWith('/') || path.isAbsolute(relative) || relative === '..' || relative.startsWith(`..${path.sep}`)) {
        throw new PathTraversalError(entryName);
    }
    return target;
}

async function loadZip(data: Buffer): Promise<JSZip> {
    try {
        return await JSZip.loadAsync(data, { checkCRC32: true });
    } catch (error) {
        throw new InvalidArchiveError(error instanceof Error ? error.message : String(error));
    }
}

async function entryBytes(entry: JSZip.JSZipObject): Promise<Buffer> {
    try {
        return await entry.async('nodebuffer');
    } catch (error) {
        throw new InvalidArchiveError(`${entry.name}: ${error instanceof Error ? error.message : String(error)}`);
    }
}

/**
 * Validates a ZIP archive and returns its Markdown entries in archive order.
 * Entries are extracted to a temporary directory that does not outlive the call.
 */
export async function readMarkdownArchive(data: Buffer): Promise<SourceFile[]> {
    const zip = await loadZip(data);
    const entries = Object.values(zip.files);

    return withExtractionDir(async (root) => {
        // Check every entry before extracting anything
        for (const entry of entries) {
            resolveEntryPath(root, entry.unsafeOriginalName ?? entry.name);
        }

        const files: SourceFile[] = [];
        for (let i = 0; i < entries.length; i++) {
            const entry = entries[i];
            const name = toPosix(entry.name);
            if (entry.dir || !isMarkdownPath(name)) continue;
            if (IGNORED_ARCHIVE_PREFIXES.some(prefix => name.startsWith(prefix))) {
                logger.debug(`Skipping ${name}`);
                continue;
            }

            // Extracted under its index: archive names may not be valid file names here
            const target = path.join(root, `${i}.md`);
            await fs.writeFile(target, await entryBytes(entry));
            files.push({ path: name, rawContent: await fs.readFile(target) });
        }

        logger.info(`Found ${files.length} Markdown file(s) in ${entries.length} archive entries`);
        return files;
    });
}
