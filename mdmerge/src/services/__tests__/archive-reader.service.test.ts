import * as fs from 'fs';
import * as path from 'path';
import { describe, it, expect } from 'vitest';
import { isMarkdownPath, readMarkdownArchive, resolveEntryPath, withExtractionDir } from '../archive-reader.service';
import { InvalidArchiveError, PathTraversalError } from '../../lib/errors';
import { buildZip } from '../../__tests__/zip-fixtures';

describe('readMarkdownArchive', () => {
    it('returns Markdown entries in archive order', async () => {
        const data = await buildZip([
            ['b.md', 'B'],
            ['notes.txt', 'not markdown'],
            ['docs/a.md', 'A'],
            ['image.png', 'png'],
            ['c.markdown', 'C'],
            ['UPPER.MD', 'U'],
        ]);

        const files = await readMarkdownArchive(data);

        expect(files.map(f => f.path)).toEqual(['b.md', 'docs/a.md', 'c.markdown', 'UPPER.MD']);
        expect(files.map(f => f.rawContent.toString('utf8'))).toEqual(['B', 'A', 'C', 'U']);
    });

    it('returns an empty list when there is no Markdown', async () => {
        expect(await readMarkdownArchive(await buildZip([['readme.txt', 'hello']]))).toEqual([]);
        expect(await readMarkdownArchive(await buildZip([]))).toEqual([]);
    });

    it('skips macOS resource fork folders', async () => {
        const data = await buildZip([
            ['notes/a.md', 'A'],
            ['__MACOSX/notes/._a.md', 'resource fork'],
        ]);
        expect((await readMarkdownArchive(data)).map(f => f.path)).toEqual(['notes/a.md']);
    });

    it('reads entries whose names are too long for the filesystem', async () => {
        const longName = `${'a'.repeat(300)}.md`;
        const files = await readMarkdownArchive(await buildZip([[longName, 'long']]));
        expect(files).toEqual([{ path: longName, rawContent: Buffer.from('long') }]);
    });

    it('reads a file and a folder that share a name', async () => {
        const files = await readMarkdownArchive(await buildZip([
            ['x.md', 'file'],
            ['x.md/y.md', 'nested'],
        ]));
        expect(files.map(f => [f.path, f.rawContent.toString('utf8')])).toEqual([
            ['x.md', 'file'],
            ['x.md/y.md', 'nested'],
        ]);
    });

    it('rejects bytes that are not a ZIP', async () => {
        const attempt = readMarkdownArchive(Buffer.from('this is not a zip file'));
        await expect(attempt).rejects.toBeInstanceOf(InvalidArchiveError);
        await expect(readMarkdownArchive(Buffer.alloc(0))).rejects.toMatchObject({ code: 'INVALID_ARCHIVE', status: 400 });
    });

    it('rejects entries that escape the extraction directory', async () => {
        const data = await buildZip([
            ['ok.md', 'fine'],
            ['../evil.md', 'escaped'],
        ]);
        await expect(readMarkdownArchive(data)).rejects.toBeInstanceOf(PathTraversalError);
    });

    it('rejects absolute entry paths', async () => {
        const data = await buildZip([['/etc/evil.md', 'escaped']]);
        await expect(readMarkdownArchive(data)).rejects.toMatchObject({ code: 'PATH_TRAVERSAL' });
    });
});

describe('resolveEntryPath', () => {
    const root = path.resolve('/tmp/extract-root');

    it('resolves names inside the root', () => {
        expect(resolveEntryPath(root, 'docs/a.md')).toBe(path.join(root, 'docs', 'a.md'));
        expect(resolveEntryPath(root, 'docs/../b.md')).toBe(path.join(root, 'b.md'));
    });

    it('throws for names that leave the root', () => {
        expect(() => resolveEntryPath(root, '../x.md')).toThrow(PathTraversalError);
        expect(() => resolveEntryPath(root, 'a/../../x.md')).toThrow(PathTraversalError);
        expect(() => resolveEntryPath(root, 'a\\..\\..\\x.md')).toThrow(PathTraversalError);
        expect(() => resolveEntryPath(root, '/x.md')).toThrow(PathTraversalError);
    });
});

describe('withExtractionDir', () => {
    it('removes the directory after success', async () => {
        let seen = '';
        const result = await withExtractionDir(async (root) => {
            seen = root;
            fs.writeFileSync(path.join(root, 'a.md'), 'x');
            return 42;
        });
        expect(result).toBe(42);
        expect(fs.existsSync(seen)).toBe(false);
    });

    it('removes the directory when the callback throws', async () => {
        let seen = '';
        const attempt = withExtractionDir(async (root) => {
            seen = root;
            throw new Error('boom');
        });
        await expect(attempt).rejects.toThrow('boom');
        expect(seen).not.toBe('');
        expect(fs.existsSync(seen)).toBe(false);
    });
});

describe('isMarkdownPath', () => {
    it('matches Markdown extensions case-insensitively', () => {
        expect(isMarkdownPath('a.md')).toBe(true);
        expect(isMarkdownPath('a.Markdown')).toBe(true);
        expect(isMarkdownPath('a.mdx')).toBe(false);
        expect(isMarkdownPath('md')).toBe(false);
    });
});
