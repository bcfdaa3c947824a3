import { describe, it, expect } from 'vitest';
import { normalizeSourceFile, stripFrontmatter } from '../frontmatter.service';

describe('stripFrontmatter', () => {
    it('removes the block and the blank line after it', () => {
        const text = '---\ntitle: Dummy title\nurl: https://example.com\n---\n\n# Body\ntext\n';
        expect(stripFrontmatter(text)).toBe('# Body\ntext\n');
    });

    it('leaves content without frontmatter untouched', () => {
        expect(stripFrontmatter('# Heading\n\n---\n\nafter a rule\n')).toBe('# Heading\n\n---\n\nafter a rule\n');
    });

    it('only looks at the very first line', () => {
        const text = '\n---\ntitle: x\n---\nbody';
        expect(stripFrontmatter(text)).toBe(text);
    });

    it('requires delimiter lines that are exactly three dashes', () => {
        expect(stripFrontmatter('--- \ntitle: x\n---\nbody')).toBe('--- \ntitle: x\n---\nbody');
        expect(stripFrontmatter('----\ntitle: x\n----\nbody')).toBe('----\ntitle: x\n----\nbody');
    });

    // Fail-open: an opening delimiter that is never closed is not frontmatter
    it('passes malformed frontmatter through unchanged', () => {
        const text = '---\ntitle: never closed\n\n# Body\n';
        expect(stripFrontmatter(text)).toBe(text);
        expect(stripFrontmatter('---')).toBe('---');
        expect(stripFrontmatter('---\n')).toBe('---\n');
    });

    it('handles CRLF line endings', () => {
        expect(stripFrontmatter('---\r\na: 1\r\n---\r\n\r\nBody\r\n')).toBe('Body\r\n');
    });

    it('returns an empty string when the file is only frontmatter', () => {
        expect(stripFrontmatter('---\na: 1\n---')).toBe('');
        expect(stripFrontmatter('---\n---\n')).toBe('');
    });

    it('keeps indentation of the first content line', () => {
        expect(stripFrontmatter('---\na: 1\n---\n  \n\n    code\n')).toBe('    code\n');
    });

    it('removes stacked blocks', () => {
        expect(stripFrontmatter('---\na: 1\n---\n---\nb: 2\n---\nBody')).toBe('Body');
    });

    it('is idempotent', () => {
        const samples = [
            '---\ntitle: x\n---\n\nBody\n',
            '---\na: 1\n---\n---\nb: 2\n---\nBody',
            '---\nopen only\n',
            'plain\n',
            '',
        ];
        for (const sample of samples) {
            const once = stripFrontmatter(sample);
            expect(stripFrontmatter(once)).toBe(once);
        }
    });
});

describe('normalizeSourceFile', () => {
    it('decodes UTF-8 and keeps the path', () => {
        const file = { path: 'docs/intro.md', rawContent: Buffer.from('---\ntags: [ü]\n---\nGrüße\n', 'utf8') };
        expect(normalizeSourceFile(file)).toEqual({ path: 'docs/intro.md', content: 'Grüße\n' });
    });

    it('keeps empty files empty', () => {
        expect(normalizeSourceFile({ path: 'empty.md', rawContent: Buffer.alloc(0) }).content).toBe('');
    });
});
