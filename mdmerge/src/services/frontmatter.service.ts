import { NormalizedFile, SourceFile } from '../types';

const DELIMITER = '---';

interface Line {
    text: string;
    // offset just past the line's newline, or text length for the last line
    next: number;
}

function readLine(text: string, start: number): Line {
    const newline = text.indexOf('\n', start);
    const end = newline === -1 ? text.length : newline;
    const raw = text.slice(start, end);
    return {
        text: raw.endsWith('\r') ? raw.slice(0, -1) : raw,
        next: newline === -1 ? text.length : newline + 1,
    };
}

function stripLeadingBlankLines(text: string): string {
    return text.replace(/^(?:[ \t]*\r?\n)+/, '');
}

/**
 * Removes one frontmatter block from the start of `text`. Returns null when
 * there is no complete block, including an opening `---` that is never closed.
 */
function stripOnce(text: string): string | null {
    const first = readLine(text, 0);
    if (first.text !== DELIMITER || first.next === text.length) {
        return null;
    }

    let offset = first.next;
    while (offset < text.length) {
        const line = readLine(text, offset);
        if (line.text === DELIMITER) {
            return stripLeadingBlankLines(text.slice(line.next));
        }
        offset = line.next;
    }
    return null;
}

/**
 * Strips leading YAML frontmatter. Content without a complete block is
 * returned unchanged. Stacked blocks are all removed, so applying this twice
 * gives the same result as applying it once.
 */
export function stripFrontmatter(text: string): string {
    let current = text;
    for (;;) {
        const stripped = stripOnce(current);
        if (stripped === null) return current;
        current = stripped;
    }
}

export function normalizeSourceFile(file: SourceFile): NormalizedFile {
    return {
        path: file.path,
        content: stripFrontmatter(file.rawContent.toString('utf8')),
    };
}
