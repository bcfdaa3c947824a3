import { describe, it, expect } from 'vitest';
import { mergeContents, planBatches, shouldMerge } from '../batch-planner.service';
import type { NormalizedFile } from '../../types';

function files(count: number): NormalizedFile[] {
    return Array.from({ length: count }, (_, i) => ({ path: `dir/note${i}.md`, content: `content ${i}` }));
}

describe('planBatches', () => {
    it('returns no batches for no files', () => {
        expect(planBatches([])).toEqual([]);
    });

    it('passes up to 50 files through one batch each', () => {
        const input = files(50);
        const batches = planBatches(input);

        expect(batches).toHaveLength(50);
        batches.forEach((batch, i) => {
            expect(batch.name).toBe(`note${i}.md`);
            expect(batch.members).toEqual([input[i]]);
            expect(batch.mergedContent).toBe(`content ${i}`);
        });
    });

    it('flattens nested paths to the base name', () => {
        const [batch] = planBatches([{ path: 'a/b/c/intro.md', content: '# Intro' }]);
        expect(batch.name).toBe('intro.md');
        expect(batch.mergedContent).toBe('# Intro');
    });

    it('merges 51 files into groups of 49 and 2', () => {
        const batches = planBatches(files(51));
        expect(batches.map(b => b.name)).toEqual(['merged_part1.md', 'merged_part2.md']);
        expect(batches.map(b => b.members.length)).toEqual([49, 2]);
    });

    it('splits 150 files into 49, 49, 49 and 3', () => {
        const batches = planBatches(files(150));
        expect(batches.map(b => b.members.length)).toEqual([49, 49, 49, 3]);
        expect(batches[3].name).toBe('merged_part4.md');
    });

    it('fills the last group when the count divides evenly', () => {
        expect(planBatches(files(98)).map(b => b.members.length)).toEqual([49, 49]);
    });

    it('keeps input order across batches', () => {
        const input = files(120);
        const members = planBatches(input).flatMap(b => b.members);
        expect(members).toEqual(input);
    });

    it('marks each member of a merged batch with its path', () => {
        const input = files(51);
        const last = planBatches(input)[1];
        expect(last.mergedContent).toBe(
            '<!-- file: dir/note49.md -->\n\ncontent 49\n\n<!-- file: dir/note50.md -->\n\ncontent 50'
        );
    });
});

describe('mergeContents', () => {
    it('keeps empty members as their own section', () => {
        expect(mergeContents([{ path: 'a.md', content: '' }, { path: 'b.md', content: 'B' }])).toBe(
            '<!-- file: a.md -->\n\n\n\n<!-- file: b.md -->\n\nB'
        );
    });
});

describe('shouldMerge', () => {
    it('switches to merging above 50 files', () => {
        expect(shouldMerge(0)).toBe(false);
        expect(shouldMerge(50)).toBe(false);
        expect(shouldMerge(51)).toBe(true);
    });
});
