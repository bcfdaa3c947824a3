import type { ProgressOptions, ProgressTracker } from '../../mdmerge/src';
import { logger } from '../../mdmerge/src';
import type { SessionRegistry } from './sessionRegistry';

/**
 * Feeds pipeline progress for one upload into the session registry, where
 * progress streams pick it up.
 */
export class SseProgressTracker implements ProgressTracker {
    private readonly registry: SessionRegistry;
    private readonly sessionId: string;

    constructor(registry: SessionRegistry, sessionId: string) {
        this.registry = registry;
        this.sessionId = sessionId;
    }

    start(options: ProgressOptions): void {
        const session = this.registry.get(this.sessionId);
        if (session && session.totalFiles !== options.total) {
            logger.warn(`[SseProgressTracker] Session ${this.sessionId} expects ${session.totalFiles} files, pipeline reports ${options.total}`);
        }
    }

    advance(): void {
        this.registry.advance(this.sessionId);
    }

    finish(): void {
        this.registry.complete(this.sessionId);
    }
}

export function createSseTracker(registry: SessionRegistry, sessionId: string): ProgressTracker {
    return new SseProgressTracker(registry, sessionId);
}
