import { config, logger } from '../../mdmerge/src';
import { DuplicateSessionError } from './errors';
import type { ProgressSnapshot, SessionRegistryOptions, SessionState, WatchOptions } from './types';

interface Subscriber {
    // snapshots published since this reader last caught up
    queue: ProgressSnapshot[];
    wake: (() => void) | null;
}

export function toSnapshot(session: SessionState): ProgressSnapshot {
    const snapshot: ProgressSnapshot = {
        totalFiles: session.totalFiles,
        currentIndex: session.currentIndex,
        done: session.done,
    };
    if (session.error !== undefined) {
        snapshot.error = session.error;
    }
    return snapshot;
}

export function isTerminal(snapshot: ProgressSnapshot): boolean {
    return snapshot.done || snapshot.error !== undefined;
}

/**
 * Progress state of every upload in flight, keyed by session id. The upload
 * route writes to it through create/advance/complete/fail; progress streams
 * read from it through watch.
 */
export class SessionRegistry {
    private sessions: Map<string, SessionState> = new Map();
    private subscribers: Map<string, Set<Subscriber>> = new Map();
    private sweepTimer: NodeJS.Timeout | null = null;
    private readonly graceMs: number;
    private readonly maxAgeMs: number;
    private readonly sweepIntervalMs: number;
    private readonly now: () => number;

    constructor(options: SessionRegistryOptions) {
        this.graceMs = options.graceMs;
        this.maxAgeMs = options.maxAgeMs;
        this.sweepIntervalMs = options.sweepIntervalMs;
        this.now = options.now ?? Date.now;
    }

    create(sessionId: string, totalFiles: number): ProgressSnapshot {
        if (this.sessions.has(sessionId)) {
            throw new DuplicateSessionError(sessionId);
        }
        const now = this.now();
        const session: SessionState = {
            id: sessionId,
            totalFiles,
            currentIndex: 0,
            done: false,
            createdAt: now,
            updatedAt: now,
        };
        this.sessions.set(sessionId, session);
        logger.info(`[SessionRegistry] Created session ${sessionId}`, { totalFiles });
        return toSnapshot(session);
    }

    has(sessionId: string): boolean {
        return this.sessions.has(sessionId);
    }

    get(sessionId: string): ProgressSnapshot | undefined {
        const session = this.sessions.get(sessionId);
        return session ? toSnapshot(session) : undefined;
    }

    get size(): number {
        return this.sessions.size;
    }

    advance(sessionId: string): void {
        const session = this.sessions.get(sessionId);
        if (!session) {
            logger.warn(`[SessionRegistry] advance on unknown session ${sessionId}`);
            return;
        }
        if (isTerminal(toSnapshot(session)) || session.currentIndex >= session.totalFiles) {
            return;
        }
        this.update(session, { currentIndex: session.currentIndex + 1 });
    }

    complete(sessionId: string): void {
        const session = this.sessions.get(sessionId);
        if (!session) {
            logger.warn(`[SessionRegistry] complete on unknown session ${sessionId}`);
            return;
        }
        if (isTerminal(toSnapshot(session))) return;
        this.update(session, { currentIndex: session.totalFiles, done: true, finishedAt: this.now() });
        logger.info(`[SessionRegistry] Session ${sessionId} done`, { totalFiles: session.totalFiles });
    }

    fail(sessionId: string, message: string): void {
        const session = this.sessions.get(sessionId);
        if (!session) {
            logger.warn(`[SessionRegistry] fail on unknown session ${sessionId}`);
            return;
        }
        if (isTerminal(toSnapshot(session))) return;
        this.update(session, { error: message, finishedAt: this.now() });
        logger.warn(`[SessionRegistry] Session ${sessionId} failed`, { error: message });
    }

    /**
     * Yields the session's current snapshot, then every later one, and ends
     * after the done or failed snapshot. Ends at once for an unknown id, and
     * early when the session is evicted or `signal` aborts.
     */
    async *watch(sessionId: string, options: WatchOptions): AsyncGenerator<ProgressSnapshot, void, undefined> {
        const session = this.sessions.get(sessionId);
        if (!session) {
            logger.debug(`[SessionRegistry] watch on unknown session ${sessionId}`);
            return;
        }

        const subscriber: Subscriber = { queue: [], wake: null };
        let set = this.subscribers.get(sessionId);
        if (!set) {
            set = new Set();
            this.subscribers.set(sessionId, set);
        }
        set.add(subscriber);

        try {
            let last = toSnapshot(session);
            yield last;
            while (!isTerminal(last)) {
                if (options.signal?.aborted) return;

                const next = subscriber.queue.shift();
                if (next) {
                    last = next;
                    yield next;
                    continue;
                }

                const current = this.sessions.get(sessionId);
                if (!current) return;
                const polled = toSnapshot(current);
                if (polled.currentIndex > last.currentIndex || isTerminal(polled)) {
                    last = polled;
                    yield polled;
                    continue;
                }

                await this.waitForChange(subscriber, options.intervalMs, options.signal);
            }
        } finally {
            set.delete(subscriber);
            if (set.size === 0 && this.subscribers.get(sessionId) === set) {
                this.subscribers.delete(sessionId);
            }
        }
    }

    /**
     * Evicts sessions that finished at least graceMs ago and any session older
     * than maxAgeMs. Returns the number evicted.
     */
    sweep(now: number = this.now()): number {
        let evicted = 0;
        for (const session of this.sessions.values()) {
            const expired = now - session.createdAt >= this.maxAgeMs;
            const settled = session.finishedAt !== undefined && now - session.finishedAt >= this.graceMs;
            if (expired || settled) {
                this.evict(session.id);
                evicted++;
            }
        }
        if (evicted > 0) {
            logger.debug(`[SessionRegistry] Evicted ${evicted} session(s)`, { remaining: this.sessions.size });
        }
        return evicted;
    }

    evict(sessionId: string): void {
        this.sessions.delete(sessionId);
        const set = this.subscribers.get(sessionId);
        if (set) {
            for (const subscriber of set) {
                subscriber.wake?.();
            }
        }
        this.subscribers.delete(sessionId);
    }

    startSweeper(): void {
        if (this.sweepTimer) return; // already running
        this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs);
        this.sweepTimer.unref();
    }

    stop(): void {
        if (this.sweepTimer) {
            clearInterval(this.sweepTimer);
            this.sweepTimer = null;
        }
    }

    private update(session: SessionState, updates: Partial<SessionState>): void {
        const merged: SessionState = { ...session, ...updates, updatedAt: this.now() };
        this.sessions.set(session.id, merged);
        this.publish(merged);
    }

    private publish(session: SessionState): void {
        const set = this.subscribers.get(session.id);
        if (!set) return;
        const snapshot = toSnapshot(session);
        for (const subscriber of set) {
            subscriber.queue.push(snapshot);
            subscriber.wake?.();
        }
    }

    private waitForChange(subscriber: Subscriber, timeoutMs: number, signal?: AbortSignal): Promise<void> {
        return new Promise<void>((resolve) => {
            const finish = () => {
                clearTimeout(timer);
                subscriber.wake = null;
                signal?.removeEventListener('abort', finish);
                resolve();
            };
            const timer = setTimeout(finish, timeoutMs);
            subscriber.wake = finish;
            signal?.addEventListener('abort', finish, { once: true });
        });
    }
}

export function createSessionRegistry(options: Partial<SessionRegistryOptions> = {}): SessionRegistry {
    return new SessionRegistry({
        graceMs: options.graceMs ?? config.SESSION_GRACE_MS,
        maxAgeMs: options.maxAgeMs ?? config.SESSION_MAX_AGE_MS,
        sweepIntervalMs: options.sweepIntervalMs ?? config.SESSION_SWEEP_INTERVAL_MS,
        now: options.now,
    });
}
