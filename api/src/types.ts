export interface SessionState {
    id: string;
    totalFiles: number;
    currentIndex: number;
    done: boolean;
    // set when the pipeline failed after the session was created
    error?: string;
    createdAt: number;
    updatedAt: number;
    finishedAt?: number;
}

export interface ProgressSnapshot {
    totalFiles: number;
    currentIndex: number;
    done: boolean;
    error?: string;
}

// Wire format of one progress stream message
export interface SseProgressEvent {
    total_files: number;
    current_index: number;
    done: boolean;
    error?: string;
}

export interface SessionRegistryOptions {
    // finished sessions are kept this long so late readers still see the result
    graceMs: number;
    // sessions older than this are evicted whatever their state
    maxAgeMs: number;
    sweepIntervalMs: number;
    now?: () => number;
}

export interface WatchOptions {
    intervalMs: number;
    signal?: AbortSignal;
}

export interface ErrorBody {
    error: string;
    code: string;
    details?: string;
}
