/**
 * Errors raised by the merge pipeline. `status` is the HTTP status a caller
 * should answer with; the pipeline itself never looks at it.
 */
export class MergeError extends Error {
    readonly code: string;
    readonly status: number;
    readonly details?: string;

    constructor(message: string, code: string, status: number, details?: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.status = status;
        this.details = details;
    }

    toJSON(): { error: string; code: string; details?: string } {
        return this.details === undefined
            ? { error: this.message, code: this.code }
            : { error: this.message, code: this.code, details: this.details };
    }
}

export class InvalidArchiveError extends MergeError {
    constructor(details?: string) {
        super('Invalid ZIP file', 'INVALID_ARCHIVE', 400, details);
    }
}

export class PathTraversalError extends MergeError {
    readonly entryName: string;

    constructor(entryName: string) {
        super('Archive entry escapes the extraction directory', 'PATH_TRAVERSAL', 400, entryName);
        this.entryName = entryName;
    }
}

export function isMergeError(error: unknown): error is MergeError {
    return error instanceof MergeError;
}
