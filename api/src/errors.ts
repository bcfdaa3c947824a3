import { MergeError } from '../../mdmerge/src';

export class DuplicateSessionError extends MergeError {
    constructor(sessionId: string) {
        super('Session is already active', 'DUPLICATE_SESSION', 409, sessionId);
    }
}

export class RequestValidationError extends MergeError {
    constructor(message: string, code: string) {
        super(message, code, 400);
    }
}

export class InternalServerError extends MergeError {
    constructor() {
        super('Internal server error', 'INTERNAL_ERROR', 500);
    }
}
