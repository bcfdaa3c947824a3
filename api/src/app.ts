import express, { ErrorRequestHandler, Express, NextFunction, Request, RequestHandler, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import { config, isMergeError, logger, pipelineService, readMarkdownArchive, PipelineService } from '../../mdmerge/src';
import type { MergeResult } from '../../mdmerge/src';
import { DuplicateSessionError, InternalServerError, RequestValidationError } from './errors';
import { SessionRegistry } from './sessionRegistry';
import { createSseTracker } from './sseTracker';
import type { ErrorBody, ProgressSnapshot, SseProgressEvent } from './types';

export interface AppOptions {
    registry: SessionRegistry;
    pipeline?: PipelineService;
    progressIntervalMs?: number;
    maxUploadBytes?: number;
}

export function toSseEvent(snapshot: ProgressSnapshot): SseProgressEvent {
    const event: SseProgressEvent = {
        total_files: snapshot.totalFiles,
        current_index: snapshot.currentIndex,
        done: snapshot.done,
    };
    if (snapshot.error !== undefined) {
        event.error = snapshot.error;
    }
    return event;
}

const requireSessionId: RequestHandler<{ sessionId: string }> = (req, _res, next) => {
    if (!isUuid(req.params.sessionId)) {
        next(new RequestValidationError('Session id must be a UUID', 'INVALID_SESSION_ID'));
        return;
    }
    next();
};

function errorBody(message: string, code: string, details?: string): ErrorBody {
    return details === undefined ? { error: message, code } : { error: message, code, details };
}

const handleErrors: ErrorRequestHandler = (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
        next(err);
        return;
    }
    if (err instanceof multer.MulterError) {
        logger.warn(`Upload rejected: ${err.message}`, { code: err.code, url: req.originalUrl });
        if (err.code === 'LIMIT_FILE_SIZE') {
            res.status(413).json(errorBody('File too large', 'FILE_TOO_LARGE', err.message));
        } else {
            res.status(400).json(errorBody('Invalid upload', 'INVALID_UPLOAD', err.message));
        }
        return;
    }
    if (isMergeError(err) && err.status < 500) {
        logger.warn(`Request rejected: ${err.code} ${err.message}`, { url: req.originalUrl, details: err.details });
        res.status(err.status).json(err.toJSON());
        return;
    }
    logger.error('Request failed', { url: req.originalUrl, error: String(err instanceof Error ? err.stack : err) });
    res.status(500).json(new InternalServerError().toJSON());
};

export function createApp(options: AppOptions): Express {
    const { registry } = options;
    const pipeline = options.pipeline ?? pipelineService;
    const progressIntervalMs = options.progressIntervalMs ?? config.PROGRESS_INTERVAL_MS;
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: options.maxUploadBytes ?? config.MAX_UPLOAD_BYTES, files: 1 },
    });

    const app = express();

    app.use(cors({ exposedHeaders: ['Content-Disposition', 'X-Total-Files', 'X-Output-Entries', 'X-Merged'] }));

    app.use((req, _res, next) => {
        logger.http(`REQ ${req.method} ${req.originalUrl}`);
        next();
    });

    // Health
    app.get('/api/health', (_req: Request, res: Response) => {
        res.json({ ok: true });
    });

    // Issue an id for clients that do not generate their own
    app.post('/api/sessions', (_req: Request, res: Response) => {
        res.status(201).json({ sessionId: uuidv4() });
    });

    app.post('/api/upload/:sessionId', requireSessionId, upload.single('file'), async (req: Request<{ sessionId: string }>, res: Response, next: NextFunction) => {
        const { sessionId } = req.params;
        try {
            const file = req.file;
            if (!file) {
                throw new RequestValidationError('No file part in request', 'MISSING_FILE');
            }
            if (!file.originalname.trim()) {
                throw new RequestValidationError('No file selected', 'EMPTY_FILENAME');
            }
            if (!file.originalname.toLowerCase().endsWith('.zip')) {
                throw new RequestValidationError('Only ZIP files are allowed', 'UNSUPPORTED_FILE_TYPE');
            }
            if (registry.has(sessionId)) {
                throw new DuplicateSessionError(sessionId);
            }

            // Validate before the session exists so a rejected upload leaves nothing behind
            const files = await readMarkdownArchive(file.buffer);
            registry.create(sessionId, files.length);

            let result: MergeResult;
            try {
                result = await pipeline.processFiles(files, {
                    tracker: createSseTracker(registry, sessionId),
                    sourceName: file.originalname,
                });
            } catch (error) {
                registry.fail(sessionId, 'Internal server error');
                throw error;
            }

            logger.info(`Session ${sessionId}: ${result.totalFiles} file(s) -> ${result.entries.length} entries`, {
                merged: result.merged,
                flagged: result.entries.filter(e => e.overThreshold).map(e => e.name),
            });
            res.status(200)
                .set({
                    'X-Total-Files': String(result.totalFiles),
                    'X-Output-Entries': String(result.entries.length),
                    'X-Merged': String(result.merged),
                })
                .attachment(result.downloadName)
                .send(result.archive);
        } catch (error) {
            next(error);
        }
    });

    // Server-Sent Events: one message per progress change, closed after the terminal one
    app.get('/api/progress/:sessionId', async (req: Request<{ sessionId: string }>, res: Response) => {
        const { sessionId } = req.params;
        res.status(200);
        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache');
        res.setHeader('Connection', 'keep-alive');
        res.flushHeaders();

        const controller = new AbortController();
        res.on('close', () => controller.abort());

        try {
            for await (const snapshot of registry.watch(sessionId, { intervalMs: progressIntervalMs, signal: controller.signal })) {
                res.write(`data: ${JSON.stringify(toSseEvent(snapshot))}\n\n`);
            }
        } catch (error) {
            logger.error(`Progress stream for ${sessionId} failed`, { error: String(error instanceof Error ? error.stack : error) });
        } finally {
            res.end();
        }
    });

    app.use(handleErrors);

    return app;
}
