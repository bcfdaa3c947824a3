/**
 * Constants and configuration values for the mdmerge package.
 */
import * as dotenv from 'dotenv';
import logger, { setLogLevel } from './lib/logger';
import { ProgressStyle } from './types';

// Load environment variables
dotenv.config();

// The logger is created before .env is read; apply its LOG_LEVEL now
export const LOG_LEVEL = setLogLevel(process.env.LOG_LEVEL || 'info');

function numberFromEnv(key: string, fallback: number): number {
    const raw = process.env[key];
    if (raw === undefined || raw === '') {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isFinite(value) || value < 0) {
        logger.warn(`[Config] ${key}=${raw} is not a valid number, using default ${fallback}`);
        return fallback;
    }
    return value;
}

// Server configuration
export const PORT = numberFromEnv('PORT', 3001);
export const MAX_UPLOAD_BYTES = numberFromEnv('MAX_UPLOAD_BYTES', 100 * 1024 * 1024); // 100 MB

// Progress stream cadence and session lifetime (milliseconds)
export const PROGRESS_INTERVAL_MS = numberFromEnv('PROGRESS_INTERVAL_MS', 1000);
export const SESSION_GRACE_MS = numberFromEnv('SESSION_GRACE_MS', 60 * 1000);
export const SESSION_MAX_AGE_MS = numberFromEnv('SESSION_MAX_AGE_MS', 60 * 60 * 1000);
export const SESSION_SWEEP_INTERVAL_MS = numberFromEnv('SESSION_SWEEP_INTERVAL_MS', 30 * 1000);

logger.debug(`[Config] PORT: ${PORT}`);
logger.debug(`[Config] PROGRESS_INTERVAL_MS: ${PROGRESS_INTERVAL_MS}`);
logger.debug(`[Config] SESSION_GRACE_MS: ${SESSION_GRACE_MS}, SESSION_MAX_AGE_MS: ${SESSION_MAX_AGE_MS}`);

// Merge policy. Fixed, not read from the environment.
export const PASS_THROUGH_LIMIT = 50; // up to this many files are returned one entry each
export const MAX_FILES_PER_MERGE = 49;
export const MAX_WORDS = 50000; // exclusive
export const OVER_LIMIT_SUFFIX = '_OVER50000WORDS';

// Archive contents
export const MARKDOWN_EXTENSIONS = ['.md', '.markdown'] as const;
export const IGNORED_ARCHIVE_PREFIXES = ['__MACOSX/'] as const;
export const MERGED_DOWNLOAD_NAME = 'merged_files.zip';
export const DEFAULT_DOWNLOAD_NAME = 'processed_files.zip';
// DOS timestamps start at 1980; every entry gets this one so output is reproducible
export const ENTRY_DATE = new Date(Date.UTC(1980, 0, 1, 0, 0, 0));

// Progress display configuration
export const PROGRESS_STYLES = ['simple', 'bar', 'spinner', 'none'] as const;
export const DEFAULT_PROGRESS_STYLE: ProgressStyle = 'spinner';
export const SPINNER_CHARS = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
export const PROGRESS_BAR_LENGTH = 40;

// File paths
export const DEFAULT_OUTPUT_DIR = 'results';
