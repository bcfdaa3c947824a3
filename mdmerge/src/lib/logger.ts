import winston from 'winston';
import path from 'path';
import fs from 'fs';

export const SERVICE_NAME = 'mdmerge';

const LOG_LEVELS = Object.keys(winston.config.npm.levels);

function resolveLevel(raw: string | undefined): string {
    return raw && LOG_LEVELS.includes(raw) ? raw : 'info';
}

// LOG_DIR overrides the default ./logs
const logsDir = path.resolve(process.cwd(), process.env.LOG_DIR || 'logs');
if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
}

/**
 * One log line: `<timestamp> [<service>] <LEVEL>: <message> <meta>`.
 * Session ids and counts passed as meta end up as compact JSON.
 */
export function formatLine(info: winston.Logform.TransformableInfo): string {
    const { level, message, timestamp, service, ...meta } = info;
    const rest = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} [${String(service ?? SERVICE_NAME)}] ${level.toUpperCase()}: ${String(message)}${rest}`;
}

const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.printf(formatLine)
);

const logger = winston.createLogger({
    level: resolveLevel(process.env.LOG_LEVEL),
    defaultMeta: { service: SERVICE_NAME },
    format: logFormat,
    transports: [
        new winston.transports.Console({
            format: winston.format.combine(
                winston.format.colorize(),
                logFormat
            ),
        }),
        new winston.transports.File({
            filename: path.join(logsDir, `${SERVICE_NAME}.log`),
            maxsize: 10485760, // 10MB
            maxFiles: 5,
        }),
        new winston.transports.File({
            filename: path.join(logsDir, 'error.log'),
            level: 'error',
        }),
    ],
});

/** Changes the level at run time; unknown names fall back to info. */
export function setLogLevel(level: string): string {
    logger.level = resolveLevel(level);
    return logger.level;
}

export default logger;
