/**
 * Logger Module - structured logging
 *
 * 1. Console transport, verbosity gated by the session `debug` flag
 * 2. Rotating file transport that always records everything at the configured level
 * 3. Trace id injected from the current request context
 * 4. Errors are serialised in full, including their `cause` chain
 *
 * Categories (kind):
 * - biz: session behaviour (cache restored, login succeeded, ...)
 * - sys: I/O and transport (files, HTTP engine, proxies)
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import { getTraceId } from './tracing.js';
import config from './config.js';

export type LogKind = 'biz' | 'sys';

export interface LogMeta {
    kind: LogKind;
    /** Component name, e.g. 'PersistentSession' */
    component: string;
    message: string;
    error?: unknown;
    meta?: Record<string, unknown>;
}

const IS_DEV = process.env.NODE_ENV !== 'production';

const LOG_FILE_PATTERN = 'persistent-session-%DATE%.log';

const isRecord = (value: unknown): value is Record<string, unknown> =>
    Boolean(value) && typeof value === 'object' && !Array.isArray(value);

/**
 * Keeps the original error intact instead of wrapping it.
 */
export function serializeError(error: unknown): Record<string, unknown> | undefined {
    if (!error) return undefined;

    if (error instanceof Error) {
        return {
            name: error.name,
            message: error.message,
            stack: error.stack,
            ...(error.cause ? { cause: serializeError(error.cause) } : {}),
            ...Object.fromEntries(
                Object.entries(error).filter(([key]) => !['name', 'message', 'stack', 'cause'].includes(key))
            ),
        };
    }

    return { raw: String(error) };
}

const jsonFormat = winston.format.printf(({ level, message, timestamp, ...rest }) => {
    const logObject: Record<string, unknown> = {
        timestamp,
        level,
        traceId: getTraceId() || '-',
        ...rest,
        message,
    };

    if (rest.error) {
        logObject.error = serializeError(rest.error);
    }

    return JSON.stringify(logObject);
});

const prettyFormat = winston.format.printf(({ level, message, timestamp, kind, component, error, meta }) => {
    const traceId = getTraceId() || '-';

    let output = `${String(timestamp)} [${level.toUpperCase().padEnd(5)}] [${String(kind ?? 'sys')}] [${traceId}] ${String(component ?? 'App')}: ${String(message)}`;

    if (error) {
        const serialized = serializeError(error);
        if (serialized) {
            output += `\n  error: ${String(serialized.name)} - ${String(serialized.message ?? serialized.raw)}`;
            if (serialized.stack) {
                output += `\n  stack: ${String(serialized.stack)}`;
            }
            if (serialized.cause) {
                output += `\n  cause: ${JSON.stringify(serialized.cause)}`;
            }
        }
    }

    if (isRecord(meta) && Object.keys(meta).length > 0) {
        output += `\n  meta: ${JSON.stringify(meta)}`;
    }

    return output;
});

const consoleTransport = new winston.transports.Console({
    level: 'error',
    format: winston.format.combine(
        winston.format.timestamp({ format: 'DD/MM/YYYY HH:mm:ss' }),
        winston.format.colorize({ all: IS_DEV }),
        IS_DEV ? prettyFormat : jsonFormat
    ),
});

/**
 * Size-capped rotation with a bounded number of kept files.
 */
const fileTransport = new DailyRotateFile({
    dirname: config.logging.dir,
    filename: LOG_FILE_PATTERN,
    datePattern: 'YYYY-MM-DD',
    maxSize: config.logging.maxSize,
    maxFiles: config.logging.maxFiles,
    format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
        jsonFormat
    ),
});

const winstonLogger = winston.createLogger({
    level: config.logging.level,
    transports: [
        consoleTransport,
        fileTransport,
    ],
});

export const logFilePath = path.join(config.logging.dir, LOG_FILE_PATTERN);

/**
 * Process-wide: the last caller decides the console verbosity.
 */
export function configureLogging(options: { debug: boolean }): void {
    consoleTransport.level = options.debug ? 'debug' : 'error';
    if (options.debug) {
        logger.debug({
            kind: 'sys',
            component: 'Logger',
            message: 'Debug logs can also be found on disk',
            meta: { logFilePath },
        });
    }
}

/**
 * @example
 * logger.info({
 *     kind: 'biz',
 *     component: 'PersistentSession',
 *     message: 'Cached session restored',
 *     meta: { cacheFilePath },
 * });
 *
 * logger.error({
 *     kind: 'sys',
 *     component: 'FileCacheStore',
 *     message: 'Cache write failed',
 *     error, // pass the original error object
 * });
 */
export const logger = {
    debug: ({ message, ...rest }: LogMeta) => winstonLogger.debug(message, rest),
    info: ({ message, ...rest }: LogMeta) => winstonLogger.info(message, rest),
    warn: ({ message, ...rest }: LogMeta) => winstonLogger.warn(message, rest),
    error: ({ message, ...rest }: LogMeta) => winstonLogger.error(message, rest),
};

export default logger;
