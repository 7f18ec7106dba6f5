import dotenv from 'dotenv';
import os from 'os';
import path from 'path';

// Load environment variables from .env file
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (X11; Ubuntu; Linux x86_64; rv:68.0) Gecko/20100101 Firefox/68.0';

export const DEFAULT_CACHE_TIMEOUT_SECONDS = 60 * 60;

export interface Config {
    session: {
        cacheTimeoutSeconds: number;
        userAgent: string;
        maxRedirects: number;
    };
    logging: {
        level: LogLevel;
        dir: string;
        maxSize: string;
        maxFiles: number;
    };
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
    if (!raw) return fallback;
    const parsed = Number(raw);
    return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevel): LogLevel {
    const normalized = raw?.toLowerCase().trim();
    const match = LOG_LEVELS.find((level) => level === normalized);
    return match ?? fallback;
}

const config: Config = {
    session: {
        cacheTimeoutSeconds: parsePositiveInt(process.env.SESSION_CACHE_TIMEOUT, DEFAULT_CACHE_TIMEOUT_SECONDS),
        userAgent: process.env.SESSION_USER_AGENT || DEFAULT_USER_AGENT,
        maxRedirects: parsePositiveInt(process.env.SESSION_MAX_REDIRECTS, 30),
    },
    logging: {
        level: parseLogLevel(process.env.LOG_LEVEL, 'debug'),
        dir: process.env.LOG_DIR || os.tmpdir(),
        maxSize: process.env.LOG_MAX_SIZE || '500k',
        maxFiles: parsePositiveInt(process.env.LOG_MAX_FILES, 5),
    },
};

export default config;
