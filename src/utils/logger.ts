import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { IndexerError } from '../types/errors';

// Extend Winston logger type
interface ExtendedLogger extends winston.Logger {
    logError: (error: unknown, context?: string, additionalData?: Record<string, unknown>) => void;
}

const isTestEnv = process.env.NODE_ENV === 'test';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

// Type guard for checking if object is an Error
function isError(obj: unknown): obj is Error {
    return obj instanceof Error;
}

// Metadata cleaning: drops empty values, breaks cycles, stringifies bigints
const cleanMetadata = (obj: unknown, visited = new WeakSet<object>()): unknown => {
    if (obj === undefined || obj === null) {
        return obj;
    }

    if (typeof obj === 'bigint') {
        return obj.toString();
    }

    if (!isRecord(obj)) {
        return obj;
    }

    if (obj instanceof Date) {
        return obj.toISOString();
    }

    // Detect circular references
    if (visited.has(obj)) {
        return '[Circular Reference]';
    }
    visited.add(obj);

    if (Array.isArray(obj)) {
        return obj.map(item => cleanMetadata(item, visited));
    }

    const cleaned: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
        const cleanedValue = cleanMetadata(value, visited);
        if (cleanedValue !== undefined) {
            cleaned[key] = cleanedValue;
        }
    }
    return Object.keys(cleaned).length > 0 ? cleaned : undefined;
};

// Message formatting function
const formatMessage = (message: unknown): string => {
    if (message === undefined || message === null) {
        return '';
    }

    if (isError(message)) {
        return `${message.name}: ${message.message}`;
    }

    if (typeof message === 'string') {
        return message;
    }

    if (isRecord(message) && typeof message.message === 'string') {
        return `Error: ${message.message}`;
    }

    try {
        return JSON.stringify(cleanMetadata(message));
    } catch {
        return String(message);
    }
};

const enhancedPrintFormat = (info: winston.Logform.TransformableInfo): string => {
    const { level, message, timestamp, stack, error, ...metadata } = info;

    const safeLevel = level.toUpperCase().padEnd(7);
    const safeTimestamp = typeof timestamp === 'string' ? timestamp : new Date().toISOString();

    let errorStack = typeof stack === 'string' ? stack : undefined;
    let safeMessage = formatMessage(message);

    if (isError(error)) {
        safeMessage = `${safeMessage} (${error.name}: ${error.message})`;
        errorStack = errorStack || error.stack;
    } else if (isError(message)) {
        errorStack = errorStack || message.stack;
    }

    let log = `${safeTimestamp} ${safeLevel}: ${safeMessage}`;

    const cleanedMetadata = cleanMetadata(isError(error) || error === undefined ? metadata : { ...metadata, error });
    if (isRecord(cleanedMetadata) && Object.keys(cleanedMetadata).length > 0) {
        log += `\n${JSON.stringify(cleanedMetadata, null, 2)}`;
    }

    if (errorStack) {
        log += `\n${errorStack}`;
    }

    return log;
};

const customFormat = winston.format.combine(
    winston.format.timestamp({
        format: 'YYYY-MM-DD HH:mm:ss.SSS'
    }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.printf(enhancedPrintFormat)
);

const levels = {
    error: 0,
    warn: 1,
    info: 2,
    http: 3,
    verbose: 4,
    debug: 5,
    trace: 6
};

const colors = {
    error: 'red',
    warn: 'yellow',
    info: 'green',
    http: 'magenta',
    verbose: 'cyan',
    debug: 'blue',
    trace: 'gray'
};

winston.addColors(colors);

const rotatingFile = (filename: string, level?: string): DailyRotateFile => new DailyRotateFile({
    filename,
    datePattern: 'YYYY-MM-DD',
    level,
    maxFiles: '14d',
    maxSize: '20m',
    zippedArchive: true,
    format: customFormat
});

const transports: winston.transport[] = [
    new winston.transports.Console({
        format: winston.format.combine(
            winston.format.timestamp({
                format: 'YYYY-MM-DD HH:mm:ss.SSS'
            }),
            winston.format.colorize({ all: true }),
            winston.format.printf(info => `${info.timestamp} ${info.level.padEnd(7)}: ${formatMessage(info.message)}`)
        ),
        silent: isTestEnv && process.env.LOG_LEVEL === undefined,
        handleExceptions: !isTestEnv,
        handleRejections: !isTestEnv
    })
];

if (!isTestEnv) {
    transports.push(rotatingFile('logs/error-%DATE%.log', 'error'));
    transports.push(rotatingFile('logs/combined-%DATE%.log'));
}

const baseLogger = winston.createLogger({
    level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
    levels,
    defaultMeta: {
        service: 'near-pool-indexer',
        environment: process.env.NODE_ENV || 'development'
    },
    format: winston.format.combine(
        winston.format.timestamp({
            format: 'YYYY-MM-DD HH:mm:ss.SSS'
        }),
        winston.format.errors({ stack: true })
    ),
    transports,
    exitOnError: false
});

if (!isTestEnv) {
    baseLogger.exceptions.handle(rotatingFile('logs/exceptions-%DATE%.log'));
    baseLogger.rejections.handle(rotatingFile('logs/rejections-%DATE%.log'));
}

/**
 * Logs an error with its name, message, stack and the caller's context.
 * Indexer errors also carry their details, which come before `additionalData`.
 */
const logError = (error: unknown, context: string = '', additionalData: Record<string, unknown> = {}): void => {
    let errorMessage: string;
    let errorStack: string | undefined;
    let errorName = 'Error';
    const details = error instanceof IndexerError ? error.details : {};

    if (isError(error)) {
        errorName = error.name;
        errorMessage = error.message;
        errorStack = error.stack;
    } else if (typeof error === 'string') {
        errorMessage = error;
    } else {
        errorMessage = formatMessage(error);
    }

    baseLogger.error(`${context ? context + ': ' : ''}${errorName}: ${errorMessage}`, {
        error: {
            error_name: errorName,
            error_message: errorMessage,
            context,
            ...details,
            ...additionalData
        },
        stack: errorStack
    });
};

const logger: ExtendedLogger = Object.assign(baseLogger, { logError });

export { logger, type ExtendedLogger };
