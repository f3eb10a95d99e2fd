import winston from 'winston';

const levels = {
    error: 0,
    warn: 1,
    info: 2,
    http: 3,
    debug: 4,
};

const colors = {
    error: 'red',
    warn: 'yellow',
    info: 'green',
    http: 'magenta',
    debug: 'white',
};

winston.addColors(colors);

const format = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
    winston.format.colorize({ all: true }),
    winston.format.printf(
        (info) => `${info.timestamp} ${info.level}: ${info.message}`,
    ),
);

const logLevel = (
    process.env.LOG_LEVEL
    || (process.env.NODE_ENV === 'development' ? 'debug' : 'info')
).toLowerCase();
const maxSizeBytes = Math.max(1_000_000, Number(process.env.LOG_MAX_SIZE_BYTES || `${10 * 1024 * 1024}`));
const maxFiles = Math.max(1, Number(process.env.LOG_MAX_FILES || '10'));
// Test runs and containers that ship stdout elsewhere keep logs off disk.
const logToFile = process.env.LOG_TO_FILE !== 'false' && process.env.NODE_ENV !== 'test';
const logDirectory = (process.env.LOG_DIR || 'logs').trim();

const transports: winston.transport[] = [new winston.transports.Console()];
if (logToFile) {
    transports.push(
        new winston.transports.File({
            filename: `${logDirectory}/error.log`,
            level: 'error',
            maxsize: maxSizeBytes,
            maxFiles,
        }),
        new winston.transports.File({
            filename: `${logDirectory}/stress-harness.log`,
            maxsize: maxSizeBytes,
            maxFiles,
        }),
    );
}

export const logger = winston.createLogger({
    level: logLevel,
    levels,
    format,
    transports,
});

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
