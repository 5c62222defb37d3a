import winston from 'winston';
import path from 'path';

// Define log levels
const levels = {
    error: 0,
    warn: 1,
    info: 2,
    http: 3,
    debug: 4,
};

// Define colors for each level
const colors = {
    error: 'red',
    warn: 'yellow',
    info: 'green',
    http: 'magenta',
    debug: 'white',
};

winston.addColors(colors);

// Log format
const format = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
    winston.format.colorize({ all: true }),
    winston.format.printf(
        (info) => {
            const { timestamp, level, message, ...meta } = info;
            return `${timestamp} ${level}: ${message} ${Object.keys(meta).length ? JSON.stringify(meta) : ''}`;
        },
    ),
);

function resolveLevel(): string {
    const requested = process.env.LOG_LEVEL;
    if (requested && requested in levels) {
        return requested;
    }
    return process.env.NODE_ENV === 'development' ? 'debug' : 'warn';
}

const transports: winston.transport[] = [new winston.transports.Console()];

if (process.env.LOG_TO_FILES !== 'false') {
    transports.push(
        // Errors only
        new winston.transports.File({
            filename: path.join('logs', 'error.log'),
            level: 'error',
            format: winston.format.uncolorize(), // File logs shouldn't have ANSI colors
        }),
        new winston.transports.File({
            filename: path.join('logs', 'all.log'),
            format: winston.format.uncolorize(),
        }),
    );
}

const Logger = winston.createLogger({
    level: resolveLevel(),
    levels,
    format,
    transports,
});

export default Logger;
export { Logger };
