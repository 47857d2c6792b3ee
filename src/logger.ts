import winston from 'winston';
import fs from 'fs';
import path from 'path';
import settings from './settings.js';

const levelTable = {
    fatal: { priority: 0, color: 'redBG white' },
    error: { priority: 1, color: 'red' },
    perf: { priority: 2, color: 'magenta' },
    warn: { priority: 3, color: 'yellow' },
    info: { priority: 4, color: 'green' },
    http: { priority: 5, color: 'cyan' },
    verbose: { priority: 6, color: 'blue' },
    debug: { priority: 7, color: 'white' },
    silly: { priority: 8, color: 'grey' },
    trace: { priority: 9, color: 'grey' },
    cons: { priority: 10, color: 'inverse' },
} as const;

export type LogLevel = keyof typeof levelTable;

const levelNames = Object.keys(levelTable);

function isLogLevel(level: string): level is LogLevel {
    return levelNames.includes(level);
}

const levels: Record<string, number> = {};
const colors: Record<string, string> = {};
for (const [name, entry] of Object.entries(levelTable)) {
    levels[name] = entry.priority;
    colors[name] = entry.color;
}
winston.addColors(colors);

function resolveLevel(requested: string): LogLevel {
    const level = requested.toLowerCase();
    if (isLogLevel(level)) return level;
    console.warn(`Invalid LOG_LEVEL "${level}", falling back to "info". Valid levels: ${levelNames.join(', ')}`);
    return 'info';
}

const initialLevel = resolveLevel(settings.logLevel);

const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
        return `[${timestamp}] ${level}: ${message}${extra}`;
    })
);

const transports: Array<winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance> = [new winston.transports.Console({ format: consoleFormat })];

// JSON lines, one file per node, only when LOG_DIR is set
if (settings.logDir) {
    fs.mkdirSync(settings.logDir, { recursive: true });
    transports.push(new winston.transports.File({
        filename: path.join(settings.logDir, `exchange-${settings.nodeIdentifier}.log`),
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    }));
}

const baseLogger = winston.createLogger({
    levels,
    level: initialLevel,
    format: winston.format.errors({ stack: true }),
    transports,
});

const logger = Object.assign(baseLogger, {
    setLogLevel(level: string): void {
        const next = level.toLowerCase();
        if (!isLogLevel(next)) {
            baseLogger.warn(`[logger] ignoring unknown log level ${next}`);
            return;
        }
        baseLogger.level = next;
        baseLogger.info(`[logger] level set to ${next}`);
    },
});

export default logger;
