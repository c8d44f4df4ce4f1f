import * as winston from 'winston';
import type { Logform } from 'winston';
import fs from 'fs';
import path from 'path';
import util from 'util';
import { redactSensitive } from './redact';

export const OVERSIZE_THRESHOLD = 100_000; // bytes
export const CONSOLE_TRUNCATE_LENGTH = 1_000; // characters

// File logging is opt-in: a library should not write files just by being imported
const LOG_FILE = process.env.DATAPLANE_LOG_FILE;

const levelColors: Record<string, string> = {
    info: 'cyan',
    debug: 'gray',
    error: 'red',
    warn: 'yellow'
};

winston.addColors(levelColors);

// Type-aware serialization for log data. Exported for testing and extension.
export function serializeLogData(data: unknown): string {
    if (typeof data === 'string') return data;

    if (data === null) return 'null';

    if (data === undefined) return '';

    if (typeof data === 'number') {
        if (Number.isNaN(data)) return 'NaN';
        if (!Number.isFinite(data)) return data > 0 ? 'Infinity' : '-Infinity';
        return String(data);
    }

    if (typeof data === 'boolean') return data ? 'true' : 'false';

    if (typeof data === 'symbol') return data.toString();
    if (typeof data === 'function') {
        return `<function:${data.name || 'anonymous'}>`;
    }

    if (Buffer.isBuffer(data)) {
        return `<Buffer base64:${data.toString('base64')}>`;
    }

    if (data instanceof Error) {
        return JSON.stringify({ name: data.name, message: data.message });
    }

    // Objects: try JSON.stringify, fallback to util.inspect for circular references
    try {
        return JSON.stringify(data);
    } catch {
        return util.inspect(data, { depth: 2, breakLength: Infinity });
    }
}

export type LogInfo = Logform.TransformableInfo & { __serializedData?: string; zone?: string; data?: unknown; timestamp?: string };

// Guard that checks incoming data size and replaces oversized payloads
export const overflowGuard = winston.format((info: LogInfo) => {
    if (!Object.prototype.hasOwnProperty.call(info, 'data') || info.data === undefined) {
        return info;
    }

    let serialized: string;
    try {
        serialized = serializeLogData(info.data);
    } catch (err) {
        const stack = err instanceof Error && err.stack ? err.stack : String(err);
        info.zone = 'logger';
        info.message = 'an oversized/invalid log message was received.';
        info.data = { stack, bytes: 0 };
        info.level = 'error';
        return info;
    }

    info.__serializedData = serialized;

    const bytes = Buffer.byteLength(serialized, 'utf8');

    if (bytes > OVERSIZE_THRESHOLD) {
        const stack = new Error('Oversized log message').stack ?? '';
        info.zone = 'logger';
        info.message = 'an oversized/invalid log message was received.';
        info.data = { stack, bytes };
        info.__serializedData = undefined;
        info.level = 'error';
    }

    return info;
});

// Runs after overflowGuard so both sinks only ever see redacted text
export const redactGuard = winston.format((info: LogInfo) => {
    if (typeof info.message === 'string') {
        info.message = redactSensitive(info.message);
    }
    if (typeof info.__serializedData === 'string') {
        info.__serializedData = redactSensitive(info.__serializedData);
    }
    return info;
});

export function formatDataForConsole(data: unknown) {
    if (data === undefined) return '';

    let s: string;
    try {
        s = typeof data === 'string' ? data : JSON.stringify(data, null, 2);
    } catch {
        s = String(data);
    }

    const bytes = Buffer.byteLength(s, 'utf8');
    if (s.length > CONSOLE_TRUNCATE_LENGTH) {
        return s.slice(0, CONSOLE_TRUNCATE_LENGTH) + ` ... <truncated ${bytes} bytes>`;
    }

    return s;
}

export const lowerCaseLevel = winston.format((info) => {
    if (info.level) info.level = String(info.level).toLowerCase();
    return info;
});

function pickData(info: LogInfo): unknown {
    if (typeof info.__serializedData !== 'undefined') return info.__serializedData;
    if (Object.prototype.hasOwnProperty.call(info, 'data')) {
        return typeof info.data === 'string' ? info.data : serializeLogData(info.data);
    }
    return undefined;
}

export function formatConsoleLine(info: LogInfo): string {
    const zone = info.zone ?? 'core';
    const dataSource = pickData(info);
    const dataPart = typeof dataSource !== 'undefined' ? ' ' + formatDataForConsole(dataSource) : '';
    return `[${info.level}][${zone}] ${String(info.message)}${dataPart}`;
}

export function formatFileLine(info: LogInfo): string {
    const ts = info.timestamp || new Date().toISOString();
    const zone = info.zone ?? 'core';
    const level = info.level.toUpperCase();
    const dataSource = pickData(info);
    const dataPart = typeof dataSource !== 'undefined' ? ' ' + String(dataSource) : '';

    // Simple syslog-like line: TIMESTAMP ZONE LEVEL: MESSAGE DATA
    return `${ts} ${zone} ${level}: ${String(info.message)}${dataPart}`;
}

export const consoleFormat = winston.format.combine(
    overflowGuard(),
    redactGuard(),
    lowerCaseLevel(),
    winston.format.colorize({ all: false }),
    winston.format.printf((info: LogInfo) => formatConsoleLine(info))
);

const fileFormat = winston.format.combine(
    overflowGuard(),
    redactGuard(),
    winston.format.timestamp(),
    winston.format.printf((info: LogInfo) => formatFileLine(info))
);

function buildTransports(): winston.transport[] {
    const isTestEnv = process.env.NODE_ENV === 'test';
    const transports: winston.transport[] = [
        new winston.transports.Console({ format: consoleFormat, silent: isTestEnv })
    ];

    if (LOG_FILE) {
        try {
            fs.mkdirSync(path.dirname(LOG_FILE), { recursive: true });
            transports.push(new winston.transports.File({ filename: LOG_FILE, format: fileFormat }));
        } catch (err) {
            // The logger itself is what failed, so stderr is the only place left
            console.error('[Logger] Failed to prepare log file directory:', err);
        }
    }

    return transports;
}

export const baseLogger = winston.createLogger({
    level: process.env.DATAPLANE_LOG_LEVEL || 'debug',
    transports: buildTransports()
});
