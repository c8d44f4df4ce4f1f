import { baseLogger } from './logger';

/* Usage:
 * const log = zone('dataplane.transport');
 * log.info({ message: 'Transaction committed', data: { transactionId } });
 */

export type LogPayload = {
    message: string;
    data?: unknown;
    /** When true, data will be replaced with "<private>" */
    private?: boolean;
};

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type ZoneLogger = Record<LogLevel, (payload: string | LogPayload) => void>;

export function zone(name: string): ZoneLogger {
    function createLogFn(level: LogLevel) {
        return (payload: string | LogPayload) => {
            if (typeof payload === 'string') {
                baseLogger[level](payload, { zone: name });
                return;
            }

            const { message, data, private: isPrivate } = payload;
            const emittedData = isPrivate ? '<private>' : data;

            baseLogger[level](message, { zone: name, data: emittedData });
        };
    }

    return {
        error: createLogFn('error'),
        warn: createLogFn('warn'),
        info: createLogFn('info'),
        debug: createLogFn('debug'),
    };
}
