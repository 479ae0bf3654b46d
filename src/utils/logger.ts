import pino from 'pino';

type LogMeta = Record<string, unknown>;

const isDev = process.env.NODE_ENV === 'development';

/**
 * Picks the pino level from LOG_LEVEL. An unknown name falls back to the
 * default and is returned as `rejected`, since pino throws on it.
 */
export function resolveLogLevel(
    requested: string | undefined,
    development: boolean
): { level: string; rejected?: string } {
    const fallback = development ? 'debug' : 'info';
    if (!requested) return { level: fallback };

    const name = requested.trim().toLowerCase();
    if (name === 'silent' || Object.hasOwn(pino.levels.values, name)) return { level: name };

    return { level: fallback, rejected: requested };
}

const { level, rejected: rejectedLevel } = resolveLogLevel(process.env.LOG_LEVEL, isDev);

const createPinoLogger = () => {
    if (isDev) {
        // Development: pino-pretty for colored console output
        return pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'yyyy-mm-dd HH:MM:ss:l',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    // Single-line JSON to stdout; schedulers and log collectors take it from there
    return pino({
        level,
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: {
            level: (label) => ({ level: label }),
        },
    });
};

const pinoInstance = createPinoLogger();

if (rejectedLevel !== undefined) {
    pinoInstance.warn({ requested: rejectedLevel, level }, 'Unknown LOG_LEVEL, using the default');
}

export interface LogMethods {
    error: (message: string, meta?: LogMeta) => void;
    warn: (message: string, meta?: LogMeta) => void;
    info: (message: string, meta?: LogMeta) => void;
    debug: (message: string, meta?: LogMeta) => void;
}

function wrap(target: pino.Logger): LogMethods {
    return {
        error: (message, meta) => meta ? target.error(meta, message) : target.error(message),
        warn: (message, meta) => meta ? target.warn(meta, message) : target.warn(message),
        info: (message, meta) => meta ? target.info(meta, message) : target.info(message),
        debug: (message, meta) => meta ? target.debug(meta, message) : target.debug(message),
    };
}

/**
 * Message-first logger facade.
 *
 * Call sites write `Logger.info('message', { meta })`; pino itself takes
 * `(meta, message)`, so every method swaps the arguments.
 */
export const Logger = {
    ...wrap(pinoInstance),
    /** Child logger for contextual logging, e.g. a run's syncId. */
    child: (bindings: LogMeta): LogMethods => wrap(pinoInstance.child(bindings)),
};
