type Level = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const order: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 50 };

function isLevel(value: string): value is Level {
    return Object.prototype.hasOwnProperty.call(order, value);
}

function resolveLevel(): Level {
    const raw = (process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'warn' : 'info')).toLowerCase();
    return isLevel(raw) ? raw : 'info';
}

const envLevel = resolveLevel();

function shouldLog(level: Level) {
    return order[level] >= order[envLevel];
}

function format(level: Level, msg: string, source?: string) {
    const time = new Date().toISOString();
    return `[${time}]${source ? ` [${source}]` : ''} ${level.toUpperCase()}: ${msg}`;
}

export const logger = {
    debug: (msg: string, source?: string) => {
        if (shouldLog('debug')) console.debug(format('debug', msg, source));
    },
    info: (msg: string, source?: string) => {
        if (shouldLog('info')) console.info(format('info', msg, source));
    },
    warn: (msg: string, source?: string) => {
        if (shouldLog('warn')) console.warn(format('warn', msg, source));
    },
    error: (msg: string, source?: string) => {
        if (shouldLog('error')) console.error(format('error', msg, source));
    }
};
