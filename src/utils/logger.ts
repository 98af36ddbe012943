// src/utils/logger.ts

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevelName, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3
};

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string, error?: unknown): void;
}

/**
 * Timestamped console logger: `[2024-01-01T09:00:00.000Z] INFO message`
 */
export class ConsoleLogger implements Logger {
    private minLevel: LogLevelName;

    constructor(minLevel: LogLevelName = 'info') {
        this.minLevel = minLevel;
    }

    debug(message: string): void {
        this.write('debug', message);
    }

    info(message: string): void {
        this.write('info', message);
    }

    warn(message: string): void {
        this.write('warn', message);
    }

    error(message: string, error?: unknown): void {
        this.write('error', message);
        if (error instanceof Error && error.stack && LEVEL_ORDER[this.minLevel] === LEVEL_ORDER.debug) {
            console.error(error.stack);
        }
    }

    private write(level: LogLevelName, message: string): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
            return;
        }

        const line = `[${new Date().toISOString()}] ${level.toUpperCase()} ${message}`;

        switch (level) {
            case 'error':
                console.error(line);
                break;
            case 'warn':
                console.warn(line);
                break;
            default:
                console.log(line);
        }
    }
}
