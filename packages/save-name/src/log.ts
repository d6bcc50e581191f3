import chalk from 'chalk';
import { loadConfig } from './config';

export type LoggerOptions = {
    /** Write debug records to the console as well as the history */
    debug: boolean;
    /** Number of records kept in memory */
    maxLogs: number;
};

/**
 * In-process logger keeping a bounded history of records.
 * Records reach the console only when debug output is enabled.
 */
export class Logger {
    private logs: string[] = [];
    private listeners: Array<() => void> = [];
    private readonly options: LoggerOptions;

    constructor(options: LoggerOptions) {
        this.options = options;
    }

    debug(message: string): void {
        this.push(message);
        if (this.options.debug) {
            console.debug(chalk.dim(message));
        }
    }

    getLogs(): string[] {
        return [...this.logs];
    }

    clear(): void {
        this.logs = [];
        this.notify();
    }

    /**
     * Subscribe to log changes - returns unsubscribe function
     */
    onChange(listener: () => void): () => void {
        this.listeners.push(listener);
        return () => {
            const index = this.listeners.indexOf(listener);
            if (index > -1) {
                this.listeners.splice(index, 1);
            }
        };
    }

    private push(message: string): void {
        this.logs.push(message);
        // circular buffer
        if (this.logs.length > this.options.maxLogs) {
            this.logs.shift();
        }
        this.notify();
    }

    private notify(): void {
        this.listeners.forEach(listener => listener());
    }
}

function createDefaultLogger(): Logger {
    const config = loadConfig();
    return new Logger({ debug: config.debug, maxLogs: config.logHistory });
}

export const log = createDefaultLogger();
