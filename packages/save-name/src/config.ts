export type Config = {
    debug: boolean;
    logHistory: number;
};

const DEFAULT_LOG_HISTORY = 5000;

function parseFlag(value: string | undefined): boolean {
    if (!value) return false;
    const normalized = value.trim().toLowerCase();
    return normalized === '1' || normalized === 'true';
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
    if (!value) return fallback;
    const parsed = Number(value.trim());
    return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(): Config {
    const debug = parseFlag(process.env.SAVE_NAME_DEBUG);
    const logHistory = parsePositiveInt(process.env.SAVE_NAME_LOG_HISTORY, DEFAULT_LOG_HISTORY);
    return { debug, logHistory };
}
