export interface Logger {
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export type LoggerOptions = {
    /** Suppress info output; warnings and errors are still printed */
    quiet?: boolean;
};

export function createLogger(opt: LoggerOptions = {}): Logger {
    return {
        info: opt.quiet ? () => {} : (message) => console.log(message),
        warn: (message) => console.warn(message),
        error: (message) => console.error(message),
    };
}

export const silentLogger: Logger = {
    info: () => {},
    warn: () => {},
    error: () => {},
};
