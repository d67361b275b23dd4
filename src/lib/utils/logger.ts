/**
 * Logger interface for injectable logging implementation.
 */
interface Logger {
    /** Log warning messages. */
    warn(...args: unknown[]): void;
    /** Log error messages. */
    error(...args: unknown[]): void;
    /** Log debug/verbose messages. */
    debug(...args: unknown[]): void;
}

/**
 * Default logger implementation.
 */
const defaultLogger: Logger = {
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
    debug: (...args) => console.debug(...args)
};

let impl: Logger = defaultLogger;
let quiet = false;

/**
 * Global logger instance with injectable implementation.
 * Use setLogger() to route messages into the host application's own logging.
 * Use setQuiet() to suppress everything except errors.
 */
const logger = {
    /**
     * Set a custom logger implementation. Pass nothing to restore the console logger.
     * @param l - The logger implementation to use.
     */
    setLogger(l: Logger = defaultLogger) {
        impl = l;
    },

    /**
     * Set quiet mode. When quiet, warnings and debug output are suppressed. Errors always show.
     * @param q - Whether to enable quiet mode.
     */
    setQuiet(q: boolean) {
        quiet = q;
    },

    /**
     * Log warning messages. Suppressed in quiet mode.
     * @param args - The arguments to log.
     */
    warn(...args: unknown[]) {
        if (!quiet) impl.warn(...args);
    },

    /**
     * Log error messages. Always shown, even in quiet mode.
     * @param args - The arguments to log.
     */
    error(...args: unknown[]) {
        impl.error(...args);
    },

    /**
     * Log debug/verbose messages. Suppressed in quiet mode.
     * @param args - The arguments to log.
     */
    debug(...args: unknown[]) {
        if (!quiet) impl.debug(...args);
    }
};

export { logger };
export type { Logger };
